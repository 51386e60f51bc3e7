export { AdjectivePicker, loadAdjectives } from './adjectives.js';
export { buildPrompt, composeStatus, altText, HASHTAGS, MAX_ALT_TEXT_LENGTH } from './prompt.js';
export { ImageGenerator } from './image-generator.js';
export type { ImagesApi } from './image-generator.js';
export { decodeImage } from './image-decoder.js';
export { Gallery } from './gallery.js';
export { MastodonClient } from './mastodon-client.js';
export type { MastodonClientOptions } from './mastodon-client.js';
export { MastodonPublisher } from './publisher.js';
export { PigeonPipeline } from './pipeline.js';
export type { ImageSource, PipelineDeps } from './pipeline.js';
export * from './types.js';
