import { PigeonError, logger as defaultLogger, type Logger } from '@pigeonpost/utils';
import { AdjectivePicker } from './adjectives.js';
import { Gallery } from './gallery.js';
import { decodeImage } from './image-decoder.js';
import { buildPrompt } from './prompt.js';
import type { GeneratedImage, Publisher, RunOptions, RunResult } from './types.js';

export interface ImageSource {
  generate(prompt: string): Promise<GeneratedImage>;
}

export interface PipelineDeps {
  gallery: Gallery;
  /** Only needed for real runs; dry runs never call it. */
  generator?: ImageSource;
  picker?: AdjectivePicker;
  publisher?: Publisher;
  logger?: Logger;
}

/**
 * Pick an unused adjective, draw that pigeon, file it in the gallery and
 * optionally publish it.
 */
export class PigeonPipeline {
  private gallery: Gallery;
  private generator?: ImageSource;
  private picker: AdjectivePicker;
  private publisher?: Publisher;
  private logger: Logger;

  constructor(deps: PipelineDeps) {
    this.gallery = deps.gallery;
    this.generator = deps.generator;
    this.picker = deps.picker ?? new AdjectivePicker();
    this.publisher = deps.publisher;
    this.logger = deps.logger ?? defaultLogger;
  }

  async run(options: RunOptions = {}): Promise<RunResult> {
    const existing = await this.gallery.listStems();
    const adjective = this.chooseAdjective(existing, options.adjective);
    const prompt = buildPrompt(adjective);

    this.logger.info(`Generating image for ${adjective}`);

    if (options.dryRun) {
      this.logger.debug('Dry run, skipping image request', { prompt });
      return { adjective, prompt };
    }

    if (!this.generator) {
      throw new PigeonError('CONFIG_MISSING', 'No image generator configured', { missing: ['OPENAI_API_KEY'] });
    }
    if (options.post && !this.publisher) {
      throw new PigeonError('CONFIG_MISSING', 'Posting requested but Mastodon is not configured');
    }

    const generated = await this.generator.generate(prompt);
    if (generated.revisedPrompt && generated.revisedPrompt !== prompt) {
      this.logger.debug('Prompt was revised', { revisedPrompt: generated.revisedPrompt });
    }

    const image = await decodeImage(generated.data);
    const filepath = this.gallery.pathFor(adjective);

    this.logger.info(`Saving image to ${filepath}...`);
    await this.gallery.save(adjective, image.data);

    const result: RunResult = { adjective, prompt, filepath, width: image.width, height: image.height };

    if (options.post && this.publisher) {
      result.status = await this.publisher.publish({ adjective, prompt, data: image.data });
    }

    return result;
  }

  private chooseAdjective(existing: string[], requested?: string): string {
    if (requested === undefined) {
      return this.picker.pick(existing);
    }

    const adjective = requested.trim().toLowerCase();
    if (!/^[a-z][a-z-]*$/.test(adjective)) {
      throw new PigeonError('ADJECTIVE_INVALID', `"${requested}" is not a usable adjective`, { adjective: requested });
    }
    if (existing.some((stem) => stem.toLowerCase() === adjective)) {
      throw new PigeonError('ADJECTIVE_TAKEN', `An image for "${adjective}" already exists`, {
        filepath: this.gallery.pathFor(adjective),
      });
    }
    return adjective;
  }
}
