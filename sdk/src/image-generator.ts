import OpenAI from 'openai';
import { PigeonError, logger } from '@pigeonpost/utils';
import type { OpenAIConfig } from '@pigeonpost/utils';
import type { GeneratedImage } from './types.js';

/** The slice of the OpenAI client this module talks to. */
export interface ImagesApi {
  generate(body: OpenAI.ImageGenerateParams): Promise<OpenAI.ImagesResponse>;
}

export class ImageGenerator {
  private images: ImagesApi;
  private model: string;

  constructor(config: OpenAIConfig, images?: ImagesApi) {
    this.model = config.model;
    this.images =
      images ??
      new OpenAI({
        apiKey: config.apiKey,
        timeout: config.timeoutMs,
        maxRetries: config.maxRetries,
      }).images;
  }

  async generate(prompt: string): Promise<GeneratedImage> {
    logger.debug('Requesting image', { model: this.model });

    let response: OpenAI.ImagesResponse;
    try {
      response = await this.images.generate({
        model: this.model,
        prompt,
        size: '1024x1024',
        quality: 'hd',
        style: 'natural',
        n: 1,
        response_format: 'b64_json',
      });
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      throw new PigeonError(
        'IMAGE_GENERATION_FAILED',
        `Image request failed: ${error instanceof Error ? error.message : String(error)}`,
        { status, model: this.model },
        { cause: error }
      );
    }

    const image = response.data?.[0];
    if (!image?.b64_json) {
      throw new PigeonError('IMAGE_GENERATION_FAILED', 'Image response contained no base64 data', { model: this.model });
    }

    return {
      data: Buffer.from(image.b64_json, 'base64'),
      revisedPrompt: image.revised_prompt ?? undefined,
    };
  }
}
