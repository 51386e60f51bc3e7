import { logger } from '@pigeonpost/utils';
import { MastodonClient } from './mastodon-client.js';
import { altText, composeStatus } from './prompt.js';
import type { PublishRequest, PublishResult, Publisher, Visibility } from './types.js';

export class MastodonPublisher implements Publisher {
  constructor(
    private client: MastodonClient,
    private visibility: Visibility = 'public'
  ) {}

  async publish(request: PublishRequest): Promise<PublishResult> {
    const media = await this.client.uploadMedia(request.data, {
      filename: `${request.adjective}.png`,
      description: altText(request.prompt),
    });

    const status = await this.client.postStatus({
      status: composeStatus(request.adjective),
      mediaIds: [media.id],
      visibility: this.visibility,
    });

    logger.info(`Posted ${request.adjective} pigeon`, { id: status.id, url: status.url });
    return { id: status.id, url: status.url };
  }
}
