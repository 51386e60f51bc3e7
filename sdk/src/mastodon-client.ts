import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import FormData from 'form-data';
import { randomUUID } from 'crypto';
import { ErrorHandler, PigeonError, logger, retry } from '@pigeonpost/utils';
import type { MastodonConfig } from '@pigeonpost/utils';
import type { Account, AppToken, MediaAttachment, PostOptions, Status, UploadOptions } from './types.js';

export interface MastodonClientOptions {
  pollIntervalMs?: number;
  maxPollAttempts?: number;
  /** Replaces the HTTP transport, e.g. with an in-process stub. */
  adapter?: AxiosAdapter;
}

class StillProcessing extends Error {
  constructor(readonly mediaId: string) {
    super(`Media ${mediaId} is still processing`);
  }
}

export class MastodonClient {
  private api: AxiosInstance;
  private config: MastodonConfig;
  private pollIntervalMs: number;
  private maxPollAttempts: number;

  constructor(config: MastodonConfig, options?: MastodonClientOptions) {
    this.config = config;
    this.pollIntervalMs = options?.pollIntervalMs ?? 2000;
    this.maxPollAttempts = options?.maxPollAttempts ?? 30;

    this.api = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      adapter: options?.adapter,
      headers: {
        Authorization: `Bearer ${config.accessToken}`,
      },
    });
  }

  // Media

  async uploadMedia(data: Buffer, options: UploadOptions): Promise<MediaAttachment> {
    const form = new FormData();
    form.append('file', data, { filename: options.filename, contentType: 'image/png' });
    if (options.description) {
      form.append('description', options.description);
    }

    let media: MediaAttachment;
    let processing: boolean;
    try {
      const response = await this.api.post<MediaAttachment>('/api/v2/media', form, {
        headers: form.getHeaders(),
      });
      media = response.data;
      processing = response.status === 202 || media.url === null;
    } catch (error) {
      throw ErrorHandler.fromHttp(error, 'Media upload');
    }

    logger.debug('Uploaded media', { id: media.id, processing });
    return processing ? this.waitForMedia(media.id) : media;
  }

  async waitForMedia(id: string): Promise<MediaAttachment> {
    try {
      return await retry(
        async () => {
          const response = await this.api.get<MediaAttachment>(`/api/v1/media/${encodeURIComponent(id)}`);
          if (response.status === 206 || response.data.url === null) {
            throw new StillProcessing(id);
          }
          return response.data;
        },
        {
          attempts: this.maxPollAttempts,
          delayMs: this.pollIntervalMs,
          factor: 1,
          shouldRetry: (error) => error instanceof StillProcessing,
          onRetry: (_error, attempt) => logger.debug('Media still processing', { id, attempt }),
        }
      );
    } catch (error) {
      if (error instanceof StillProcessing) {
        throw new PigeonError(
          'MEDIA_PROCESSING_TIMEOUT',
          `Media ${id} was still processing after ${this.maxPollAttempts} checks`,
          { id, attempts: this.maxPollAttempts }
        );
      }
      throw ErrorHandler.fromHttp(error, 'Media status');
    }
  }

  // Statuses

  async postStatus(options: PostOptions): Promise<Status> {
    try {
      const response = await this.api.post<Status>(
        '/api/v1/statuses',
        {
          status: options.status,
          media_ids: options.mediaIds ?? [],
          visibility: options.visibility ?? 'public',
        },
        {
          headers: {
            'Content-Type': 'application/json',
            'Idempotency-Key': options.idempotencyKey ?? randomUUID(),
          },
        }
      );
      return response.data;
    } catch (error) {
      throw ErrorHandler.fromHttp(error, 'Status post');
    }
  }

  // Credentials

  async verifyCredentials(): Promise<Account> {
    try {
      const response = await this.api.get<Account>('/api/v1/accounts/verify_credentials');
      return response.data;
    } catch (error) {
      throw ErrorHandler.fromHttp(error, 'Account verification');
    }
  }

  /** Exchange the app's client key and secret for an app-level token. */
  async verifyApp(): Promise<AppToken> {
    try {
      const response = await this.api.post<AppToken>(
        '/oauth/token',
        {
          grant_type: 'client_credentials',
          client_id: this.config.clientKey,
          client_secret: this.config.clientSecret,
          scope: 'read',
        },
        { headers: { 'Content-Type': 'application/json' } }
      );
      return response.data;
    } catch (error) {
      throw ErrorHandler.fromHttp(error, 'App verification');
    }
  }
}
