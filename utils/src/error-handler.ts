import { isAxiosError } from 'axios';

export type ErrorCode =
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'ADJECTIVES_EXHAUSTED'
  | 'ADJECTIVE_TAKEN'
  | 'ADJECTIVE_INVALID'
  | 'IMAGE_GENERATION_FAILED'
  | 'IMAGE_INVALID'
  | 'MASTODON_REQUEST_FAILED'
  | 'MEDIA_PROCESSING_TIMEOUT'
  | 'FILE_NOT_FOUND';

export class PigeonError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PigeonError';
    this.code = code;
    this.details = details;
  }
}

const CONFIG_CODES: ReadonlySet<ErrorCode> = new Set(['CONFIG_MISSING', 'CONFIG_INVALID']);

export class ErrorHandler {
  /**
   * Wrap a failed HTTP call. The server's own `error` field (Mastodon puts
   * its reason there) wins over axios' generic message.
   */
  static fromHttp(error: unknown, action: string): PigeonError {
    if (error instanceof PigeonError) {
      return error;
    }

    if (isAxiosError(error)) {
      const status = error.response?.status;
      const body: unknown = error.response?.data;
      const reason =
        typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string'
          ? body.error
          : error.message;

      return new PigeonError(
        'MASTODON_REQUEST_FAILED',
        status ? `${action} failed (HTTP ${status}): ${reason}` : `${action} failed: ${reason}`,
        { status, action },
        { cause: error }
      );
    }

    return new PigeonError('MASTODON_REQUEST_FAILED', `${action} failed: ${ErrorHandler.describe(error)}`, { action }, { cause: error });
  }

  static describe(error: unknown): string {
    if (error instanceof PigeonError) {
      return `[${error.code}] ${error.message}`;
    }
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  static exitCode(error: unknown): number {
    if (error instanceof PigeonError && CONFIG_CODES.has(error.code)) {
      return 2;
    }
    return 1;
  }
}
