import { z } from 'zod';
import { PigeonError } from './error-handler.js';

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const withDefault = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_IMAGE_MODEL: withDefault(z.string().default('dall-e-3')),
  MASTODON_CLIENT_KEY: optionalString,
  MASTODON_CLIENT_SECRET: optionalString,
  MASTODON_ACCESS_TOKEN: optionalString,
  MASTODON_API_BASE_URL: withDefault(z.string().url('must be a URL').default('https://mastodon.social')),
  PIGEONPOST_OUTPUT_DIR: withDefault(z.string().default('./img/')),
  PIGEONPOST_TIMEOUT_MS: withDefault(z.coerce.number().int().positive().default(120_000)),
  PIGEONPOST_RETRY_ATTEMPTS: withDefault(z.coerce.number().int().min(0).default(2)),
  LOG_LEVEL: withDefault(z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info')),
});

export type Env = z.infer<typeof envSchema>;

export interface OpenAIConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface MastodonConfig {
  baseUrl: string;
  clientKey: string;
  clientSecret: string;
  accessToken: string;
  timeoutMs: number;
}

/** Variables the CI workflow injects as secrets. */
export const REQUIRED_SECRETS = [
  'OPENAI_API_KEY',
  'MASTODON_CLIENT_KEY',
  'MASTODON_CLIENT_SECRET',
  'MASTODON_ACCESS_TOKEN',
] as const;

export type SecretName = (typeof REQUIRED_SECRETS)[number];

const MASTODON_SECRETS = ['MASTODON_CLIENT_KEY', 'MASTODON_CLIENT_SECRET', 'MASTODON_ACCESS_TOKEN'] as const;

export class ConfigManager {
  constructor(readonly env: Env) {}

  get outputDir(): string {
    return this.env.PIGEONPOST_OUTPUT_DIR;
  }

  get timeoutMs(): number {
    return this.env.PIGEONPOST_TIMEOUT_MS;
  }

  requireOpenAI(): OpenAIConfig {
    const apiKey = this.env.OPENAI_API_KEY;
    if (apiKey === undefined) {
      throw missing(['OPENAI_API_KEY']);
    }
    return {
      apiKey,
      model: this.env.OPENAI_IMAGE_MODEL,
      timeoutMs: this.env.PIGEONPOST_TIMEOUT_MS,
      maxRetries: this.env.PIGEONPOST_RETRY_ATTEMPTS,
    };
  }

  requireMastodon(): MastodonConfig {
    const { MASTODON_CLIENT_KEY: clientKey, MASTODON_CLIENT_SECRET: clientSecret, MASTODON_ACCESS_TOKEN: accessToken } = this.env;
    if (clientKey === undefined || clientSecret === undefined || accessToken === undefined) {
      throw missing(MASTODON_SECRETS.filter((name) => this.env[name] === undefined));
    }
    return {
      baseUrl: this.env.MASTODON_API_BASE_URL.replace(/\/+$/, ''),
      clientKey,
      clientSecret,
      accessToken,
      timeoutMs: this.env.PIGEONPOST_TIMEOUT_MS,
    };
  }

  /** Set/unset per secret. Values never leave this object. */
  describe(): Array<{ name: SecretName; set: boolean }> {
    return REQUIRED_SECRETS.map((name) => ({ name, set: this.env[name] !== undefined }));
  }
}

function missing(names: readonly string[]): PigeonError {
  return new PigeonError('CONFIG_MISSING', `Missing environment variables: ${names.join(', ')}`, { missing: [...names] });
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ConfigManager {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new PigeonError('CONFIG_INVALID', `Invalid configuration: ${problems.join('; ')}`, {
      variables: result.error.issues.map((issue) => issue.path.join('.')),
    });
  }
  return new ConfigManager(result.data);
}
