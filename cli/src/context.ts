import { loadConfig, type ConfigManager } from '@pigeonpost/utils';
import { ImageGenerator, MastodonClient, MastodonPublisher } from '@pigeonpost/sdk';
import type { ImageSource, Publisher } from '@pigeonpost/sdk';

/**
 * What commands need from the outside world. Clients are built lazily so a
 * command only demands the credentials it actually uses.
 */
export interface CommandContext {
  config: ConfigManager;
  imageGenerator(): ImageSource;
  mastodonClient(): MastodonClient;
  publisher(): Publisher;
}

export function createContext(env: Record<string, string | undefined> = process.env): CommandContext {
  const config = loadConfig(env);
  const mastodonClient = () => new MastodonClient(config.requireMastodon());

  return {
    config,
    imageGenerator: () => new ImageGenerator(config.requireOpenAI()),
    mastodonClient,
    publisher: () => new MastodonPublisher(mastodonClient()),
  };
}
