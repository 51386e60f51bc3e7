import path from 'path';
import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';
import { ErrorHandler, logger } from '@pigeonpost/utils';
import { Gallery, buildPrompt, decodeImage } from '@pigeonpost/sdk';
import type { PublishResult } from '@pigeonpost/sdk';
import { createContext, type CommandContext } from '../context.js';

export interface PostOptions {
  yes?: boolean;
}

export async function postCommand(
  file: string,
  options: PostOptions,
  context: CommandContext = createContext()
): Promise<PublishResult | undefined> {
  const filepath = path.resolve(file);
  const adjective = path.basename(filepath, path.extname(filepath));
  const publisher = context.publisher();

  const gallery = new Gallery(path.dirname(filepath));
  const image = await decodeImage(await gallery.read(filepath));

  if (!options.yes) {
    const answer = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: `Post the ${adjective} pigeon (${image.width}x${image.height}) to Mastodon?`,
        default: false,
      },
    ]);
    if (!answer.confirm) {
      console.log(chalk.yellow('Post cancelled'));
      return undefined;
    }
  }

  const spinner = ora();
  spinner.start(`Posting ${adjective} pigeon...`);

  try {
    const result = await publisher.publish({ adjective, prompt: buildPrompt(adjective), data: image.data });
    spinner.succeed(chalk.green(`Posted ${adjective} pigeon`));
    console.log(chalk.cyan(`  ${result.url ?? result.id}`));
    return result;
  } catch (error) {
    spinner.fail(chalk.red('Post failed'));
    logger.debug('Post error', { error: ErrorHandler.describe(error), stack: error instanceof Error ? error.stack : undefined });
    throw error;
  }
}
