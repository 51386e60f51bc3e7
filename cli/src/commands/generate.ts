import chalk from 'chalk';
import ora from 'ora';
import { ErrorHandler, logger } from '@pigeonpost/utils';
import { Gallery, PigeonPipeline } from '@pigeonpost/sdk';
import type { RunResult } from '@pigeonpost/sdk';
import { createContext, type CommandContext } from '../context.js';

export interface GenerateOptions {
  output?: string;
  adjective?: string;
  post?: boolean;
  dryRun?: boolean;
}

export async function generateCommand(options: GenerateOptions, context: CommandContext = createContext()): Promise<RunResult> {
  const gallery = new Gallery(options.output ?? context.config.outputDir);

  // Resolve credentials before any work starts
  const pipeline = new PigeonPipeline({
    gallery,
    generator: options.dryRun ? undefined : context.imageGenerator(),
    publisher: options.post && !options.dryRun ? context.publisher() : undefined,
  });

  const spinner = ora();
  spinner.start(options.dryRun ? 'Picking a pigeon...' : 'Drawing a pigeon...');

  try {
    const result = await pipeline.run({
      adjective: options.adjective,
      post: options.post,
      dryRun: options.dryRun,
    });

    if (options.dryRun) {
      spinner.succeed(chalk.green(`Dry run: would draw a ${result.adjective} pigeon`));
      console.log(chalk.gray(result.prompt));
      return result;
    }

    spinner.succeed(chalk.green(`Saved ${result.adjective} pigeon`));
    console.log(chalk.cyan(`  ${result.filepath}`));
    if (result.status) {
      console.log(chalk.cyan(`  ${result.status.url ?? result.status.id}`));
    }
    return result;
  } catch (error) {
    spinner.fail(chalk.red('Generation failed'));
    logger.debug('Generate error', { error: ErrorHandler.describe(error), stack: error instanceof Error ? error.stack : undefined });
    throw error;
  }
}
