import { readFileSync } from 'fs';
import { Command } from 'commander';
import { loadConfig, logger } from '@pigeonpost/utils';
import { generateCommand, type GenerateOptions } from './commands/generate.js';
import { postCommand, type PostOptions } from './commands/post.js';
import { doctorCommand, DEFAULT_WORKFLOW_PATH, type DoctorOptions, type DoctorReport } from './commands/doctor.js';

export interface CommandActions {
  generate: (options: GenerateOptions) => Promise<unknown>;
  post: (file: string, options: PostOptions) => Promise<unknown>;
  doctor: (options: DoctorOptions) => Promise<DoctorReport>;
}

const defaultActions: CommandActions = {
  generate: (options) => generateCommand(options),
  post: (file, options) => postCommand(file, options),
  doctor: (options) => doctorCommand(options),
};

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string' ? pkg.version : '0.0.0';
}

export function createProgram(actions: CommandActions = defaultActions): Command {
  const program = new Command();

  program
    .name('pigeonpost')
    .description('Draw a New York City pigeon with a random adjective and share it')
    .version(readVersion())
    .option('-v, --verbose', 'Enable verbose logging')
    // Throw instead of exiting; subcommands inherit this when they are created
    .exitOverride()
    .hook('preAction', (thisCommand) => {
      const { verbose } = thisCommand.opts<{ verbose?: boolean }>();
      logger.setLevel(verbose ? 'debug' : loadConfig().env.LOG_LEVEL);
    });

  // Generate a new pigeon (runs when no command is given)
  program
    .command('generate', { isDefault: true })
    .description('Generate an image for an adjective that has none yet')
    .option('-o, --output <dir>', 'Image directory (default: $PIGEONPOST_OUTPUT_DIR or ./img/)')
    .option('-a, --adjective <word>', 'Use this adjective instead of a random one')
    .option('--post', 'Publish the image to Mastodon after saving it')
    .option('--dry-run', 'Pick the adjective and print the prompt without calling any API')
    .action(async (options: GenerateOptions) => {
      await actions.generate(options);
    });

  // Publish an existing image
  program
    .command('post <file>')
    .description('Publish an existing image to Mastodon')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (file: string, options: PostOptions) => {
      await actions.post(file, options);
    });

  // Configuration health check
  program
    .command('doctor')
    .description('Check credentials and the CI workflow definition')
    .option('-w, --workflow <path>', 'Workflow file to inspect', DEFAULT_WORKFLOW_PATH)
    .option('--online', 'Also verify Mastodon credentials against the server')
    .action(async (options: DoctorOptions) => {
      const report = await actions.doctor(options);
      if (report.failures > 0) {
        process.exitCode = 1;
      }
    });

  return program;
}
