#!/usr/bin/env tsx

import 'dotenv/config';
import chalk from 'chalk';
import { CommanderError } from 'commander';
import { ErrorHandler } from '@pigeonpost/utils';
import { createProgram } from './program.js';

const program = createProgram();

// Error handling
try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    // commander has already printed its own message
    if (error.code === 'commander.unknownCommand') {
      console.log(chalk.yellow('Run "pigeonpost --help" for available commands'));
    }
    process.exit(error.exitCode);
  }

  console.error(chalk.red(`Error: ${ErrorHandler.describe(error)}`));
  process.exit(ErrorHandler.exitCode(error));
}
