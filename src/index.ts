#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { bundleCommand, pageCommand, summaryCommand } from './commands/index.js';
import { handleError } from './errors.js';
import { VERSION, DESCRIPTION, APP_NAME } from './constants.js';

const program = new Command();

program
  .name(APP_NAME)
  .description(DESCRIPTION)
  .version(VERSION, '-v, --version', 'Display version number')
  .configureOutput({
    outputError: (str, write) => write(chalk.red(str)),
  })
  .helpOption('-h, --help', 'Display this help message')
  .showHelpAfterError(false);

// Register commands
program.addCommand(bundleCommand);
program.addCommand(pageCommand);
program.addCommand(summaryCommand);

// Global error handling
process.on('uncaughtException', handleError);
process.on('unhandledRejection', (reason) => {
  handleError(reason instanceof Error ? reason : new Error(String(reason)));
});

// Parse and execute
program.parseAsync(process.argv).catch(handleError);
