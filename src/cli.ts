#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { cleanCommand, parseDownloadsChoice, type CleanCommandOptions } from './commands/clean.js';
import { reportCommand, type ReportCommandOptions } from './commands/report.js';
import type { DownloadsChoice } from './types.js';
import { ConfigError, errorMessage } from './utils/index.js';

const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

const downloadsChoice = (value: string): DownloadsChoice => {
  try {
    return parseDownloadsChoice(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
};

const program = new Command();

program
  .name('dustpan')
  .description('Rule-driven cleanup of caches, logs and stale downloads')
  .version('0.1.0');

program
  .command('clean')
  .description('Scan the selected rules and delete what they match')
  .option('--config <path>', 'path to a JSON rules file')
  .option('--dry-run', 'preview the cleanup and save a report without deleting')
  .option('--sudo', 'include rules that require root')
  .option('-y, --yes', 'skip the confirmation prompt')
  .option('--rule <id>', 'limit to a rule id (repeatable)', collect)
  .option('--list-rules', 'list available rules and exit')
  .option('--pick', 'choose rules interactively')
  .option('--downloads-remove <choice>', 'remove "archives" or "folders" from Downloads pairs', downloadsChoice)
  .option('--user-home <path>', 'home directory to expand rule paths against')
  .option('--no-progress', 'disable the scan spinner')
  .option('-v, --verbose', 'log scanner and cleaner activity')
  .action(async (options: CleanCommandOptions) => {
    await cleanCommand(options);
  });

program
  .command('report')
  .description('Show or remove the saved dry-run report')
  .option('--remove', 'delete the saved report')
  .option('--user-home <path>', 'home directory the report lives in')
  .action(async (options: ReportCommandOptions) => {
    await reportCommand(options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`[Config] ${error.message}`));
  } else {
    console.error(chalk.red('Error:'), error);
  }
  process.exitCode = 1;
});
