import chalk from 'chalk';
import { dryRunReportPath, removeDryRunReport } from '../cleaner/index.js';
import { isRoot, resolveHome } from '../utils/index.js';

export interface ReportCommandOptions {
  remove?: boolean;
  userHome?: string;
}

export async function reportCommand(options: ReportCommandOptions): Promise<void> {
  const home = await resolveHome({ isRoot: isRoot(), override: options.userHome, env: process.env });
  if (!home) {
    console.error(chalk.red('Failed to resolve home directory (set HOME or pass --user-home)'));
    process.exitCode = 1;
    return;
  }

  if (!options.remove) {
    console.log(dryRunReportPath(home));
    return;
  }

  if (await removeDryRunReport(home)) {
    console.log(chalk.green(`✓ Removed ${dryRunReportPath(home)}`));
  } else {
    console.log(chalk.dim('No dry-run report to remove.'));
  }
}
