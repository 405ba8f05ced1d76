import chalk from 'chalk';
import ora from 'ora';
import confirm from '@inquirer/confirm';
import checkbox from '@inquirer/checkbox';
import select from '@inquirer/select';
import type { CleanReport, DownloadsChoice, Logger, Rule, RuleScan, ScanOptions } from '../types.js';
import { DOWNLOADS_CHOICES } from '../types.js';
import { scanRules } from '../scanners/index.js';
import { applyScans, removeDryRunReport, renderDryRun, writeDryRunReport } from '../cleaner/index.js';
import {
  availableRules,
  detectDistro,
  errorMessage,
  formatSize,
  isRoot,
  loadConfig,
  resolveHome,
} from '../utils/index.js';

export interface CleanCommandOptions {
  config?: string;
  dryRun?: boolean;
  sudo?: boolean;
  yes?: boolean;
  rule?: string[];
  listRules?: boolean;
  pick?: boolean;
  downloadsRemove?: DownloadsChoice;
  userHome?: string;
  verbose?: boolean;
  progress?: boolean;
}

export function parseDownloadsChoice(value: string): DownloadsChoice {
  const normalized = value.trim().toLowerCase();
  const choice = DOWNLOADS_CHOICES.find(
    (c) => c === normalized || c.slice(0, -1) === normalized || c[0] === normalized
  );
  if (!choice) {
    throw new Error(`Expected "archives" or "folders", got "${value}"`);
  }
  return choice;
}

export interface RuleSelection {
  rules: Rule[];
  unknown: string[];
}

/**
 * Rules named by `ids` (case-insensitive), or the default-enabled ones when
 * no ids are given.
 */
export function selectRules(available: readonly Rule[], ids: readonly string[] = []): RuleSelection {
  if (ids.length === 0) {
    return { rules: available.filter((rule) => rule.enabledByDefault), unknown: [] };
  }

  const wanted = ids.map((id) => id.toLowerCase());
  return {
    rules: available.filter((rule) => wanted.includes(rule.id.toLowerCase())),
    unknown: wanted.filter((id) => !available.some((rule) => rule.id.toLowerCase() === id)),
  };
}

export function formatRuleList(rules: readonly Rule[]): string[] {
  const lines = ['Available rules:'];
  for (const rule of rules) {
    const sudo = rule.requiresSudo ? ' (sudo)' : '';
    const enabled = rule.enabledByDefault ? ' [default]' : '';
    lines.push(`- ${rule.id}${sudo}${enabled}`);
    if (rule.description) {
      lines.push(`  ${rule.description}`);
    }
  }
  return lines;
}

export function formatPlan(scans: readonly RuleScan[]): string[] {
  const lines = ['Cleanup plan:'];
  let totalBytes = 0;
  let totalEntries = 0;
  for (const scan of scans) {
    totalBytes += scan.bytes;
    totalEntries += scan.entries;
    lines.push(`- ${scan.rule.label}: ${formatSize(scan.bytes)} (${scan.entries} items)`);
  }
  lines.push(`Total: ${formatSize(totalBytes)} across ${totalEntries} items`);
  return lines;
}

export async function cleanCommand(options: CleanCommandOptions): Promise<CleanReport | null> {
  const root = isRoot();
  const logger: Logger | undefined = options.verbose ? (message) => console.log(chalk.dim(message)) : undefined;

  const home = await resolveHome({ isRoot: root, override: options.userHome, env: process.env });
  if (!home) {
    return fail('Failed to resolve home directory (set HOME or pass --user-home)');
  }

  const config = await loadConfig(options.config, { home, env: process.env });
  const distro = await detectDistro();
  const available = availableRules(config, distro);
  logger?.(`[Config] ${config.rules.length} rules loaded, ${available.length} apply to ${distro.id ?? 'this system'}`);

  if (options.listRules) {
    console.log(formatRuleList(available).join('\n'));
    return null;
  }

  let rules: Rule[];
  if (options.pick) {
    rules = await pickRules(available);
  } else {
    const selection = selectRules(available, options.rule);
    if (selection.unknown.length > 0) {
      console.error(chalk.yellow(`Unknown rule ids: ${selection.unknown.join(', ')}`));
    }
    rules = selection.rules;
  }

  if (!options.sudo) {
    rules = rules.filter((rule) => !rule.requiresSudo);
  } else if (!root) {
    return fail('--sudo requires running as root (try: sudo dustpan clean --sudo)');
  }

  if (rules.length === 0) {
    console.log(chalk.yellow('No rules selected.'));
    return null;
  }

  let downloadsChoice: DownloadsChoice | undefined;
  if (rules.some((rule) => rule.kind === 'downloads')) {
    if (options.downloadsRemove) {
      downloadsChoice = options.downloadsRemove;
    } else if (options.yes) {
      return fail('Downloads cleanup requires --downloads-remove when using --yes');
    } else {
      downloadsChoice = await promptDownloadsChoice();
    }
  }

  const scanOptions: ScanOptions = { home, env: process.env, downloadsChoice, logger };
  const showProgress = (options.progress ?? true) && process.stdout.isTTY;
  const spinner = showProgress ? ora(`Scanning ${rules.length} rules...`).start() : null;

  const scans = await scanRules(rules, scanOptions, (completed, total, scan) => {
    if (spinner) spinner.text = `Scanned ${scan.rule.label} (${completed}/${total})`;
  });

  spinner?.stop();
  console.log(formatPlan(scans).join('\n'));

  if (options.dryRun) {
    await emitDryRun(scans, home, downloadsChoice);
    return null;
  }

  if (!options.yes) {
    const proceed = await confirm({
      message: options.sudo
        ? 'Sudo mode: permanently delete these files as root?'
        : 'Proceed with deletion?',
      default: false,
    });

    if (!proceed) {
      console.log(chalk.yellow('Canceled.'));
      return null;
    }
  }

  const report = await applyScans(scans, { logger });
  printCleanReport(report);

  try {
    if (await removeDryRunReport(home)) {
      logger?.('[Cleaner] Removed stale dry-run report');
    }
  } catch (error) {
    console.error(chalk.yellow(`Failed to remove stale dry-run report: ${errorMessage(error)}`));
  }

  return report;
}

async function pickRules(available: readonly Rule[]): Promise<Rule[]> {
  const ids = await checkbox<string>({
    message: 'Select rules to run (space to toggle, enter to confirm):',
    choices: available.map((rule) => ({
      name: `${rule.label.padEnd(28)} ${chalk.dim(rule.id)}${rule.requiresSudo ? chalk.red(' (sudo)') : ''}`,
      value: rule.id,
      checked: rule.enabledByDefault,
    })),
    pageSize: 15,
  });
  return available.filter((rule) => ids.includes(rule.id));
}

async function promptDownloadsChoice(): Promise<DownloadsChoice> {
  return select<DownloadsChoice>({
    message: 'Downloads cleanup: remove archives or extracted folders?',
    choices: [
      { name: 'Archives (keep the extracted folders)', value: 'archives' },
      { name: 'Folders (keep the archives)', value: 'folders' },
    ],
  });
}

async function emitDryRun(scans: RuleScan[], home: string, downloadsChoice?: DownloadsChoice): Promise<void> {
  const { report, details } = renderDryRun(scans, { downloadsChoice });
  process.stdout.write(details);

  try {
    const path = await writeDryRunReport(home, details);
    console.log(chalk.cyan(`Dry-run report saved to ${path}`));
  } catch (error) {
    console.error(chalk.red(`Failed to write dry-run report: ${errorMessage(error)}`));
  }

  console.log(`Dry-run listed ${report.filesListed} files and ${report.dirsListed} directories`);
  console.log(`Would free ${chalk.green(formatSize(report.bytesListed))}`);
  if (report.errors > 0) {
    console.log(chalk.red(`Errors encountered: ${report.errors}`));
  }
}

function printCleanReport(report: CleanReport): void {
  console.log();
  console.log(chalk.bold.green('✓ Cleaning Complete'));
  console.log(chalk.dim('─'.repeat(50)));
  console.log(`Removed ${report.filesRemoved} files and ${report.dirsRemoved} directories`);
  console.log(chalk.bold(`Freed: ${chalk.green(formatSize(report.bytesFreed))}`));
  if (report.errors > 0) {
    console.log(chalk.red(`Errors encountered: ${report.errors}`));
  }
  console.log();
}

function fail(message: string): null {
  console.error(chalk.red(message));
  process.exitCode = 1;
  return null;
}
