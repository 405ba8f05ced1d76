import { writeFile, rm } from 'fs/promises';
import { join } from 'path';
import type { DownloadsChoice, DryRunOutput, DryRunReport, RuleScan } from '../types.js';
import { errorCode, isNestedUnder } from '../utils/fs.js';

export const DRY_RUN_REPORT_FILE = 'dustpan-dry-run.txt';

export interface DryRunRenderOptions {
  /** Fallback for downloads scans that carry no choice of their own. */
  downloadsChoice?: DownloadsChoice;
}

/**
 * Directories in `dirs` that are not nested inside another entry of `dirs`,
 * in their original order.
 */
export function topLevelDirs(dirs: readonly string[]): string[] {
  return dirs.filter((dir) => !dirs.some((other) => isNestedUnder(dir, other)));
}

export function renderDryRun(scans: readonly RuleScan[], options: DryRunRenderOptions = {}): DryRunOutput {
  const report: DryRunReport = { filesListed: 0, dirsListed: 0, bytesListed: 0, errors: 0 };
  const lines: string[] = [
    'Dry-run details (no files will be deleted):',
    'Note: directories are only removed if empty after file removal.',
  ];

  for (const scan of scans) {
    lines.push(`Rule: ${scan.rule.label} (${scan.rule.id})`);

    if (scan.files.length === 0 && scan.dirs.length === 0) {
      lines.push('  (no entries)');
    } else if (scan.rule.kind === 'downloads' && (scan.downloadsChoice ?? options.downloadsChoice) === 'folders') {
      lines.push(...renderFolderSummary(scan));
    } else {
      for (const path of scan.files) lines.push(`  file: ${path}`);
      for (const path of scan.dirs) lines.push(`  dir: ${path}`);
    }

    for (const message of scan.errorMessages) {
      lines.push(`  error: ${message}`);
    }

    report.filesListed += scan.files.length;
    report.dirsListed += scan.dirs.length;
    report.bytesListed += scan.bytes;
    report.errors += scan.errors;
  }

  return { report, details: lines.join('\n') + '\n' };
}

function renderFolderSummary(scan: RuleScan): string[] {
  const tops = topLevelDirs(scan.dirs);
  if (tops.length === 0) {
    return scan.files.map((path) => `  file: ${path}`);
  }

  const lines: string[] = [];
  for (const path of scan.files) {
    if (!tops.some((top) => isNestedUnder(path, top))) {
      lines.push(`  file: ${path}`);
    }
  }
  for (const top of tops) {
    lines.push(`  dir: ${top}`);
    lines.push('    (contents omitted)');
  }
  return lines;
}

export function dryRunReportPath(home: string): string {
  return join(home, DRY_RUN_REPORT_FILE);
}

export async function writeDryRunReport(home: string, details: string): Promise<string> {
  const path = dryRunReportPath(home);
  await writeFile(path, details, 'utf-8');
  return path;
}

/**
 * Deletes a persisted report. Resolves to false when there was none.
 */
export async function removeDryRunReport(home: string): Promise<boolean> {
  const path = dryRunReportPath(home);
  try {
    await rm(path);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return false;
    throw error;
  }
}
