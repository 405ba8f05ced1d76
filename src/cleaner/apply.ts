import { lstat, rmdir, unlink } from 'fs/promises';
import type { ApplyOptions, CleanReport, RuleScan } from '../types.js';
import { errorMessage, isNotFound, pathDepth } from '../utils/fs.js';

export function emptyCleanReport(): CleanReport {
  return { filesRemoved: 0, dirsRemoved: 0, bytesFreed: 0, errors: 0 };
}

/**
 * Deletes everything the scans recorded. Files go first, then each scan's
 * directories deepest-first, and only while empty. Paths that are already
 * gone are skipped; any other failure is counted and the sweep continues.
 */
export async function applyScans(scans: readonly RuleScan[], options: ApplyOptions = {}): Promise<CleanReport> {
  const report = emptyCleanReport();

  for (const scan of scans) {
    await removeFiles(scan, report, options);
    await removeDirs(scan, report, options);
  }

  return report;
}

async function removeFiles(scan: RuleScan, report: CleanReport, options: ApplyOptions): Promise<void> {
  for (const path of scan.files) {
    let size: number;
    try {
      size = (await lstat(path)).size;
    } catch (error) {
      if (isNotFound(error)) continue;
      report.errors++;
      options.logger?.(`[Cleaner] Cannot stat ${path}: ${errorMessage(error)}`);
      continue;
    }

    try {
      await unlink(path);
      report.filesRemoved++;
      report.bytesFreed += size;
    } catch (error) {
      if (isNotFound(error)) continue;
      report.errors++;
      options.logger?.(`[Cleaner] Failed to remove ${path}: ${errorMessage(error)}`);
    }
  }
}

async function removeDirs(scan: RuleScan, report: CleanReport, options: ApplyOptions): Promise<void> {
  const dirs = [...scan.dirs].sort((a, b) => pathDepth(b) - pathDepth(a));

  for (const dir of dirs) {
    try {
      await rmdir(dir);
      report.dirsRemoved++;
    } catch (error) {
      if (isNotFound(error)) continue;
      report.errors++;
      options.logger?.(`[Cleaner] Failed to remove directory ${dir}: ${errorMessage(error)}`);
    }
  }
}
