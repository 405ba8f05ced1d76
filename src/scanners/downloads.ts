import { lstat, readdir } from 'fs/promises';
import type { Stats } from 'fs';
import { join } from 'path';
import type { DownloadsChoice, Rule, RuleScan, ScanOptions } from '../types.js';
import { errorMessage, isNotFound } from '../utils/fs.js';
import { expandedPaths } from '../utils/paths.js';
import { createRuleScan, recordDir, recordError, recordFile } from './scan-result.js';
import { walkRoot } from './walker.js';

export const ARCHIVE_EXTENSIONS = ['.tar.gz', '.tgz', '.tar.xz', '.tar.zst', '.zip', '.7z', '.rar'] as const;

interface ArchiveCandidate {
  base: string;
  path: string;
  size: number;
}

/**
 * Name of the folder an archive would extract to, or null when `fileName`
 * is not an archive (or is nothing but the extension).
 */
export function archiveBaseName(fileName: string): string | null {
  const lower = fileName.toLowerCase();
  for (const ext of ARCHIVE_EXTENSIONS) {
    if (lower.endsWith(ext)) {
      const base = fileName.slice(0, fileName.length - ext.length);
      return base === '' ? null : base;
    }
  }
  return null;
}

export async function scanDownloadsRule(rule: Rule, options: ScanOptions): Promise<RuleScan> {
  const scan = createRuleScan(rule);
  const choice = options.downloadsChoice;

  if (!choice) {
    options.logger?.(`[Scanner] ${rule.id}: no downloads choice given, skipping`);
    return scan;
  }

  scan.downloadsChoice = choice;

  for (const root of expandedPaths(rule, options)) {
    await scanDownloadsRoot(root, choice, scan, options);
  }

  return scan;
}

async function scanDownloadsRoot(
  root: string,
  choice: DownloadsChoice,
  scan: RuleScan,
  options: ScanOptions
): Promise<void> {
  let rootStats: Stats;
  try {
    rootStats = await lstat(root);
  } catch (error) {
    if (!isNotFound(error)) {
      recordError(scan, `Failed to read ${root}: ${errorMessage(error)}`);
    }
    return;
  }
  if (rootStats.isSymbolicLink() || !rootStats.isDirectory()) return;

  let names: string[];
  try {
    names = await readdir(root);
  } catch (error) {
    recordError(scan, `Failed to read directory ${root}: ${errorMessage(error)}`);
    return;
  }
  names.sort();

  const archives: ArchiveCandidate[] = [];
  const folders = new Map<string, string>();

  for (const name of names) {
    const path = join(root, name);
    let stats: Stats;
    try {
      stats = await lstat(path);
    } catch (error) {
      recordError(scan, `Failed to read ${path}: ${errorMessage(error)}`);
      continue;
    }

    if (stats.isSymbolicLink()) continue;
    if (stats.isDirectory()) {
      folders.set(name, path);
      continue;
    }
    if (!stats.isFile()) continue;

    const base = archiveBaseName(name);
    if (base !== null) {
      archives.push({ base, path, size: stats.size });
    }
  }

  const walked = new Set<string>();

  for (const archive of archives) {
    const folder = folders.get(archive.base);
    if (folder === undefined) continue;

    if (choice === 'archives') {
      recordFile(scan, archive.path, archive.size);
      continue;
    }

    if (walked.has(folder)) continue;
    walked.add(folder);
    options.logger?.(`[Scanner] ${scan.rule.id}: ${archive.path} pairs with ${folder}`);
    await walkRoot(folder, scan, { logger: options.logger });
    recordDir(scan, folder);
  }
}
