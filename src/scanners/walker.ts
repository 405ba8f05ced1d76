import { lstat, readdir } from 'fs/promises';
import type { Stats } from 'fs';
import { join, relative } from 'path';
import type { Logger, RuleScan } from '../types.js';
import type { ExcludeMatcher } from '../utils/glob.js';
import { errorMessage, isNotFound } from '../utils/fs.js';
import { recordDir, recordError, recordFile } from './scan-result.js';

export interface WalkOptions {
  exclude?: ExcludeMatcher | null;
  /** Extra filter for file entries; rejected files are left out silently. */
  acceptFile?: (path: string, stats: Stats) => boolean;
  /** Record directories found below the root (default true). */
  recordDirs?: boolean;
  logger?: Logger;
}

interface WalkState {
  root: string;
  device: number;
  scan: RuleScan;
  options: WalkOptions;
}

/**
 * Records everything below `root` into `scan`. The root itself is never
 * recorded unless it is a file or symlink, in which case it is the only
 * entry. Symlinks below the root are skipped and the walk stays on the
 * root's device.
 */
export async function walkRoot(root: string, scan: RuleScan, options: WalkOptions = {}): Promise<void> {
  let stats: Stats;
  try {
    stats = await lstat(root);
  } catch (error) {
    if (isNotFound(error)) return;
    recordError(scan, `Failed to read ${root}: ${errorMessage(error)}`);
    return;
  }

  if (stats.isFile() || stats.isSymbolicLink()) {
    // Relative to itself the root is the empty path.
    if (options.exclude?.matches('')) return;
    if (options.acceptFile && !options.acceptFile(root, stats)) return;
    recordFile(scan, root, stats.size);
    return;
  }

  if (!stats.isDirectory()) return;

  await walkDirectory(root, { root, device: stats.dev, scan, options });
}

async function walkDirectory(dir: string, state: WalkState): Promise<void> {
  const { scan, options } = state;

  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    recordError(scan, `Failed to read directory ${dir}: ${errorMessage(error)}`);
    return;
  }
  names.sort();

  for (const name of names) {
    const path = join(dir, name);
    if (options.exclude?.matches(relative(state.root, path))) continue;

    let stats: Stats;
    try {
      stats = await lstat(path);
    } catch (error) {
      const reason = isNotFound(error) ? 'vanished during scan' : errorMessage(error);
      recordError(scan, `Failed to read ${path}: ${reason}`);
      continue;
    }

    if (stats.isSymbolicLink()) continue;

    if (stats.isDirectory()) {
      if (stats.dev !== state.device) {
        options.logger?.(`[Scanner] Not crossing into mount point ${path}`);
        continue;
      }
      if (options.recordDirs ?? true) recordDir(scan, path);
      await walkDirectory(path, state);
      continue;
    }

    if (options.acceptFile && !options.acceptFile(path, stats)) continue;
    recordFile(scan, path, stats.size);
  }
}
