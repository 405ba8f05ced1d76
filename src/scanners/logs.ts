import type { Stats } from 'fs';
import { basename } from 'path';
import type { Rule, RuleScan, ScanOptions } from '../types.js';
import { compileExcludes } from '../utils/glob.js';
import { expandedPaths } from '../utils/paths.js';
import { createRuleScan, recordError } from './scan-result.js';
import { walkRoot } from './walker.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export function isLogFileName(name: string): boolean {
  const lower = name.toLowerCase();
  return (
    lower === 'xsession-errors' ||
    lower.startsWith('xsession-errors.') ||
    lower.endsWith('.log') ||
    lower.includes('.log.') ||
    lower.endsWith('.err') ||
    lower.endsWith('.error')
  );
}

/**
 * Latest modification time (ms since epoch) a file may have to count as
 * older than `days`. Never earlier than the epoch.
 */
export function ageCutoff(now: Date, days: number): number {
  return Math.max(0, now.getTime() - days * DAY_MS);
}

export async function scanLogsRule(rule: Rule, options: ScanOptions): Promise<RuleScan> {
  const scan = createRuleScan(rule);

  const { matcher, errors } = compileExcludes(rule.excludeGlobs);
  for (const message of errors) {
    recordError(scan, `${rule.id}: ${message}`);
  }

  const cutoff = rule.olderThanDays === undefined
    ? null
    : ageCutoff(options.now ?? new Date(), rule.olderThanDays);

  const acceptFile = (path: string, stats: Stats): boolean => {
    if (!stats.isFile()) return false;
    if (!isLogFileName(basename(path))) return false;
    return cutoff === null || stats.mtimeMs <= cutoff;
  };

  for (const root of expandedPaths(rule, options)) {
    options.logger?.(`[Scanner] ${rule.id}: collecting logs under ${root}`);
    await walkRoot(root, scan, {
      exclude: matcher,
      acceptFile,
      recordDirs: false,
      logger: options.logger,
    });
  }

  return scan;
}
