import type { Rule, RuleKind, RuleScan, RuleScanner, ScanOptions } from '../types.js';
import { scanPathsRule } from './paths.js';
import { scanDownloadsRule } from './downloads.js';
import { scanLogsRule } from './logs.js';

export const RULE_SCANNERS: Record<RuleKind, RuleScanner> = {
  paths: scanPathsRule,
  downloads: scanDownloadsRule,
  logs: scanLogsRule,
};

export function getScanner(kind: RuleKind): RuleScanner {
  return RULE_SCANNERS[kind];
}

export async function scanRule(rule: Rule, options: ScanOptions): Promise<RuleScan> {
  const scan = await getScanner(rule.kind)(rule, options);
  options.logger?.(
    `[Scanner] ${rule.id}: ${scan.files.length} files, ${scan.dirs.length} dirs, ${scan.bytes} bytes, ${scan.errors} errors`
  );
  return scan;
}

/**
 * Scans rules one after another, in order.
 */
export async function scanRules(
  rules: readonly Rule[],
  options: ScanOptions,
  onProgress?: (completed: number, total: number, scan: RuleScan) => void
): Promise<RuleScan[]> {
  const scans: RuleScan[] = [];
  for (const rule of rules) {
    const scan = await scanRule(rule, options);
    scans.push(scan);
    onProgress?.(scans.length, rules.length, scan);
  }
  return scans;
}

export { scanPathsRule, scanDownloadsRule, scanLogsRule };
export { walkRoot } from './walker.js';
export { archiveBaseName, ARCHIVE_EXTENSIONS } from './downloads.js';
export { isLogFileName, ageCutoff } from './logs.js';
