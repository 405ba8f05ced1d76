import type { Rule, RuleScan, ScanOptions } from '../types.js';
import { compileExcludes } from '../utils/glob.js';
import { expandedPaths } from '../utils/paths.js';
import { createRuleScan, recordError } from './scan-result.js';
import { walkRoot } from './walker.js';

export async function scanPathsRule(rule: Rule, options: ScanOptions): Promise<RuleScan> {
  const scan = createRuleScan(rule);

  const { matcher, errors } = compileExcludes(rule.excludeGlobs);
  for (const message of errors) {
    recordError(scan, `${rule.id}: ${message}`);
  }

  for (const root of expandedPaths(rule, options)) {
    options.logger?.(`[Scanner] ${rule.id}: walking ${root}`);
    await walkRoot(root, scan, { exclude: matcher, logger: options.logger });
  }

  return scan;
}
