import type { Rule, RuleScan } from '../types.js';

export function createRuleScan(rule: Rule): RuleScan {
  return {
    rule: structuredClone(rule),
    bytes: 0,
    entries: 0,
    files: [],
    dirs: [],
    errors: 0,
    errorMessages: [],
  };
}

export function recordFile(scan: RuleScan, path: string, size: number): void {
  scan.files.push(path);
  scan.bytes += size;
  scan.entries++;
}

export function recordDir(scan: RuleScan, path: string): void {
  scan.dirs.push(path);
}

export function recordError(scan: RuleScan, message: string): void {
  scan.errors++;
  scan.errorMessages.push(message);
}
