export type RuleKind = 'paths' | 'downloads' | 'logs';

export const RULE_KINDS: readonly RuleKind[] = ['paths', 'downloads', 'logs'];

export type DownloadsChoice = 'archives' | 'folders';

export const DOWNLOADS_CHOICES: readonly DownloadsChoice[] = ['archives', 'folders'];

export interface Rule {
  readonly id: string;
  readonly label: string;
  readonly description?: string;
  readonly kind: RuleKind;
  readonly paths: readonly string[];
  readonly requiresSudo: boolean;
  readonly enabledByDefault: boolean;
  readonly distros: readonly string[];
  readonly excludeGlobs: readonly string[];
  /** Only read by `logs` rules. */
  readonly olderThanDays?: number;
}

export interface RuleScan {
  rule: Rule;
  bytes: number;
  entries: number;
  files: string[];
  dirs: string[];
  errors: number;
  errorMessages: string[];
  /** Set by downloads scans to the policy they were run with. */
  downloadsChoice?: DownloadsChoice;
}

export interface CleanReport {
  filesRemoved: number;
  dirsRemoved: number;
  bytesFreed: number;
  errors: number;
}

export interface DryRunReport {
  filesListed: number;
  dirsListed: number;
  bytesListed: number;
  errors: number;
}

export interface DryRunOutput {
  report: DryRunReport;
  details: string;
}

export type Logger = (message: string) => void;

export interface PathContext {
  home: string;
  env?: Readonly<Record<string, string | undefined>>;
}

export interface ScanOptions extends PathContext {
  downloadsChoice?: DownloadsChoice;
  /** Reference instant for log age filtering. Defaults to the current time. */
  now?: Date;
  logger?: Logger;
}

export interface ApplyOptions {
  logger?: Logger;
}

export type RuleScanner = (rule: Rule, options: ScanOptions) => Promise<RuleScan>;
