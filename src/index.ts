export * from './types.js';
export { scanRule, scanRules, getScanner, RULE_SCANNERS } from './scanners/index.js';
export {
  applyScans,
  renderDryRun,
  writeDryRunReport,
  removeDryRunReport,
  dryRunReportPath,
  topLevelDirs,
} from './cleaner/index.js';
export {
  compileExcludes,
  expandPath,
  expandedPaths,
  loadConfig,
  parseConfig,
  availableRules,
  clearConfigCache,
  ConfigError,
  detectDistro,
  parseOsRelease,
  resolveHome,
  formatSize,
} from './utils/index.js';
