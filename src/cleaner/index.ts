export { applyScans, emptyCleanReport } from './apply.js';
export {
  renderDryRun,
  topLevelDirs,
  writeDryRunReport,
  removeDryRunReport,
  dryRunReportPath,
  DRY_RUN_REPORT_FILE,
  type DryRunRenderOptions,
} from './dry-run.js';
