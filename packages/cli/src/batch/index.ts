export {
  BatchRunner,
  OUTCOME_CATEGORIES,
  RATE_LIMIT_HINT,
  categoryOf,
  createEmptyReport,
  summarizeReport,
  type BatchReport,
  type BatchCheckEvent,
  type BatchProgressEvent,
  type BatchRunnerOptions,
  type BatchSummary,
  type OutcomeCategory,
} from './runner.js';
export {
  STDIN_SOURCE,
  loadCodeList,
  parseCodeList,
  readCodeFile,
  type CodeList,
  type MalformedLine,
} from './input.js';
export {
  defaultReportFilename,
  formatReport,
  resolveReportPath,
  writeReport,
} from './report.js';
