// Validators
export {
  validate,
  selectModes,
  runCommandOptionsSchema,
  inspectCommandOptionsSchema,
  modeOptionSchema,
  type RunCommandOptions,
  type InspectCommandOptions,
  type ValidationResult,
  type ValidationError,
} from './validators.js';

// Formatter
export {
  bold,
  dim,
  red,
  green,
  yellow,
  cyan,
  formatState,
  formatDuration,
  truncate,
  formatTable,
  formatArtifactList,
  formatVerifyOutcome,
  formatScenarioReport,
  toReportJson,
  formatSuccess,
  formatError,
  formatWarning,
  formatJson,
  print,
  printError,
  type TableColumn,
} from './formatter.js';

// CLI
export {
  createProgram,
  runCli,
  createRunCommand,
  createLocateCommand,
  createVerifyCommand,
} from './cli.js';
export { executeRun } from './commands/run.js';
