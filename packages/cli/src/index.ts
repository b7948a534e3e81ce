export { createProgram, run, CLI_NAME, CLI_VERSION } from './cli.js';
export type { CliDependencies, GlobalOptions } from './cli.js';
export {
  CliError,
  EXIT_CODES,
  isCliError,
  toCliError,
  usageError,
  configError,
} from './errors.js';
export type { ExitCode, StructuredError } from './errors.js';
export { executeRunCommand } from './commands/run.js';
export type { RunOptions, RunOutcome } from './commands/run.js';
export { executeReportCommand } from './commands/report.js';
export type { ReportOptions } from './commands/report.js';
export { executeModelsCommand, collectModelStatus } from './commands/models.js';
export type { ModelStatus } from './commands/models.js';
