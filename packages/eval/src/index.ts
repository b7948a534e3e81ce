// Types
export {
  DIMENSION_NAMES,
  isDimensionName,
  isFailureRecord,
} from './types.js';
export type {
  DimensionName,
  TestCase,
  TestSuite,
  TokenUsage,
  ModelSuccess,
  ModelFailure,
  ModelResponse,
  DimensionCriterion,
  EvaluationCriteria,
  LanguageAbilityScores,
  TeachingAdaptabilityScores,
  ResponsePerformanceScores,
  SafetyComplianceScores,
  CostEfficiencyScores,
  DimensionScores,
  EvaluationSuccessRecord,
  EvaluationFailureRecord,
  EvaluationRecord,
  ResultsDocument,
  ChatMessage,
} from './types.js';

// Lexicon
export {
  LexiconError,
  parseLexicon,
  loadLexicon,
  defaultLexicon,
} from './lexicon.js';
export type { Lexicon } from './lexicon.js';

// Evaluator
export {
  Evaluator,
  calculateTotalScore,
  DEFAULT_SCORING_METHOD,
} from './evaluator.js';
export type { EvaluatorOptions, TotalScore } from './evaluator.js';

// Aggregation & reports
export {
  aggregateByModel,
  summarizeModel,
  rankModels,
  groupByTestCase,
  dimensionColumns,
} from './aggregator.js';
export type { ModelStats, ModelSummary, MetricColumn } from './aggregator.js';
export { renderGridTable } from './table.js';
export type { TableCell } from './table.js';
export {
  ReportGenerator,
  NO_RESULTS,
  SUMMARY_REPORT_FILE,
  DETAILED_REPORT_FILE,
} from './report-generator.js';
export type { ReportGeneratorOptions, SavedReports } from './report-generator.js';
export {
  buildExportTable,
  writeSpreadsheet,
  loadExcelWorkbook,
  SPREADSHEET_FILE,
} from './spreadsheet.js';
export type {
  ExportTable,
  WorkbookLike,
  SheetLike,
  WorkbookLoader,
} from './spreadsheet.js';

// Results store
export {
  createResultsDocument,
  saveResults,
  loadResults,
  parseResultsDocument,
  ResultsShapeError,
} from './results-store.js';

// Config
export {
  resolveConfigPaths,
  loadTestSuite,
  loadCriteria,
  loadModelsConfig,
  ConfigEntryError,
} from './config.js';
export type { ConfigPaths } from './config.js';

// Providers
export { PROVIDER_NAMES, isProviderName } from './providers/types.js';
export type {
  ProviderName,
  ModelConfig,
  ModelsConfig,
  ChatOptions,
  ConfigCheck,
  ModelClient,
} from './providers/types.js';
export {
  createModelClient,
  resolveCredentials,
  getProviderProfile,
  listProviders,
} from './providers/registry.js';
export type {
  ProviderProfile,
  ClientDependencies,
} from './providers/registry.js';
export { OpenAICompatibleClient } from './providers/openai-compatible.js';
export { ErnieClient } from './providers/ernie.js';

// Runner
export { TestRunner, TUTOR_SYSTEM_PROMPT } from './runner.js';
export type {
  TestRunnerOptions,
  RunSelection,
  RunProgressEvent,
} from './runner.js';

// Logger
export { logger, configureLogger, colors } from './utils/logger.js';
export type { Logger, LoggerOptions, LogLevel } from './utils/logger.js';
