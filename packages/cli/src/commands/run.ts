/**
 * tutor-eval run command
 *
 * Loads the configuration, calls every selected model on every selected
 * test case, saves the results document and publishes the reports.
 */

import { Command, Option } from "commander";
import * as fs from "node:fs";
import ora, { type Ora } from "ora";
import {
  colors,
  createModelClient,
  createResultsDocument,
  isFailureRecord,
  loadCriteria,
  loadModelsConfig,
  loadTestSuite,
  logger,
  ReportGenerator,
  resolveConfigPaths,
  saveResults,
  TestRunner,
  type RunProgressEvent,
  type SavedReports,
} from "@tutor-eval/eval";
import type { CliDependencies } from "../cli.js";
import { configError, usageError } from "../errors.js";
import {
  DEFAULT_REPORT_DIR,
  DEFAULT_RESULTS_PATH,
  executeReportCommand,
  publishReports,
} from "./report.js";

export const DEFAULT_CONFIG_DIR = "config";

/**
 * Run command options
 */
export interface RunOptions {
  models?: string[];
  cases?: string[];
  configDir: string;
  output: string;
  reportDir: string;
  stream: boolean;
  reportOnly: boolean;
}

export interface RunOutcome {
  readonly resultsPath: string;
  readonly recordCount: number;
  readonly reports: SavedReports;
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const items = value.filter((item: unknown): item is string => typeof item === "string");
  return items.length > 0 ? items : undefined;
}

/**
 * Spinner lines for runner progress
 */
function createProgressReporter(spinner: Ora): (event: RunProgressEvent) => void {
  return (event) => {
    const c = colors();
    switch (event.type) {
      case "case-start":
        spinner.info(
          c.bold(
            `Test case ${event.testCase.id} (${event.testCase.category}, age ${event.testCase.ageLevel})`
          )
        );
        break;
      case "model-start":
        spinner.start(`[${event.current}/${event.total}] ${event.modelName}...`);
        break;
      case "model-done": {
        const prefix = `[${event.current}/${event.total}] ${event.modelName}`;
        const { record } = event;
        if (isFailureRecord(record)) {
          spinner.fail(`${prefix}: ${record.error}`);
        } else {
          spinner.succeed(
            `${prefix}: score ${record.totalScore.toFixed(2)}, latency ${record.latency.toFixed(2)}s`
          );
        }
        break;
      }
    }
  };
}

/**
 * Execute the run command
 *
 * @throws CliError (CONFIG_ERROR) for missing config files or no usable model,
 *   (INVALID_ARGUMENT) when --cases matches nothing
 */
export async function executeRunCommand(
  options: RunOptions,
  deps: CliDependencies = {}
): Promise<RunOutcome> {
  if (options.reportOnly) {
    const reports = await executeReportCommand(options.output, {
      reportDir: options.reportDir,
      detailed: false,
      loadWorkbook: deps.loadWorkbook,
    });
    return { resultsPath: options.output, recordCount: 0, reports };
  }

  const paths = await resolveConfigPaths(options.configDir);
  for (const filePath of [paths.models, paths.testCases, paths.criteria]) {
    if (!fs.existsSync(filePath)) {
      throw configError(
        `Configuration file not found: ${filePath}`,
        `Put models, test-cases and evaluation-criteria files (.yaml or .json) in ${options.configDir}.`
      );
    }
  }

  const [modelsConfig, testSuite, criteria] = await Promise.all([
    loadModelsConfig(paths.models),
    loadTestSuite(paths.testCases),
    loadCriteria(paths.criteria),
  ]);

  const selectedCases = options.cases;
  if (
    selectedCases &&
    !testSuite.testCases.some((testCase) => selectedCases.includes(testCase.id))
  ) {
    throw usageError(
      `No test case matches --cases ${selectedCases.join(" ")}`,
      `Known test case ids: ${testSuite.testCases.map((testCase) => testCase.id).join(", ")}`
    );
  }

  const quietSpinner = logger.getOptions().quiet === true || logger.getOptions().json === true;
  const spinner = ora({ isSilent: quietSpinner });
  const runner = new TestRunner({
    modelsConfig,
    testSuite,
    criteria,
    stream: options.stream,
    createClient:
      deps.createClient ?? ((config) => createModelClient(config, { env: deps.env })),
    onProgress: createProgressReporter(spinner),
  });

  logger.info("Initializing model clients...");
  const status = runner.initializeClients(options.models);
  const available = Object.keys(status).filter((key) => status[key] === true);
  if (available.length === 0) {
    throw configError(
      "No usable models. Check the model configuration.",
      `Fill in the API keys in ${paths.models} (or the environment variables named by apiKeyEnv); recommendedKeyLocation says where to get one.`
    );
  }
  logger.info(`Available models: ${available.map((key) => runner.modelName(key)).join(", ")}`);

  const records = await runner
    .runAllTests({ modelKeys: available, testCaseIds: options.cases })
    .finally(() => spinner.stop());

  const document = createResultsDocument(records, testSuite, deps.clock);
  await saveResults(document, options.output);
  logger.success(`Results saved: ${options.output}`);

  const reports = await publishReports(
    new ReportGenerator(document, { loadWorkbook: deps.loadWorkbook }),
    { reportDir: options.reportDir, detailed: false }
  );

  return { resultsPath: options.output, recordCount: records.length, reports };
}

/**
 * Create the run command
 *
 * @returns Commander command for 'tutor-eval run'
 */
export function createRunCommand(deps: CliDependencies = {}): Command {
  const command = new Command("run")
    .description("Run the test cases against the configured models")
    .addHelpText(
      "after",
      `
Examples:
  $ tutor-eval run                               All enabled models, all cases
  $ tutor-eval run --models qwen glm             Selected models
  $ tutor-eval run --cases greeting-01 safety-01 Selected test cases
  $ tutor-eval run --no-stream                   Plain requests, TTFB = latency
  $ tutor-eval run --report-only                 Reports from saved results only`
    )
    .addOption(new Option("--models <keys...>", "Model keys to test (default: all enabled)"))
    .addOption(new Option("--cases <ids...>", "Test case ids to run (default: all)"))
    .addOption(
      new Option("--config-dir <dir>", "Configuration directory").default(DEFAULT_CONFIG_DIR)
    )
    .addOption(
      new Option("-o, --output <file>", "Results file").default(DEFAULT_RESULTS_PATH)
    )
    .addOption(
      new Option("--report-dir <dir>", "Directory for report files").default(DEFAULT_REPORT_DIR)
    )
    .addOption(new Option("--no-stream", "Disable streaming (no time-to-first-token measurement)"))
    .addOption(
      new Option("--report-only", "Only generate reports from the results file").default(false)
    )
    .action(async (options: Record<string, unknown>) => {
      await executeRunCommand(
        {
          models: stringList(options.models),
          cases: stringList(options.cases),
          configDir:
            typeof options.configDir === "string" ? options.configDir : DEFAULT_CONFIG_DIR,
          output: typeof options.output === "string" ? options.output : DEFAULT_RESULTS_PATH,
          reportDir:
            typeof options.reportDir === "string" ? options.reportDir : DEFAULT_REPORT_DIR,
          stream: options.stream !== false,
          reportOnly: options.reportOnly === true,
        },
        deps
      );
    });

  return command;
}
