/**
 * tutor-eval report command
 *
 * Rebuilds the text reports and the spreadsheet export from a saved
 * results file without calling any model.
 */

import { Command, Option } from "commander";
import * as fs from "node:fs";
import {
  logger,
  ReportGenerator,
  type SavedReports,
  type WorkbookLoader,
} from "@tutor-eval/eval";
import type { CliDependencies } from "../cli.js";
import { configError } from "../errors.js";

export const DEFAULT_RESULTS_PATH = "results/test_results.json";
export const DEFAULT_REPORT_DIR = "results";

/**
 * Report command options
 */
export interface ReportOptions {
  reportDir: string;
  detailed: boolean;
  loadWorkbook?: WorkbookLoader;
}

/**
 * Print the saved file locations
 */
export function printSavedReports(saved: SavedReports): void {
  logger.success(`Summary report: ${saved.summaryPath}`);
  logger.success(`Detailed report: ${saved.detailedPath}`);
  if (saved.spreadsheetPath) {
    logger.success(`Spreadsheet: ${saved.spreadsheetPath}`);
  }
}

/**
 * Print and save reports for an in-memory generator
 */
export async function publishReports(
  generator: ReportGenerator,
  options: ReportOptions
): Promise<SavedReports> {
  const saved = await generator.saveReports(options.reportDir);

  if (logger.getOptions().json) {
    logger.json({ records: generator.results.length, ...saved });
    return saved;
  }

  console.log(generator.generateSummaryReport());
  if (options.detailed) {
    console.log();
    console.log(generator.generateDetailedReport());
  }
  console.log();
  printSavedReports(saved);
  return saved;
}

/**
 * Load a results file and publish its reports
 *
 * @throws CliError (CONFIG_ERROR) when the results file does not exist
 */
export async function executeReportCommand(
  resultsPath: string,
  options: ReportOptions
): Promise<SavedReports> {
  if (!fs.existsSync(resultsPath)) {
    throw configError(
      `Results file not found: ${resultsPath}`,
      "Run `tutor-eval run` first, or pass the path of a saved results file."
    );
  }

  logger.info(`Generating reports from ${resultsPath}`);
  const generator = await ReportGenerator.fromFile(resultsPath, {
    loadWorkbook: options.loadWorkbook,
  });
  return publishReports(generator, options);
}

/**
 * Create the report command
 *
 * @returns Commander command for 'tutor-eval report'
 */
export function createReportCommand(deps: CliDependencies = {}): Command {
  const command = new Command("report")
    .description("Generate reports from a saved results file")
    .addHelpText(
      "after",
      `
Examples:
  $ tutor-eval report                            Use results/test_results.json
  $ tutor-eval report runs/monday.json           Use a specific results file
  $ tutor-eval report --detailed                 Also print per-case results`
    )
    .argument("[results]", "Results file", DEFAULT_RESULTS_PATH)
    .addOption(
      new Option("--report-dir <dir>", "Directory for report files").default(
        DEFAULT_REPORT_DIR
      )
    )
    .addOption(
      new Option("--detailed", "Print the detailed report as well").default(false)
    )
    .action(async (resultsPath: string, options: Record<string, unknown>) => {
      await executeReportCommand(resultsPath, {
        reportDir:
          typeof options.reportDir === "string" ? options.reportDir : DEFAULT_REPORT_DIR,
        detailed: options.detailed === true,
        loadWorkbook: deps.loadWorkbook,
      });
    });

  return command;
}
