import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import {
  aggregateByModel,
  dimensionColumns,
  metricAverage,
  rankModels,
  sortedModels,
  summarizeModel,
  groupByTestCase,
  compareStrings,
  type ModelStats,
} from './aggregator.js';
import { average } from './evaluator.js';
import { loadResults } from './results-store.js';
import {
  truncate,
  writeSpreadsheet,
  type WorkbookLoader,
} from './spreadsheet.js';
import { renderGridTable, type TableCell } from './table.js';
import {
  DIMENSION_NAMES,
  isFailureRecord,
  type DimensionName,
  type EvaluationRecord,
  type ResultsDocument,
} from './types.js';
import { logger } from './utils/logger.js';

export const NO_RESULTS = 'No test results';
export const SUMMARY_REPORT_FILE = 'summary_report.txt';
export const DETAILED_REPORT_FILE = 'detailed_report.txt';

const RULE = '='.repeat(80);
const SEPARATOR = '-'.repeat(80);
const REPLY_PREVIEW_LENGTH = 100;

export const DIMENSION_LABELS: Readonly<Record<DimensionName, string>> = {
  language_ability: 'Language ability',
  teaching_adaptability: 'Teaching adaptability',
  response_performance: 'Response performance',
  safety_compliance: 'Safety compliance',
  cost_efficiency: 'Cost efficiency',
};

export interface ReportGeneratorOptions {
  /** Workbook factory for the spreadsheet export (default: exceljs) */
  loadWorkbook?: WorkbookLoader;
}

export interface SavedReports {
  readonly summaryPath: string;
  readonly detailedPath: string;
  /** Absent when the spreadsheet export was skipped */
  readonly spreadsheetPath?: string;
}

function fixed(value: number): string {
  return value.toFixed(2);
}

/**
 * Turns a results document into the summary and detailed text reports
 * and the spreadsheet export. Reports depend only on `results`.
 */
export class ReportGenerator {
  private readonly document: ResultsDocument;
  private readonly options: ReportGeneratorOptions;

  constructor(document: ResultsDocument, options: ReportGeneratorOptions = {}) {
    this.document = document;
    this.options = options;
  }

  /** Missing or malformed files produce a generator with no results */
  static async fromFile(
    filePath: string,
    options: ReportGeneratorOptions = {},
  ): Promise<ReportGenerator> {
    return new ReportGenerator(await loadResults(filePath), options);
  }

  get results(): readonly EvaluationRecord[] {
    return this.document.results;
  }

  generateSummaryReport(): string {
    if (this.results.length === 0) {
      return NO_RESULTS;
    }

    const byModel = aggregateByModel(this.results);
    const models = sortedModels(byModel);
    const lines: string[] = [
      RULE,
      "Children's English Tutor - Model Evaluation Report",
      RULE,
      `Run time: ${this.document.timestamp || 'Unknown'}`,
      `Test cases: ${this.document.testConfig.totalCases}`,
      '',
      'Overview:',
      renderGridTable(
        [
          'Model',
          'Success rate',
          'Avg score',
          'Avg latency (s)',
          'First-token latency (s)',
          'Succeeded',
          'Failed',
        ],
        models.map((model) => {
          const summary = summarizeModel(model, statsOf(byModel, model));
          return [
            model,
            `${summary.successRate.toFixed(1)}%`,
            fixed(summary.averageScore),
            fixed(summary.averageLatency),
            fixed(summary.averageTtfb),
            summary.successCount,
            summary.errorCount,
          ];
        }),
      ),
      '',
      RULE,
      'Scores by dimension',
      RULE,
    ];

    for (const dimension of DIMENSION_NAMES) {
      lines.push('', `[${DIMENSION_LABELS[dimension]}]`);
      lines.push(dimensionTable(dimension, byModel, models));
    }

    lines.push('', RULE, 'Model ranking', RULE);
    rankModels(byModel).forEach((summary, index) => {
      lines.push(
        `${index + 1}. ${summary.model}`,
        `   Total score: ${fixed(summary.averageScore)}/10`,
        `   Avg latency: ${fixed(summary.averageLatency)}s`,
        `   First-token latency: ${fixed(summary.averageTtfb)}s`,
        '',
      );
    });

    return lines.join('\n');
  }

  generateDetailedReport(): string {
    if (this.results.length === 0) {
      return NO_RESULTS;
    }

    const lines: string[] = [RULE, 'Detailed results', RULE, ''];

    for (const [caseId, records] of groupByTestCase(this.results)) {
      const labelled = records.find(
        (record) => record.testCaseCategory !== undefined,
      );
      const ageLevel = records.find(
        (record) => record.testCaseAgeLevel !== undefined,
      )?.testCaseAgeLevel;

      lines.push(
        `Test case: ${caseId}`,
        `  Category: ${labelled?.testCaseCategory ?? 'Unknown'}`,
        `  Age: ${ageLevel === undefined ? 'Unknown' : `${ageLevel} years`}`,
        '',
      );

      const byModel = [...records].sort((a, b) => compareStrings(a.model, b.model));
      for (const record of byModel) {
        lines.push(`  [${record.model}]`);
        if (isFailureRecord(record)) {
          lines.push(`    Error: ${record.error}`);
        } else {
          lines.push(
            `    Score: ${fixed(record.totalScore)}/10`,
            `    Latency: ${fixed(record.latency)}s`,
            `    Reply: ${truncate(record.content, REPLY_PREVIEW_LENGTH)}...`,
          );
        }
        lines.push('');
      }

      lines.push(SEPARATOR, '');
    }

    return lines.join('\n');
  }

  /**
   * Writes both text reports and the spreadsheet export into outputDir,
   * creating it when needed.
   */
  async saveReports(outputDir: string): Promise<SavedReports> {
    await fs.mkdir(outputDir, { recursive: true });

    const summaryPath = path.join(outputDir, SUMMARY_REPORT_FILE);
    const detailedPath = path.join(outputDir, DETAILED_REPORT_FILE);
    await fs.writeFile(summaryPath, this.generateSummaryReport(), 'utf-8');
    await fs.writeFile(detailedPath, this.generateDetailedReport(), 'utf-8');
    logger.debug(`Reports saved to ${outputDir}`);

    const spreadsheetPath = await writeSpreadsheet(
      this.results,
      outputDir,
      this.options.loadWorkbook,
    );

    return { summaryPath, detailedPath, spreadsheetPath };
  }
}

function statsOf(byModel: ReadonlyMap<string, ModelStats>, model: string): ModelStats {
  const stats = byModel.get(model);
  if (!stats) {
    throw new Error(`No statistics for model "${model}"`);
  }
  return stats;
}

function dimensionTable(
  dimension: DimensionName,
  byModel: ReadonlyMap<string, ModelStats>,
  models: readonly string[],
): string {
  const columns = dimensionColumns(dimension, byModel);
  const headers = ['Model', ...columns.map((column) => column.label), 'Dimension average'];

  const rows = models.map((model): TableCell[] => {
    const stats = statsOf(byModel, model);
    const means: number[] = [];
    const cells = columns.map((column) => {
      const mean = metricAverage(stats, dimension, column.key);
      if (mean === undefined) {
        return '-';
      }
      means.push(mean);
      return fixed(mean);
    });
    return [model, ...cells, means.length > 0 ? fixed(average(means)) : '-'];
  });

  return renderGridTable(headers, rows);
}
