import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { TableCell } from './table.js';
import { isFailureRecord, type EvaluationRecord } from './types.js';
import { logger } from './utils/logger.js';

export const SPREADSHEET_FILE = 'test_results.xlsx';

const CONTENT_PREVIEW_LENGTH = 200;

export interface ExportTable {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly TableCell[])[];
}

/** The slice of an exceljs workbook the export touches */
export interface SheetLike {
  addRow(values: readonly TableCell[]): unknown;
}

export interface WorkbookLike {
  addWorksheet(name: string): SheetLike;
  readonly xlsx: {
    writeFile(filePath: string): Promise<void>;
  };
}

export type WorkbookLoader = () => Promise<WorkbookLike>;

export function truncate(text: string, length: number): string {
  return Array.from(text).slice(0, length).join('');
}

/**
 * One row per record: identity columns, every `${dimension}_${subMetric}`
 * score in order of first appearance, a content preview, and an error
 * column when any record failed.
 */
export function buildExportTable(records: readonly EvaluationRecord[]): ExportTable {
  const metricKeys: string[] = [];
  const seen = new Set<string>();
  const flattened = records.map((record) => {
    const metrics = new Map<string, number>();
    if (!isFailureRecord(record)) {
      for (const [dimension, group] of Object.entries(record.scores)) {
        const subScores: Readonly<Record<string, number>> = group;
        for (const [subMetric, value] of Object.entries(subScores)) {
          const key = `${dimension}_${subMetric}`;
          metrics.set(key, value);
          if (!seen.has(key)) {
            seen.add(key);
            metricKeys.push(key);
          }
        }
      }
    }
    return { record, metrics };
  });

  const hasErrors = records.some(isFailureRecord);
  const columns = [
    'Model',
    'Test case ID',
    'Category',
    'Age',
    'Total score',
    'Latency (s)',
    ...metricKeys,
    'Content',
    ...(hasErrors ? ['Error'] : []),
  ];

  const rows = flattened.map(({ record, metrics }): TableCell[] => {
    const identity: TableCell[] = [
      record.model,
      record.testCaseId,
      record.testCaseCategory ?? '',
      record.testCaseAgeLevel ?? '',
      record.totalScore,
    ];
    if (isFailureRecord(record)) {
      return [
        ...identity,
        0,
        ...metricKeys.map(() => ''),
        '',
        ...(hasErrors ? [record.error] : []),
      ];
    }
    return [
      ...identity,
      record.latency,
      ...metricKeys.map((key) => metrics.get(key) ?? ''),
      truncate(record.content, CONTENT_PREVIEW_LENGTH),
      ...(hasErrors ? [''] : []),
    ];
  });

  return { columns, rows };
}

export const loadExcelWorkbook: WorkbookLoader = async () => {
  const { default: ExcelJS } = await import('exceljs');
  return new ExcelJS.Workbook();
};

/**
 * Writes the export table as an .xlsx workbook.
 * Returns undefined, after a warning, when there is nothing to write or the
 * workbook library cannot be loaded.
 */
export async function writeSpreadsheet(
  records: readonly EvaluationRecord[],
  outputDir: string,
  loadWorkbook: WorkbookLoader = loadExcelWorkbook,
): Promise<string | undefined> {
  if (records.length === 0) {
    return undefined;
  }

  let workbook: WorkbookLike;
  try {
    workbook = await loadWorkbook();
  } catch (error) {
    logger.warn(
      `exceljs is not available, skipping spreadsheet export: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
    return undefined;
  }

  const table = buildExportTable(records);
  const sheet = workbook.addWorksheet('Results');
  sheet.addRow(table.columns);
  for (const row of table.rows) {
    sheet.addRow(row);
  }

  await fs.mkdir(outputDir, { recursive: true });
  const filePath = path.join(outputDir, SPREADSHEET_FILE);
  await workbook.xlsx.writeFile(filePath);
  logger.debug(`Spreadsheet saved: ${filePath}`, { rows: table.rows.length });
  return filePath;
}
