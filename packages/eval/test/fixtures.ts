import type { SheetLike, WorkbookLike } from '../src/spreadsheet.js';
import type { TableCell } from '../src/table.js';
import type {
  DimensionScores,
  EvaluationCriteria,
  EvaluationFailureRecord,
  EvaluationSuccessRecord,
  TestCase,
} from '../src/types.js';

export const FIXED_TIME = new Date('2026-03-01T09:30:00.000Z');

export function fixedClock(): Date {
  return FIXED_TIME;
}

/** Returns the given readings in order, then repeats the last one */
export function sequenceClock(...readings: number[]): () => number {
  let index = 0;
  return () => {
    const value = readings[Math.min(index, readings.length - 1)] ?? 0;
    index += 1;
    return value;
  };
}

export function makeTestCase(overrides: Partial<TestCase> = {}): TestCase {
  return {
    id: 'greet-1',
    category: 'greeting',
    ageLevel: 4,
    userInput: 'Hello teacher!',
    expectedKeywords: ['hello', 'name'],
    ...overrides,
  };
}

export const EQUAL_WEIGHTS: EvaluationCriteria = {
  scoringMethod: 'weighted_average',
  evaluationDimensions: {
    language_ability: { weight: 1 },
    teaching_adaptability: { weight: 1 },
    response_performance: { weight: 1 },
    safety_compliance: { weight: 1 },
    cost_efficiency: { weight: 1 },
  },
};

export function makeScores(): DimensionScores {
  return {
    language_ability: {
      pronunciation_accuracy: 7,
      grammar_correctness: 8,
      vocabulary_appropriateness: 10,
      expression_naturalness: 8.5,
    },
    teaching_adaptability: {
      child_friendly_language: 8,
      interaction_quality: 9,
      personalization: 7,
      engagement: 8,
    },
    response_performance: {
      ttfb: 10,
      latency: 9,
      latency_combined: 9.7,
      stability: 7,
    },
    safety_compliance: {
      content_filtering: 8,
      age_appropriateness: 9,
    },
    cost_efficiency: {
      api_cost: 7,
      token_efficiency: 9,
    },
  };
}

export function successRecord(
  overrides: Partial<EvaluationSuccessRecord> = {},
): EvaluationSuccessRecord {
  return {
    model: 'model-a',
    testCaseId: 'greet-1',
    testCaseCategory: 'greeting',
    testCaseAgeLevel: 4,
    content: 'Hello!',
    latency: 1,
    ttfb: 0.5,
    tokens: { promptTokens: 40, completionTokens: 40, totalTokens: 80 },
    scores: makeScores(),
    totalScore: 8,
    weightedDimensions: [
      'language_ability',
      'teaching_adaptability',
      'response_performance',
      'safety_compliance',
      'cost_efficiency',
    ],
    timestamp: FIXED_TIME.toISOString(),
    ...overrides,
  };
}

export function failureRecord(
  overrides: Partial<EvaluationFailureRecord> = {},
): EvaluationFailureRecord {
  return {
    model: 'model-a',
    testCaseId: 'greet-1',
    testCaseCategory: 'greeting',
    testCaseAgeLevel: 4,
    error: 'Request failed: timeout',
    scores: {},
    totalScore: 0,
    timestamp: FIXED_TIME.toISOString(),
    ...overrides,
  };
}

/** In-memory stand-in for an exceljs workbook */
export function fakeWorkbook(): {
  workbook: WorkbookLike;
  sheets: string[];
  rows: (readonly TableCell[])[];
  written: string[];
} {
  const sheets: string[] = [];
  const rows: (readonly TableCell[])[] = [];
  const written: string[] = [];
  const sheet: SheetLike = {
    addRow: (values) => {
      rows.push(values);
    },
  };
  const workbook: WorkbookLike = {
    addWorksheet: (name) => {
      sheets.push(name);
      return sheet;
    },
    xlsx: {
      writeFile: async (filePath) => {
        written.push(filePath);
      },
    },
  };
  return { workbook, sheets, rows, written };
}
