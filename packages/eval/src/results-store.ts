import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import {
  isDimensionName,
  type DimensionName,
  type DimensionScores,
  type EvaluationRecord,
  type ResultsDocument,
  type TestSuite,
  type TokenUsage,
} from './types.js';
import { logger } from './utils/logger.js';

/** Thrown while validating a persisted results document */
export class ResultsShapeError extends Error {
  readonly path: string;

  constructor(message: string, at: string) {
    super(`${at}: ${message}`);
    this.name = 'ResultsShapeError';
    this.path = at;
  }
}

export function createResultsDocument(
  records: readonly EvaluationRecord[],
  suite: TestSuite,
  clock: () => Date = () => new Date(),
): ResultsDocument {
  return {
    timestamp: clock().toISOString(),
    testConfig: {
      ageRange: suite.ageRange,
      totalCases: suite.testCases.length,
    },
    results: records,
  };
}

export async function saveResults(
  document: ResultsDocument,
  filePath: string,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(document, null, 2), 'utf-8');
  logger.debug(`Results saved: ${filePath}`, {
    records: document.results.length,
  });
}

export function emptyResultsDocument(): ResultsDocument {
  return {
    timestamp: '',
    testConfig: { totalCases: 0 },
    results: [],
  };
}

/**
 * Reads a results document.
 * A missing or malformed file is logged and read as an empty document;
 * individual malformed records are skipped with a warning.
 */
export async function loadResults(filePath: string): Promise<ResultsDocument> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      logger.error(`Results file not found: ${filePath}`);
    } else {
      logger.error(`Failed to read results file ${filePath}: ${describe(error)}`);
    }
    return emptyResultsDocument();
  }

  try {
    return parseResultsDocument(JSON.parse(raw));
  } catch (error) {
    logger.error(`Failed to load results file ${filePath}: ${describe(error)}`);
    return emptyResultsDocument();
  }
}

export function parseResultsDocument(value: unknown): ResultsDocument {
  const document = objectAt(value, '$');
  const testConfig: Record<string, unknown> =
    document['testConfig'] === undefined
      ? {}
      : objectAt(document['testConfig'], '$.testConfig');
  const rawResults = document['results'] ?? [];
  if (!Array.isArray(rawResults)) {
    throw new ResultsShapeError('expected an array', '$.results');
  }

  const results: EvaluationRecord[] = [];
  rawResults.forEach((item: unknown, index) => {
    try {
      results.push(parseRecord(item, `$.results[${index}]`));
    } catch (error) {
      if (!(error instanceof ResultsShapeError)) {
        throw error;
      }
      logger.warn(`Skipping malformed result record: ${error.message}`);
    }
  });

  return {
    timestamp: optionalString(document['timestamp'], '$.timestamp') ?? '',
    testConfig: {
      ageRange: optionalString(testConfig['ageRange'], '$.testConfig.ageRange'),
      totalCases:
        optionalNumber(testConfig['totalCases'], '$.testConfig.totalCases') ?? 0,
    },
    results,
  };
}

export function parseRecord(value: unknown, at: string): EvaluationRecord {
  const record = objectAt(value, at);
  const model = stringAt(record, 'model', at);
  const testCaseId = stringAt(record, 'testCaseId', at);
  const timestamp = optionalString(record['timestamp'], `${at}.timestamp`) ?? '';

  if (record['error'] !== undefined) {
    return {
      model,
      testCaseId,
      testCaseCategory: optionalString(
        record['testCaseCategory'],
        `${at}.testCaseCategory`,
      ),
      testCaseAgeLevel: optionalNumber(
        record['testCaseAgeLevel'],
        `${at}.testCaseAgeLevel`,
      ),
      error: stringAt(record, 'error', at),
      scores: {},
      totalScore: 0,
      timestamp,
    };
  }

  return {
    model,
    testCaseId,
    testCaseCategory: stringAt(record, 'testCaseCategory', at),
    testCaseAgeLevel: numberAt(record, 'testCaseAgeLevel', at),
    content: stringAt(record, 'content', at),
    latency: numberAt(record, 'latency', at),
    ttfb: optionalNumber(record['ttfb'], `${at}.ttfb`),
    tokens: parseTokens(record['tokens'], `${at}.tokens`),
    scores: parseScores(record['scores'], `${at}.scores`),
    totalScore: numberAt(record, 'totalScore', at),
    weightedDimensions: parseDimensionList(
      record['weightedDimensions'],
      `${at}.weightedDimensions`,
    ),
    timestamp,
  };
}

function parseTokens(value: unknown, at: string): TokenUsage {
  if (value === undefined) {
    return {};
  }
  const tokens = objectAt(value, at);
  return {
    promptTokens: optionalNumber(tokens['promptTokens'], `${at}.promptTokens`),
    completionTokens: optionalNumber(
      tokens['completionTokens'],
      `${at}.completionTokens`,
    ),
    totalTokens: optionalNumber(tokens['totalTokens'], `${at}.totalTokens`),
  };
}

function parseScores(value: unknown, at: string): DimensionScores {
  const scores = objectAt(value, at);
  const group = (name: DimensionName): ((key: string) => number) => {
    const groupAt = `${at}.${name}`;
    const values = objectAt(scores[name], groupAt);
    return (key) => numberAt(values, key, groupAt);
  };

  const language = group('language_ability');
  const teaching = group('teaching_adaptability');
  const performance = group('response_performance');
  const safety = group('safety_compliance');
  const cost = group('cost_efficiency');

  return {
    language_ability: {
      pronunciation_accuracy: language('pronunciation_accuracy'),
      grammar_correctness: language('grammar_correctness'),
      vocabulary_appropriateness: language('vocabulary_appropriateness'),
      expression_naturalness: language('expression_naturalness'),
    },
    teaching_adaptability: {
      child_friendly_language: teaching('child_friendly_language'),
      interaction_quality: teaching('interaction_quality'),
      personalization: teaching('personalization'),
      engagement: teaching('engagement'),
    },
    response_performance: {
      ttfb: performance('ttfb'),
      latency: performance('latency'),
      latency_combined: performance('latency_combined'),
      stability: performance('stability'),
    },
    safety_compliance: {
      content_filtering: safety('content_filtering'),
      age_appropriateness: safety('age_appropriateness'),
    },
    cost_efficiency: {
      api_cost: cost('api_cost'),
      token_efficiency: cost('token_efficiency'),
    },
  };
}

function parseDimensionList(value: unknown, at: string): DimensionName[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ResultsShapeError('expected an array', at);
  }
  return value.map((item: unknown, index) => {
    if (typeof item !== 'string' || !isDimensionName(item)) {
      throw new ResultsShapeError('unknown dimension', `${at}[${index}]`);
    }
    return item;
  });
}

// --- Shape helpers ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function objectAt(value: unknown, at: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ResultsShapeError('expected an object', at);
  }
  return value;
}

function stringAt(obj: Record<string, unknown>, key: string, at: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new ResultsShapeError('expected a string', `${at}.${key}`);
  }
  return value;
}

function numberAt(obj: Record<string, unknown>, key: string, at: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ResultsShapeError('expected a number', `${at}.${key}`);
  }
  return value;
}

function optionalString(value: unknown, at: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ResultsShapeError('expected a string', at);
  }
  return value;
}

function optionalNumber(value: unknown, at: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ResultsShapeError('expected a number', at);
  }
  return value;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
