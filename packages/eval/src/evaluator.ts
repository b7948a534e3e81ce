import {
  scoreCostEfficiency,
  scoreLanguageAbility,
  scoreResponsePerformance,
  scoreSafetyCompliance,
  scoreTeachingAdaptability,
} from './heuristics.js';
import { defaultLexicon, type Lexicon } from './lexicon.js';
import {
  DIMENSION_NAMES,
  isDimensionName,
  type DimensionName,
  type DimensionScores,
  type EvaluationCriteria,
  type EvaluationRecord,
  type ModelResponse,
  type TestCase,
} from './types.js';
import { logger } from './utils/logger.js';

export const DEFAULT_SCORING_METHOD = 'weighted_average';

export interface EvaluatorOptions {
  /** Word lists for the text heuristics (default: the shipped lexicon) */
  lexicon?: Lexicon;
  /** Source of record timestamps */
  clock?: () => Date;
}

export interface TotalScore {
  readonly totalScore: number;
  readonly weightedDimensions: readonly DimensionName[];
}

export function average(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Rounds to 2 decimals, ties to even, deciding the tie on the exact
 * binary value (8.125 -> 8.12, 8.135 -> 8.13 since 8.135 is stored below it).
 */
export function roundTo2(value: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }
  const [whole = '0', fraction = ''] = Math.abs(value).toFixed(20).split('.');
  const rest = fraction.slice(2);
  const half = '5'.padEnd(rest.length, '0');
  let cents = Number(`${whole}${fraction.slice(0, 2)}`);
  if (rest > half || (rest === half && cents % 2 === 1)) {
    cents += 1;
  }
  return value < 0 ? -cents / 100 : cents / 100;
}

/**
 * Weighted mean of per-dimension averages.
 *
 * Only dimensions present in both the criteria and the scores take part;
 * a dimension's sub-metrics are averaged unweighted first.
 */
export function calculateTotalScore(
  scores: DimensionScores,
  criteria: EvaluationCriteria,
): TotalScore {
  let total = 0;
  let totalWeight = 0;
  const weightedDimensions: DimensionName[] = [];

  for (const [dimension, criterion] of Object.entries(
    criteria.evaluationDimensions,
  )) {
    if (!isDimensionName(dimension)) {
      continue;
    }
    const group: Readonly<Record<string, number>> = scores[dimension];
    const values = Object.values(group);
    if (values.length === 0) {
      continue;
    }

    total += average(values) * criterion.weight;
    totalWeight += criterion.weight;
    if (criterion.weight !== 0) {
      weightedDimensions.push(dimension);
    }
  }

  return {
    totalScore: totalWeight > 0 ? roundTo2(total / totalWeight) : 0,
    weightedDimensions,
  };
}

/**
 * Scores tutor replies against the fixed rubric.
 *
 * Scoring is pure: the same test case and response always produce the same
 * scores. Only the record timestamp comes from the clock.
 */
export class Evaluator {
  private readonly criteria: EvaluationCriteria;
  private readonly lexicon: Lexicon;
  private readonly clock: () => Date;

  constructor(criteria: EvaluationCriteria, options: EvaluatorOptions = {}) {
    this.criteria = criteria;
    this.lexicon = options.lexicon ?? defaultLexicon();
    this.clock = options.clock ?? (() => new Date());

    if (criteria.scoringMethod !== DEFAULT_SCORING_METHOD) {
      logger.warn(
        `Unsupported scoring method "${criteria.scoringMethod}", using ${DEFAULT_SCORING_METHOD}`,
      );
    }

    const unweighted = this.unweightedDimensions();
    if (unweighted.length > 0) {
      logger.warn(
        `No weight configured for ${unweighted.join(', ')}; excluded from total scores`,
      );
    }

    const unknown = Object.keys(criteria.evaluationDimensions).filter(
      (name) => !isDimensionName(name),
    );
    if (unknown.length > 0) {
      logger.warn(`Unknown evaluation dimensions ignored: ${unknown.join(', ')}`);
    }
  }

  get scoringMethod(): string {
    return this.criteria.scoringMethod;
  }

  /** Scored dimensions that the criteria give no weight entry */
  unweightedDimensions(): DimensionName[] {
    return DIMENSION_NAMES.filter(
      (name) => this.criteria.evaluationDimensions[name] === undefined,
    );
  }

  evaluateResponse(
    testCase: TestCase,
    response: ModelResponse,
    modelName: string,
  ): EvaluationRecord {
    const timestamp = this.clock().toISOString();

    if (!response.ok) {
      return {
        model: modelName,
        testCaseId: testCase.id,
        testCaseCategory: testCase.category,
        testCaseAgeLevel: testCase.ageLevel,
        error: response.error,
        scores: {},
        totalScore: 0,
        timestamp,
      };
    }

    const { content, latency, tokens } = response;
    const ttfb = response.ttfb ?? latency;

    const scores: DimensionScores = {
      language_ability: scoreLanguageAbility(content, testCase, this.lexicon),
      teaching_adaptability: scoreTeachingAdaptability(content, this.lexicon),
      response_performance: scoreResponsePerformance(latency, ttfb),
      safety_compliance: scoreSafetyCompliance(content, testCase, this.lexicon),
      cost_efficiency: scoreCostEfficiency(tokens),
    };
    const { totalScore, weightedDimensions } = calculateTotalScore(
      scores,
      this.criteria,
    );

    return {
      model: modelName,
      testCaseId: testCase.id,
      testCaseCategory: testCase.category,
      testCaseAgeLevel: testCase.ageLevel,
      content,
      latency,
      ttfb,
      tokens,
      scores,
      totalScore,
      weightedDimensions,
      timestamp,
    };
  }
}
