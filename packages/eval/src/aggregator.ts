import { average } from './evaluator.js';
import {
  isFailureRecord,
  type DimensionName,
  type EvaluationRecord,
} from './types.js';

/** Per-model accumulators built from a list of records */
export interface ModelStats {
  readonly totalScores: number[];
  readonly latencies: number[];
  readonly ttfbs: number[];
  successCount: number;
  errorCount: number;
  /** Keyed by `${dimension}_${subMetric}` */
  readonly metricScores: Map<string, number[]>;
}

export interface ModelSummary {
  readonly model: string;
  /** Percentage, 0-100 */
  readonly successRate: number;
  readonly averageScore: number;
  readonly averageLatency: number;
  /** Falls back to averageLatency when no TTFB was observed */
  readonly averageTtfb: number;
  readonly successCount: number;
  readonly errorCount: number;
}

export interface MetricColumn {
  /** Sub-metric name as it appears in the scores */
  readonly key: string;
  readonly label: string;
}

const METRIC_LABELS: Readonly<Record<string, string>> = {
  latency_combined: 'combined latency',
  ttfb: 'first-token latency',
  latency: 'total latency',
};

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function emptyStats(): ModelStats {
  return {
    totalScores: [],
    latencies: [],
    ttfbs: [],
    successCount: 0,
    errorCount: 0,
    metricScores: new Map(),
  };
}

function pushTo<K>(map: Map<K, number[]>, key: K, value: number): void {
  const values = map.get(key);
  if (values) {
    values.push(value);
  } else {
    map.set(key, [value]);
  }
}

/**
 * Groups records by model name.
 * Failure records only bump the error counter.
 */
export function aggregateByModel(
  records: readonly EvaluationRecord[],
): Map<string, ModelStats> {
  const byModel = new Map<string, ModelStats>();

  for (const record of records) {
    let stats = byModel.get(record.model);
    if (!stats) {
      stats = emptyStats();
      byModel.set(record.model, stats);
    }

    if (isFailureRecord(record)) {
      stats.errorCount += 1;
      continue;
    }

    stats.successCount += 1;
    stats.totalScores.push(record.totalScore);
    stats.latencies.push(record.latency);
    if (record.ttfb !== undefined) {
      stats.ttfbs.push(record.ttfb);
    }

    for (const [dimension, group] of Object.entries(record.scores)) {
      const subScores: Readonly<Record<string, number>> = group;
      for (const [subMetric, value] of Object.entries(subScores)) {
        pushTo(stats.metricScores, `${dimension}_${subMetric}`, value);
      }
    }
  }

  return byModel;
}

export function summarizeModel(model: string, stats: ModelStats): ModelSummary {
  const attempts = stats.successCount + stats.errorCount;
  const averageLatency = average(stats.latencies);

  return {
    model,
    successRate: attempts > 0 ? (stats.successCount / attempts) * 100 : 0,
    averageScore: average(stats.totalScores),
    averageLatency,
    averageTtfb: stats.ttfbs.length > 0 ? average(stats.ttfbs) : averageLatency,
    successCount: stats.successCount,
    errorCount: stats.errorCount,
  };
}

/** Model names in report order */
export function sortedModels(byModel: ReadonlyMap<string, ModelStats>): string[] {
  return Array.from(byModel.keys()).sort(compareStrings);
}

/**
 * Models with at least one scored record, best mean total first.
 * Equal means are ordered by model name.
 */
export function rankModels(
  byModel: ReadonlyMap<string, ModelStats>,
): ModelSummary[] {
  const ranked: ModelSummary[] = [];
  for (const [model, stats] of byModel) {
    if (stats.totalScores.length > 0) {
      ranked.push(summarizeModel(model, stats));
    }
  }

  return ranked.sort(
    (a, b) =>
      b.averageScore - a.averageScore || compareStrings(a.model, b.model),
  );
}

/** Records per test-case id, ids ascending, arrival order kept within a case */
export function groupByTestCase(
  records: readonly EvaluationRecord[],
): Map<string, EvaluationRecord[]> {
  const byCase = new Map<string, EvaluationRecord[]>();
  for (const record of records) {
    const list = byCase.get(record.testCaseId);
    if (list) {
      list.push(record);
    } else {
      byCase.set(record.testCaseId, [record]);
    }
  }

  return new Map(
    Array.from(byCase.entries()).sort(([a], [b]) => compareStrings(a, b)),
  );
}

/**
 * Union of the sub-metrics any model reported for a dimension,
 * sorted by display label.
 */
export function dimensionColumns(
  dimension: DimensionName,
  byModel: ReadonlyMap<string, ModelStats>,
): MetricColumn[] {
  const prefix = `${dimension}_`;
  const keys = new Set<string>();

  for (const stats of byModel.values()) {
    for (const metricKey of stats.metricScores.keys()) {
      if (metricKey.startsWith(prefix)) {
        keys.add(metricKey.slice(prefix.length));
      }
    }
  }

  return Array.from(keys)
    .map((key) => ({ key, label: METRIC_LABELS[key] ?? key }))
    .sort((a, b) => compareStrings(a.label, b.label));
}

/** Mean of one sub-metric for a model, undefined when never observed */
export function metricAverage(
  stats: ModelStats,
  dimension: DimensionName,
  subMetric: string,
): number | undefined {
  const values = stats.metricScores.get(`${dimension}_${subMetric}`);
  return values && values.length > 0 ? average(values) : undefined;
}
