/** Rubric dimensions, in report order */
export const DIMENSION_NAMES = [
  'language_ability',
  'teaching_adaptability',
  'response_performance',
  'safety_compliance',
  'cost_efficiency',
] as const;

export type DimensionName = (typeof DIMENSION_NAMES)[number];

export function isDimensionName(value: string): value is DimensionName {
  return DIMENSION_NAMES.some((name) => name === value);
}

/** Scripted conversation turn the tutor must answer */
export interface TestCase {
  readonly id: string;
  readonly category: string;
  /** Child age in years, 3..6 */
  readonly ageLevel: number;
  readonly userInput: string;
  /** Scene description appended to the system prompt */
  readonly context?: string;
  readonly expectedKeywords: readonly string[];
}

export interface TestSuite {
  /** Free-form label such as "3-6" */
  readonly ageRange?: string;
  readonly testCases: readonly TestCase[];
}

export interface TokenUsage {
  readonly promptTokens?: number;
  readonly completionTokens?: number;
  readonly totalTokens?: number;
}

export interface ModelSuccess {
  readonly ok: true;
  readonly content: string;
  /** Seconds until the response completed */
  readonly latency: number;
  /** Seconds until the first token; absent means the same as latency */
  readonly ttfb?: number;
  readonly tokens: TokenUsage;
}

export interface ModelFailure {
  readonly ok: false;
  readonly error: string;
  readonly latency?: number;
}

/** What a provider client hands back for one chat call */
export type ModelResponse = ModelSuccess | ModelFailure;

export interface DimensionCriterion {
  readonly weight: number;
  readonly description?: string;
}

export interface EvaluationCriteria {
  /** Keyed by dimension name; unknown names never match a score group */
  readonly evaluationDimensions: Readonly<Record<string, DimensionCriterion>>;
  readonly scoringMethod: string;
}

/** Sub-metric groups are type aliases so they widen to Record<string, number> */
export type LanguageAbilityScores = {
  readonly pronunciation_accuracy: number;
  readonly grammar_correctness: number;
  readonly vocabulary_appropriateness: number;
  readonly expression_naturalness: number;
};

export type TeachingAdaptabilityScores = {
  readonly child_friendly_language: number;
  readonly interaction_quality: number;
  readonly personalization: number;
  readonly engagement: number;
};

export type ResponsePerformanceScores = {
  readonly ttfb: number;
  readonly latency: number;
  readonly latency_combined: number;
  readonly stability: number;
};

export type SafetyComplianceScores = {
  readonly content_filtering: number;
  readonly age_appropriateness: number;
};

export type CostEfficiencyScores = {
  readonly api_cost: number;
  readonly token_efficiency: number;
};

export type DimensionScores = {
  readonly language_ability: LanguageAbilityScores;
  readonly teaching_adaptability: TeachingAdaptabilityScores;
  readonly response_performance: ResponsePerformanceScores;
  readonly safety_compliance: SafetyComplianceScores;
  readonly cost_efficiency: CostEfficiencyScores;
};

export interface EvaluationSuccessRecord {
  readonly model: string;
  readonly testCaseId: string;
  readonly testCaseCategory: string;
  readonly testCaseAgeLevel: number;
  readonly content: string;
  readonly latency: number;
  /** Absent on loaded records that were saved without first-token timing */
  readonly ttfb?: number;
  readonly tokens: TokenUsage;
  readonly scores: DimensionScores;
  /** 0-10, rounded to 2 decimals */
  readonly totalScore: number;
  /** Dimensions that carried weight in totalScore */
  readonly weightedDimensions: readonly DimensionName[];
  readonly timestamp: string;
}

export interface EvaluationFailureRecord {
  readonly model: string;
  readonly testCaseId: string;
  readonly testCaseCategory?: string;
  readonly testCaseAgeLevel?: number;
  readonly error: string;
  readonly scores: Readonly<Record<string, never>>;
  readonly totalScore: 0;
  readonly timestamp: string;
}

export type EvaluationRecord = EvaluationSuccessRecord | EvaluationFailureRecord;

export function isFailureRecord(
  record: EvaluationRecord,
): record is EvaluationFailureRecord {
  return 'error' in record;
}

/** Persisted output of one run */
export interface ResultsDocument {
  readonly timestamp: string;
  readonly testConfig: {
    readonly ageRange?: string;
    readonly totalCases: number;
  };
  readonly results: readonly EvaluationRecord[];
}

export interface ChatMessage {
  readonly role: 'system' | 'user' | 'assistant';
  readonly content: string;
}
