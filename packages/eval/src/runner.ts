import { Evaluator } from './evaluator.js';
import { createModelClient } from './providers/registry.js';
import type { ModelClient, ModelConfig, ModelsConfig } from './providers/types.js';
import type {
  ChatMessage,
  EvaluationCriteria,
  EvaluationRecord,
  TestCase,
  TestSuite,
} from './types.js';
import { logger } from './utils/logger.js';

export const TUTOR_SYSTEM_PROMPT = `You are a professional children's English speaking teacher who teaches children aged 3-6.

How you teach:
1. Use simple, fun language that suits young children
2. Stay warm and friendly, patient and encouraging
3. Make lessons lively with stories, games and interaction
4. Adjust the difficulty to the child's age and level
5. Correct mistakes gently: encourage first, then correct
6. Keep every reply suitable for children aged 3-6

Reply in English. Simple Chinese may be used to help the child understand.`;

export const CHAT_TEMPERATURE = 0.7;
export const CHAT_MAX_TOKENS = 500;

export type RunProgressEvent =
  | {
      readonly type: 'case-start';
      readonly testCase: TestCase;
      readonly caseIndex: number;
      readonly caseCount: number;
    }
  | {
      readonly type: 'model-start';
      readonly testCase: TestCase;
      readonly modelKey: string;
      readonly modelName: string;
      /** 1-based position among all (case, model) pairs */
      readonly current: number;
      readonly total: number;
    }
  | {
      readonly type: 'model-done';
      readonly testCase: TestCase;
      readonly modelKey: string;
      readonly modelName: string;
      readonly current: number;
      readonly total: number;
      readonly record: EvaluationRecord;
    };

export interface TestRunnerOptions {
  modelsConfig: ModelsConfig;
  testSuite: TestSuite;
  criteria: EvaluationCriteria;
  /** Stream replies to measure time to first token (default: true) */
  stream?: boolean;
  evaluator?: Evaluator;
  /** Client factory (default: pick by provider tag) */
  createClient?: (config: ModelConfig) => ModelClient;
  onProgress?: (event: RunProgressEvent) => void;
}

export interface RunSelection {
  /** Model keys to call (default: every initialized client) */
  modelKeys?: readonly string[];
  /** Test case ids to run (default: all) */
  testCaseIds?: readonly string[];
}

/**
 * Runs every selected test case against every selected model.
 *
 * Calls are strictly sequential so that one latency sample is never
 * measured while another request is in flight.
 */
export class TestRunner {
  private readonly options: TestRunnerOptions;
  private readonly evaluator: Evaluator;
  private readonly clients = new Map<string, ModelClient>();

  constructor(options: TestRunnerOptions) {
    this.options = options;
    this.evaluator = options.evaluator ?? new Evaluator(options.criteria);
  }

  get testSuite(): TestSuite {
    return this.options.testSuite;
  }

  /** Keys of models whose client is ready */
  get readyModels(): string[] {
    return Array.from(this.clients.keys());
  }

  modelName(modelKey: string): string {
    return this.options.modelsConfig.models[modelKey]?.name ?? modelKey;
  }

  /**
   * Creates a client per model key and checks its configuration.
   * With no keys given, every model not marked `enabled: false` is tried.
   */
  initializeClients(modelKeys?: readonly string[]): Record<string, boolean> {
    const models = this.options.modelsConfig.models;
    const keys =
      modelKeys ??
      Object.keys(models).filter((key) => models[key]?.enabled !== false);
    const createClient =
      this.options.createClient ?? ((config: ModelConfig) => createModelClient(config));
    const status: Record<string, boolean> = {};

    for (const key of keys) {
      const config = models[key];
      if (!config) {
        logger.warn(`Model "${key}" is not configured`);
        status[key] = false;
        continue;
      }

      let client: ModelClient;
      try {
        client = createClient(config);
      } catch (error) {
        logger.error(
          `${config.name}: failed to create client: ${
            error instanceof Error ? error.message : String(error)
          }`,
        );
        status[key] = false;
        continue;
      }

      const check = client.checkConfig();
      if (!check.ok) {
        logger.error(
          `${config.name}: incomplete configuration (missing ${check.missing.join(', ')})`,
        );
        if (check.hint) {
          logger.info(`  Get a key at: ${check.hint}`);
        }
        status[key] = false;
        continue;
      }

      this.clients.set(key, client);
      status[key] = true;
      logger.success(`${config.name} ready`);
    }

    return status;
  }

  buildSystemPrompt(testCase?: TestCase): string {
    return testCase?.context
      ? `${TUTOR_SYSTEM_PROMPT}\n\nCurrent scene: ${testCase.context}`
      : TUTOR_SYSTEM_PROMPT;
  }

  buildMessages(testCase: TestCase): ChatMessage[] {
    return [
      { role: 'system', content: this.buildSystemPrompt(testCase) },
      { role: 'user', content: testCase.userInput },
    ];
  }

  /** Always resolves to exactly one record */
  async runTestCase(testCase: TestCase, modelKey: string): Promise<EvaluationRecord> {
    const client = this.clients.get(modelKey);
    if (!client) {
      return this.evaluator.evaluateResponse(
        testCase,
        { ok: false, error: `Model "${modelKey}" is not initialized` },
        this.modelName(modelKey),
      );
    }

    const response = await client.chat(this.buildMessages(testCase), {
      stream: this.options.stream ?? true,
      temperature: CHAT_TEMPERATURE,
      maxTokens: CHAT_MAX_TOKENS,
    });
    return this.evaluator.evaluateResponse(testCase, response, client.name);
  }

  /** Case-major order: every model answers a case before the next case starts */
  async runAllTests(selection: RunSelection = {}): Promise<EvaluationRecord[]> {
    const modelKeys = selection.modelKeys ?? this.readyModels;
    const wanted = selection.testCaseIds;
    const testCases = wanted
      ? this.testSuite.testCases.filter((testCase) => wanted.includes(testCase.id))
      : this.testSuite.testCases;

    const total = testCases.length * modelKeys.length;
    const emit = this.options.onProgress ?? (() => undefined);
    const records: EvaluationRecord[] = [];
    let current = 0;

    logger.debug('Starting test run', {
      testCases: testCases.length,
      models: modelKeys.length,
      total,
    });

    for (const [caseIndex, testCase] of testCases.entries()) {
      emit({ type: 'case-start', testCase, caseIndex, caseCount: testCases.length });

      for (const modelKey of modelKeys) {
        current += 1;
        const modelName = this.modelName(modelKey);
        emit({ type: 'model-start', testCase, modelKey, modelName, current, total });

        const record = await this.runTestCase(testCase, modelKey);
        records.push(record);

        emit({
          type: 'model-done',
          testCase,
          modelKey,
          modelName,
          current,
          total,
          record,
        });
      }
    }

    return records;
  }
}
