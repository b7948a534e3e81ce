/**
 * Configuration loading
 *
 * Models, test cases and evaluation criteria are YAML documents
 * (JSON is valid YAML, so .json files load the same way).
 * A missing or malformed file is logged and read as empty;
 * invalid entries in a valid file are skipped with a warning.
 */
import { access, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import YAML from 'yaml';

import { DEFAULT_SCORING_METHOD } from './evaluator.js';
import {
  isProviderName,
  PROVIDER_NAMES,
  type ModelConfig,
  type ModelsConfig,
} from './providers/types.js';
import type {
  DimensionCriterion,
  EvaluationCriteria,
  TestCase,
  TestSuite,
} from './types.js';
import { logger } from './utils/logger.js';

export const MODELS_FILE = 'models';
export const TEST_CASES_FILE = 'test-cases';
export const CRITERIA_FILE = 'evaluation-criteria';

export interface ConfigPaths {
  readonly models: string;
  readonly testCases: string;
  readonly criteria: string;
}

/** Thrown for a config entry that cannot be used */
export class ConfigEntryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigEntryError';
  }
}

// --- Reading ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasCode(err: unknown, code: string): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && err.code === code;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * First of `<base>.yaml`, `<base>.yml`, `<base>.json`; the .yaml path when none exists
 * so that the loader reports it as missing.
 */
async function pickConfigFile(configDir: string, base: string): Promise<string> {
  for (const ext of ['.yaml', '.yml', '.json']) {
    const candidate = join(configDir, `${base}${ext}`);
    if (await exists(candidate)) {
      return candidate;
    }
  }
  return join(configDir, `${base}.yaml`);
}

export async function resolveConfigPaths(configDir: string): Promise<ConfigPaths> {
  return {
    models: await pickConfigFile(configDir, MODELS_FILE),
    testCases: await pickConfigFile(configDir, TEST_CASES_FILE),
    criteria: await pickConfigFile(configDir, CRITERIA_FILE),
  };
}

/**
 * Parses a YAML/JSON document into a mapping.
 * Returns undefined, after logging, when the file is missing or unusable.
 */
async function readConfigDocument(
  filePath: string,
  label: string,
): Promise<Record<string, unknown> | undefined> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (hasCode(err, 'ENOENT')) {
      logger.error(`${label} file not found: ${filePath}`);
    } else {
      logger.error(`Failed to read ${label} file ${filePath}: ${describe(err)}`);
    }
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    logger.error(`Failed to parse ${label} file ${filePath}: ${describe(err)}`);
    return undefined;
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    logger.error(`${label} file ${filePath} must contain a mapping`);
    return undefined;
  }
  return parsed;
}

// --- Field helpers ---

function requiredString(entry: Record<string, unknown>, key: string): string {
  const value = entry[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigEntryError(`"${key}" must be a non-empty string`);
  }
  return value;
}

function optionalString(entry: Record<string, unknown>, key: string): string | undefined {
  const value = entry[key];
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigEntryError(`"${key}" must be a string`);
  }
  return value;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// --- Test cases ---

export function parseTestCase(value: unknown): TestCase {
  if (!isRecord(value)) {
    throw new ConfigEntryError('test case must be a mapping');
  }

  const ageLevel = value['ageLevel'];
  if (typeof ageLevel !== 'number' || !Number.isInteger(ageLevel)) {
    throw new ConfigEntryError('"ageLevel" must be an integer');
  }

  const keywords = value['expectedKeywords'] ?? [];
  if (
    !Array.isArray(keywords) ||
    !keywords.every((keyword: unknown) => typeof keyword === 'string')
  ) {
    throw new ConfigEntryError('"expectedKeywords" must be a list of strings');
  }
  const expectedKeywords: string[] = keywords.filter(
    (keyword: unknown): keyword is string => typeof keyword === 'string',
  );

  return {
    id: requiredString(value, 'id'),
    category: requiredString(value, 'category'),
    ageLevel,
    userInput: requiredString(value, 'userInput'),
    context: optionalString(value, 'context'),
    expectedKeywords,
  };
}

export async function loadTestSuite(filePath: string): Promise<TestSuite> {
  const document = await readConfigDocument(filePath, 'Test case');
  if (!document) {
    return { testCases: [] };
  }

  const raw = document['testCases'] ?? [];
  if (!Array.isArray(raw)) {
    logger.error(`"testCases" in ${filePath} must be a list`);
    return { testCases: [] };
  }

  const testCases: TestCase[] = [];
  const seen = new Set<string>();
  raw.forEach((item: unknown, index) => {
    try {
      const testCase = parseTestCase(item);
      if (seen.has(testCase.id)) {
        throw new ConfigEntryError(`duplicate id "${testCase.id}"`);
      }
      seen.add(testCase.id);
      testCases.push(testCase);
    } catch (err) {
      if (!(err instanceof ConfigEntryError)) throw err;
      logger.warn(`Skipping test case #${index + 1}: ${err.message}`);
    }
  });

  const ageRange = document['ageRange'];
  return {
    ageRange:
      typeof ageRange === 'string' || typeof ageRange === 'number'
        ? String(ageRange)
        : undefined,
    testCases,
  };
}

// --- Criteria ---

export function parseCriterion(value: unknown): DimensionCriterion {
  if (!isRecord(value)) {
    throw new ConfigEntryError('criterion must be a mapping');
  }
  const weight = value['weight'];
  if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0) {
    throw new ConfigEntryError('"weight" must be a non-negative number');
  }
  return { weight, description: optionalString(value, 'description') };
}

export function emptyCriteria(): EvaluationCriteria {
  return { evaluationDimensions: {}, scoringMethod: DEFAULT_SCORING_METHOD };
}

export async function loadCriteria(filePath: string): Promise<EvaluationCriteria> {
  const document = await readConfigDocument(filePath, 'Evaluation criteria');
  if (!document) {
    return emptyCriteria();
  }

  const raw = document['evaluationDimensions'] ?? {};
  if (!isRecord(raw)) {
    logger.error(`"evaluationDimensions" in ${filePath} must be a mapping`);
    return emptyCriteria();
  }

  const evaluationDimensions: Record<string, DimensionCriterion> = {};
  for (const [name, value] of Object.entries(raw)) {
    try {
      evaluationDimensions[name] = parseCriterion(value);
    } catch (err) {
      if (!(err instanceof ConfigEntryError)) throw err;
      logger.warn(`Skipping evaluation dimension "${name}": ${err.message}`);
    }
  }

  const scoringMethod = document['scoringMethod'];
  return {
    evaluationDimensions,
    scoringMethod:
      typeof scoringMethod === 'string' ? scoringMethod : DEFAULT_SCORING_METHOD,
  };
}

// --- Models ---

export function parseModelConfig(key: string, value: unknown): ModelConfig {
  if (!isRecord(value)) {
    throw new ConfigEntryError('model entry must be a mapping');
  }

  const provider = value['provider'];
  if (!isProviderName(provider)) {
    throw new ConfigEntryError(
      `unknown provider ${JSON.stringify(provider)} (expected one of: ${PROVIDER_NAMES.join(', ')})`,
    );
  }

  const enabled = value['enabled'];
  if (enabled !== undefined && typeof enabled !== 'boolean') {
    throw new ConfigEntryError('"enabled" must be a boolean');
  }

  return {
    name: optionalString(value, 'name') ?? key,
    provider,
    modelId: requiredString(value, 'modelId'),
    apiBase: optionalString(value, 'apiBase'),
    apiKey: optionalString(value, 'apiKey'),
    apiKeyEnv: optionalString(value, 'apiKeyEnv'),
    secretKey: optionalString(value, 'secretKey'),
    secretKeyEnv: optionalString(value, 'secretKeyEnv'),
    recommendedKeyLocation: optionalString(value, 'recommendedKeyLocation'),
    enabled,
  };
}

export async function loadModelsConfig(filePath: string): Promise<ModelsConfig> {
  const document = await readConfigDocument(filePath, 'Models');
  if (!document) {
    return { models: {} };
  }

  const raw = document['models'] ?? {};
  if (!isRecord(raw)) {
    logger.error(`"models" in ${filePath} must be a mapping`);
    return { models: {} };
  }

  const models: Record<string, ModelConfig> = {};
  for (const [key, value] of Object.entries(raw)) {
    try {
      models[key] = parseModelConfig(key, value);
    } catch (err) {
      if (!(err instanceof ConfigEntryError)) throw err;
      logger.warn(`Skipping model "${key}": ${err.message}`);
    }
  }

  return { models };
}
