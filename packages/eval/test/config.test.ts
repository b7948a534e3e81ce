import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  ConfigEntryError,
  emptyCriteria,
  loadCriteria,
  loadModelsConfig,
  loadTestSuite,
  parseModelConfig,
  parseTestCase,
  resolveConfigPaths,
} from '../src/config.js';
import { logger } from '../src/utils/logger.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'tutor-config-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

async function write(name: string, content: string): Promise<string> {
  const file = join(dir, name);
  await writeFile(file, content, 'utf-8');
  return file;
}

describe('resolveConfigPaths', () => {
  it('prefers .yaml, accepts .json and defaults to .yaml', async () => {
    await write('models.yaml', 'models: {}');
    await write('models.json', '{"models": {}}');
    await write('test-cases.json', '{"testCases": []}');

    expect(await resolveConfigPaths(dir)).toEqual({
      models: join(dir, 'models.yaml'),
      testCases: join(dir, 'test-cases.json'),
      criteria: join(dir, 'evaluation-criteria.yaml'),
    });
  });

  it('takes .yml before .json', async () => {
    await write('evaluation-criteria.yml', 'evaluationDimensions: {}');
    await write('evaluation-criteria.json', '{"evaluationDimensions": {}}');

    expect((await resolveConfigPaths(dir)).criteria).toBe(join(dir, 'evaluation-criteria.yml'));
  });
});

describe('parseTestCase', () => {
  it('defaults keywords and leaves out an empty context', () => {
    expect(
      parseTestCase({ id: 'g1', category: 'greeting', ageLevel: 3, userInput: 'Hi', context: '' }),
    ).toEqual({
      id: 'g1',
      category: 'greeting',
      ageLevel: 3,
      userInput: 'Hi',
      context: undefined,
      expectedKeywords: [],
    });
  });

  it('rejects a fractional age', () => {
    expect(() =>
      parseTestCase({ id: 'g1', category: 'greeting', ageLevel: 3.5, userInput: 'Hi' }),
    ).toThrow(new ConfigEntryError('"ageLevel" must be an integer'));
  });

  it('rejects non-string keywords', () => {
    expect(() =>
      parseTestCase({
        id: 'g1',
        category: 'greeting',
        ageLevel: 3,
        userInput: 'Hi',
        expectedKeywords: ['ok', 3],
      }),
    ).toThrow('"expectedKeywords" must be a list of strings');
  });
});

describe('loadTestSuite', () => {
  it('loads cases and skips invalid or duplicate ones', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const file = await write(
      'test-cases.yaml',
      [
        'ageRange: 3-6',
        'testCases:',
        '  - id: greeting-01',
        '    category: greeting',
        '    ageLevel: 4',
        '    userInput: "Hello!"',
        '    context: Morning class',
        '    expectedKeywords: [hello]',
        '  - id: greeting-01',
        '    category: greeting',
        '    ageLevel: 5',
        '    userInput: Again',
        '  - id: broken',
        '    ageLevel: 4',
        '    userInput: No category',
      ].join('\n'),
    );

    const suite = await loadTestSuite(file);

    expect(suite).toEqual({
      ageRange: '3-6',
      testCases: [
        {
          id: 'greeting-01',
          category: 'greeting',
          ageLevel: 4,
          userInput: 'Hello!',
          context: 'Morning class',
          expectedKeywords: ['hello'],
        },
      ],
    });
    expect(warn.mock.calls).toEqual([
      ['Skipping test case #2: duplicate id "greeting-01"'],
      ['Skipping test case #3: "category" must be a non-empty string'],
    ]);
  });

  it('reads a missing file as an empty suite', async () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => {});
    const file = join(dir, 'test-cases.yaml');

    expect(await loadTestSuite(file)).toEqual({ testCases: [] });
    expect(error).toHaveBeenCalledWith(`Test case file not found: ${file}`);
  });

  it('reads an unparsable file as an empty suite', async () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => {});
    const file = await write('test-cases.yaml', 'testCases: [unclosed');

    expect(await loadTestSuite(file)).toEqual({ testCases: [] });
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe('loadCriteria', () => {
  it('loads weights and skips negative ones', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const file = await write(
      'evaluation-criteria.json',
      JSON.stringify({
        evaluationDimensions: {
          language_ability: { weight: 0.25, description: 'Language' },
          safety_compliance: { weight: -1 },
        },
        scoringMethod: 'weighted_average',
      }),
    );

    expect(await loadCriteria(file)).toEqual({
      evaluationDimensions: {
        language_ability: { weight: 0.25, description: 'Language' },
      },
      scoringMethod: 'weighted_average',
    });
    expect(warn).toHaveBeenCalledWith(
      'Skipping evaluation dimension "safety_compliance": "weight" must be a non-negative number',
    );
  });

  it('reads an empty file as empty criteria', async () => {
    const file = await write('evaluation-criteria.yaml', '');
    expect(await loadCriteria(file)).toEqual(emptyCriteria());
  });
});

describe('parseModelConfig', () => {
  it('defaults the name to the key and drops empty strings', () => {
    expect(
      parseModelConfig('qwen', { provider: 'dashscope', modelId: 'qwen-plus', apiKey: '' }),
    ).toEqual({
      name: 'qwen',
      provider: 'dashscope',
      modelId: 'qwen-plus',
      apiBase: undefined,
      apiKey: undefined,
      apiKeyEnv: undefined,
      secretKey: undefined,
      secretKeyEnv: undefined,
      recommendedKeyLocation: undefined,
      enabled: undefined,
    });
  });

  it('rejects an unknown provider', () => {
    expect(() => parseModelConfig('x', { provider: 'acme', modelId: 'm' })).toThrow(
      'unknown provider "acme" (expected one of: dashscope, deepseek, zhipu, doubao, moonshot, openai, baidu)',
    );
  });

  it('rejects a non-boolean enabled flag', () => {
    expect(() =>
      parseModelConfig('x', { provider: 'openai', modelId: 'm', enabled: 'yes' }),
    ).toThrow('"enabled" must be a boolean');
  });
});

describe('loadModelsConfig', () => {
  it('keeps valid models and warns about the rest', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const file = await write(
      'models.yaml',
      [
        'models:',
        '  glm:',
        '    name: GLM-4',
        '    provider: zhipu',
        '    modelId: glm-4-flash',
        '    apiKeyEnv: TEST_GLM_KEY',
        '    enabled: false',
        '  nameless:',
        '    provider: deepseek',
      ].join('\n'),
    );

    const { models } = await loadModelsConfig(file);

    expect(Object.keys(models)).toEqual(['glm']);
    expect(models['glm']).toMatchObject({
      name: 'GLM-4',
      provider: 'zhipu',
      modelId: 'glm-4-flash',
      apiKeyEnv: 'TEST_GLM_KEY',
      enabled: false,
    });
    expect(warn).toHaveBeenCalledWith(
      'Skipping model "nameless": "modelId" must be a non-empty string',
    );
  });

  it('logs a models field that is not a mapping', async () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => {});
    const file = await write('models.yaml', 'models: [a, b]');

    expect(await loadModelsConfig(file)).toEqual({ models: {} });
    expect(error).toHaveBeenCalledWith(`"models" in ${file} must be a mapping`);
  });
});
