import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type {
  ConfigCheck,
  ModelClient,
  ModelConfig,
  ModelResponse,
  WorkbookLike,
} from "@tutor-eval/eval";
import type { CliDependencies } from "../src/cli.js";

export const FIXED_TIME = new Date("2026-03-01T09:30:00.000Z");

export const MODELS_YAML = `models:
  alpha:
    name: Alpha
    provider: openai
    modelId: gpt-test
  beta:
    name: Beta
    provider: deepseek
    modelId: ds-test
    recommendedKeyLocation: https://keys.test/deepseek
    enabled: false
`;

export const TEST_CASES_YAML = `ageRange: "3-6"
testCases:
  - id: greeting-01
    category: greeting
    ageLevel: 4
    userInput: Hello teacher!
    expectedKeywords: [hello]
  - id: story-01
    category: story
    ageLevel: 5
    userInput: Tell me a story
`;

export const CRITERIA_YAML = `evaluationDimensions:
  language_ability: { weight: 0.25 }
  teaching_adaptability: { weight: 0.3 }
  response_performance: { weight: 0.2 }
  safety_compliance: { weight: 0.15 }
  cost_efficiency: { weight: 0.1 }
scoringMethod: weighted_average
`;

export function createTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Writes the three config files into `<root>/config`
 */
export function writeConfigDir(root: string, models: string = MODELS_YAML): string {
  const configDir = path.join(root, "config");
  fs.mkdirSync(configDir, { recursive: true });
  fs.writeFileSync(path.join(configDir, "models.yaml"), models, "utf8");
  fs.writeFileSync(path.join(configDir, "test-cases.yaml"), TEST_CASES_YAML, "utf8");
  fs.writeFileSync(path.join(configDir, "evaluation-criteria.yaml"), CRITERIA_YAML, "utf8");
  return configDir;
}

export function createMockClient(
  config: ModelConfig,
  reply: ModelResponse,
  check: ConfigCheck = { ok: true, missing: [] }
): ModelClient {
  return {
    name: config.name,
    provider: config.provider,
    checkConfig: () => check,
    chat: async () => reply,
  };
}

export interface MockState {
  chats: string[];
  workbookFiles: string[];
}

/**
 * CLI dependencies with in-process model clients and workbook
 */
export function createMockDeps(
  reply: ModelResponse = {
    ok: true,
    content: "Hello! What is your name?",
    latency: 1,
    ttfb: 0.5,
    tokens: { totalTokens: 60 },
  }
): { deps: CliDependencies; state: MockState } {
  const state: MockState = { chats: [], workbookFiles: [] };
  const workbook: WorkbookLike = {
    addWorksheet: () => ({ addRow: () => undefined }),
    xlsx: {
      writeFile: async (filePath) => {
        state.workbookFiles.push(filePath);
      },
    },
  };

  const deps: CliDependencies = {
    createClient: (config) => {
      const client = createMockClient(config, reply);
      return {
        ...client,
        chat: async (messages, options) => {
          state.chats.push(config.name);
          return client.chat(messages, options);
        },
      };
    },
    loadWorkbook: async () => workbook,
    env: {},
    clock: () => FIXED_TIME,
  };

  return { deps, state };
}
