import type { ChatMessage, ModelResponse } from '../types.js';

export const PROVIDER_NAMES = [
  'dashscope',
  'deepseek',
  'zhipu',
  'doubao',
  'moonshot',
  'openai',
  'baidu',
] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: unknown): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/** One entry of the models file */
export interface ModelConfig {
  /** Display name used in records and reports */
  readonly name: string;
  readonly provider: ProviderName;
  readonly modelId: string;
  /** Overrides the provider's default endpoint */
  readonly apiBase?: string;
  readonly apiKey?: string;
  /** Environment variable holding the API key */
  readonly apiKeyEnv?: string;
  /** ERNIE only */
  readonly secretKey?: string;
  readonly secretKeyEnv?: string;
  /** Where to obtain a key, shown when credentials are missing */
  readonly recommendedKeyLocation?: string;
  readonly enabled?: boolean;
}

export interface ModelsConfig {
  readonly models: Readonly<Record<string, ModelConfig>>;
}

export interface ChatOptions {
  /** Stream the reply to measure time to first token */
  readonly stream: boolean;
  readonly temperature?: number;
  readonly maxTokens?: number;
}

export interface ConfigCheck {
  readonly ok: boolean;
  /** Names of missing settings */
  readonly missing: readonly string[];
  readonly hint?: string;
}

/**
 * A chat backend under evaluation.
 * chat() never rejects: transport and API problems come back as failures.
 */
export interface ModelClient {
  readonly name: string;
  readonly provider: ProviderName;
  checkConfig(): ConfigCheck;
  chat(messages: readonly ChatMessage[], options: ChatOptions): Promise<ModelResponse>;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Monotonic milliseconds */
export type Clock = () => number;

export function elapsedSeconds(startMs: number, endMs: number): number {
  return Math.max(0, endMs - startMs) / 1000;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
