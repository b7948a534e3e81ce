import type { ChatMessage, ModelResponse, TokenUsage } from '../types.js';
import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  describeError,
  elapsedSeconds,
  type ChatOptions,
  type Clock,
  type ConfigCheck,
  type ModelClient,
  type ProviderName,
} from './types.js';

export const ERNIE_TOKEN_URL = 'https://aip.baidubce.com/oauth/2.0/token';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ErnieClientOptions {
  readonly name: string;
  readonly modelId: string;
  readonly apiBase: string;
  readonly apiKey?: string;
  readonly secretKey?: string;
  readonly recommendedKeyLocation?: string;
  readonly timeoutMs?: number;
  readonly fetch?: FetchLike;
  readonly clock?: Clock;
}

// --- Payload guards ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalInteger(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function parseUsage(value: unknown): TokenUsage {
  if (!isRecord(value)) {
    return {};
  }
  return {
    promptTokens: optionalInteger(value['prompt_tokens']),
    completionTokens: optionalInteger(value['completion_tokens']),
    totalTokens: optionalInteger(value['total_tokens']),
  };
}

type ErnieReply =
  | { readonly kind: 'result'; readonly content: string; readonly tokens: TokenUsage }
  | { readonly kind: 'error'; readonly message: string };

function parseChatPayload(payload: unknown): ErnieReply {
  if (!isRecord(payload)) {
    return { kind: 'error', message: 'Unexpected response body' };
  }
  if (payload['error_code'] !== undefined) {
    const message =
      typeof payload['error_msg'] === 'string' ? payload['error_msg'] : 'unknown error';
    return { kind: 'error', message: `API error ${String(payload['error_code'])}: ${message}` };
  }
  const result = payload['result'];
  if (typeof result !== 'string') {
    return { kind: 'error', message: 'Response has no "result" field' };
  }
  return { kind: 'result', content: result, tokens: parseUsage(payload['usage']) };
}

/**
 * Baidu ERNIE client.
 *
 * Exchanges the API key pair for an access token on every call, then posts a
 * non-streaming chat request. ERNIE takes the system prompt as a top-level
 * field and only user/assistant turns in messages.
 */
export class ErnieClient implements ModelClient {
  readonly name: string;
  readonly provider: ProviderName = 'baidu';
  private readonly options: ErnieClientOptions;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;

  constructor(options: ErnieClientOptions) {
    this.name = options.name;
    this.options = options;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.clock = options.clock ?? (() => performance.now());
  }

  checkConfig(): ConfigCheck {
    const missing: string[] = [];
    if (!this.options.apiKey) missing.push('apiKey');
    if (!this.options.secretKey) missing.push('secretKey');
    if (!this.options.modelId) missing.push('modelId');

    return {
      ok: missing.length === 0,
      missing,
      hint: this.options.recommendedKeyLocation,
    };
  }

  async chat(
    messages: readonly ChatMessage[],
    options: ChatOptions,
  ): Promise<ModelResponse> {
    const check = this.checkConfig();
    if (!check.ok) {
      return {
        ok: false,
        error: `Incomplete configuration: missing ${check.missing.join(', ')}`,
      };
    }

    let accessToken: string;
    try {
      accessToken = await this.fetchAccessToken();
    } catch (error) {
      return {
        ok: false,
        error: `Failed to obtain access token: ${describeError(error)}`,
      };
    }

    const system = messages
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n\n');
    const body = {
      messages: messages
        .filter((message) => message.role !== 'system')
        .map((message) => ({ role: message.role, content: message.content })),
      ...(system ? { system } : {}),
      ...(options.temperature !== undefined
        ? { temperature: options.temperature }
        : {}),
      ...(options.maxTokens !== undefined
        ? { max_output_tokens: options.maxTokens }
        : {}),
    };
    const url = `${this.options.apiBase}/${this.options.modelId}?access_token=${encodeURIComponent(accessToken)}`;

    const startedAt = this.clock();
    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs()),
      });
      const latency = elapsedSeconds(startedAt, this.clock());

      if (!response.ok) {
        return {
          ok: false,
          error: `API error: HTTP ${response.status}`,
          latency,
        };
      }

      const reply = parseChatPayload(await response.json());
      if (reply.kind === 'error') {
        return { ok: false, error: reply.message, latency };
      }

      return {
        ok: true,
        content: reply.content,
        latency,
        ttfb: latency,
        tokens: reply.tokens,
      };
    } catch (error) {
      return {
        ok: false,
        error: `Request failed: ${describeError(error)}`,
        latency: elapsedSeconds(startedAt, this.clock()),
      };
    }
  }

  private timeoutMs(): number {
    return this.options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  private async fetchAccessToken(): Promise<string> {
    const params = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.options.apiKey ?? '',
      client_secret: this.options.secretKey ?? '',
    });
    const response = await this.fetchImpl(`${ERNIE_TOKEN_URL}?${params.toString()}`, {
      method: 'POST',
      signal: AbortSignal.timeout(this.timeoutMs()),
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }

    const payload: unknown = await response.json();
    const token = isRecord(payload) ? payload['access_token'] : undefined;
    if (typeof token !== 'string') {
      throw new Error('token response has no access_token');
    }
    return token;
  }
}
