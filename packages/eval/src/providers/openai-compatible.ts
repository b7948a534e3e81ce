import { createOpenAI } from '@ai-sdk/openai';
import {
  generateText,
  streamText,
  type LanguageModel,
  type LanguageModelUsage,
  type ModelMessage,
} from 'ai';

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

export interface OpenAICompatibleClientOptions {
  readonly name: string;
  readonly provider: ProviderName;
  readonly modelId: string;
  readonly apiBase: string;
  readonly apiKey?: string;
  readonly recommendedKeyLocation?: string;
  readonly timeoutMs?: number;
  /** Replaces the SDK model built from apiBase and apiKey */
  readonly languageModel?: LanguageModel;
  readonly clock?: Clock;
}

function toModelMessage(message: ChatMessage): ModelMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

function toTokenUsage(usage: LanguageModelUsage): TokenUsage {
  return {
    promptTokens: usage.inputTokens,
    completionTokens: usage.outputTokens,
    totalTokens: usage.totalTokens,
  };
}

/**
 * Chat-completions client for every vendor that speaks the OpenAI wire format
 * (DashScope compatible mode, DeepSeek, Zhipu, Doubao, Moonshot, OpenAI).
 */
export class OpenAICompatibleClient implements ModelClient {
  readonly name: string;
  readonly provider: ProviderName;
  private readonly options: OpenAICompatibleClientOptions;
  private readonly clock: Clock;
  private model: LanguageModel | undefined;

  constructor(options: OpenAICompatibleClientOptions) {
    this.name = options.name;
    this.provider = options.provider;
    this.options = options;
    this.clock = options.clock ?? (() => performance.now());
    this.model = options.languageModel;
  }

  checkConfig(): ConfigCheck {
    const missing: string[] = [];
    if (!this.options.apiKey) missing.push('apiKey');
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

    return options.stream
      ? this.chatStreaming(messages, options)
      : this.chatOnce(messages, options);
  }

  private languageModel(): LanguageModel {
    this.model ??= createOpenAI({
      baseURL: this.options.apiBase,
      apiKey: this.options.apiKey,
    }).chat(this.options.modelId);
    return this.model;
  }

  private async chatOnce(
    messages: readonly ChatMessage[],
    options: ChatOptions,
  ): Promise<ModelResponse> {
    const startedAt = this.clock();
    try {
      const result = await generateText({
        model: this.languageModel(),
        messages: messages.map(toModelMessage),
        temperature: options.temperature,
        maxOutputTokens: options.maxTokens,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(
          this.options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
        ),
      });
      const latency = elapsedSeconds(startedAt, this.clock());

      return {
        ok: true,
        content: result.text,
        latency,
        // without streaming the first token arrives with the whole reply
        ttfb: latency,
        tokens: toTokenUsage(result.usage),
      };
    } catch (error) {
      return {
        ok: false,
        error: `Request failed: ${describeError(error)}`,
        latency: elapsedSeconds(startedAt, this.clock()),
      };
    }
  }

  private async chatStreaming(
    messages: readonly ChatMessage[],
    options: ChatOptions,
  ): Promise<ModelResponse> {
    const startedAt = this.clock();
    let streamError: unknown;

    try {
      const result = streamText({
        model: this.languageModel(),
        messages: messages.map(toModelMessage),
        temperature: options.temperature,
        maxOutputTokens: options.maxTokens,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(
          this.options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
        ),
        onError: ({ error }) => {
          streamError = error;
        },
      });

      const parts: string[] = [];
      let firstTokenAt: number | undefined;
      for await (const delta of result.textStream) {
        if (delta.length === 0) continue;
        firstTokenAt ??= this.clock();
        parts.push(delta);
      }
      const finishedAt = this.clock();

      if (streamError !== undefined) {
        return {
          ok: false,
          error: `Request failed: ${describeError(streamError)}`,
          latency: elapsedSeconds(startedAt, finishedAt),
        };
      }

      const latency = elapsedSeconds(startedAt, finishedAt);
      return {
        ok: true,
        content: parts.join(''),
        latency,
        ttfb:
          firstTokenAt === undefined
            ? latency
            : elapsedSeconds(startedAt, firstTokenAt),
        tokens: toTokenUsage(await result.usage),
      };
    } catch (error) {
      return {
        ok: false,
        error: `Request failed: ${describeError(streamError ?? error)}`,
        latency: elapsedSeconds(startedAt, this.clock()),
      };
    }
  }
}
