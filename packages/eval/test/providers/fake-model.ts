import type {
  LanguageModelV2,
  LanguageModelV2CallOptions,
  LanguageModelV2StreamPart,
} from '@ai-sdk/provider';

export interface FakeModelScript {
  /** Full reply for generateText */
  text?: string;
  /** Text deltas for streamText */
  deltas?: string[];
  usage?: { inputTokens: number; outputTokens: number };
  failWith?: Error;
}

/** In-process LanguageModelV2 that replays a scripted reply */
export function fakeLanguageModel(script: FakeModelScript): {
  model: LanguageModelV2;
  calls: LanguageModelV2CallOptions[];
} {
  const calls: LanguageModelV2CallOptions[] = [];
  const inputTokens = script.usage?.inputTokens ?? 0;
  const outputTokens = script.usage?.outputTokens ?? 0;
  const usage = {
    inputTokens,
    outputTokens,
    totalTokens: inputTokens + outputTokens,
  };

  const model: LanguageModelV2 = {
    specificationVersion: 'v2',
    provider: 'fake',
    modelId: 'fake-model',
    supportedUrls: {},
    doGenerate: async (options) => {
      calls.push(options);
      if (script.failWith) {
        throw script.failWith;
      }
      return {
        content: [{ type: 'text', text: script.text ?? '' }],
        finishReason: 'stop',
        usage,
        warnings: [],
      };
    },
    doStream: async (options) => {
      calls.push(options);
      if (script.failWith) {
        throw script.failWith;
      }
      const parts: LanguageModelV2StreamPart[] = [
        { type: 'stream-start', warnings: [] },
        { type: 'text-start', id: 't1' },
        ...(script.deltas ?? []).map(
          (delta): LanguageModelV2StreamPart => ({ type: 'text-delta', id: 't1', delta }),
        ),
        { type: 'text-end', id: 't1' },
        { type: 'finish', finishReason: 'stop', usage },
      ];
      return {
        stream: new ReadableStream<LanguageModelV2StreamPart>({
          start(controller) {
            for (const part of parts) {
              controller.enqueue(part);
            }
            controller.close();
          },
        }),
      };
    },
  };

  return { model, calls };
}
