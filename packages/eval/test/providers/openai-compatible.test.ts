import { describe, expect, it } from 'vitest';

import { OpenAICompatibleClient } from '../../src/providers/openai-compatible.js';
import type { ChatMessage } from '../../src/types.js';
import { sequenceClock } from '../fixtures.js';
import { fakeLanguageModel, type FakeModelScript } from './fake-model.js';

const messages: ChatMessage[] = [
  { role: 'system', content: 'You are a friendly tutor.' },
  { role: 'user', content: 'Hello!' },
];

function clientFor(script: FakeModelScript, readings: number[], apiKey: string | undefined = 'test-key') {
  const fake = fakeLanguageModel(script);
  const client = new OpenAICompatibleClient({
    name: 'Fake GPT',
    provider: 'openai',
    modelId: 'fake-model',
    apiBase: 'https://llm.test/v1',
    apiKey,
    recommendedKeyLocation: 'https://llm.test/keys',
    languageModel: fake.model,
    clock: sequenceClock(...readings),
  });
  return { client, calls: fake.calls };
}

describe('OpenAICompatibleClient.checkConfig', () => {
  it('reports a missing key with the key hint', () => {
    const { client } = clientFor({}, [0], undefined);

    expect(client.checkConfig()).toEqual({
      ok: false,
      missing: ['apiKey'],
      hint: 'https://llm.test/keys',
    });
  });
});

describe('OpenAICompatibleClient.chat', () => {
  it('fails without calling the model when the key is missing', async () => {
    const { client, calls } = clientFor({ text: 'unused' }, [0], undefined);

    expect(await client.chat(messages, { stream: false })).toEqual({
      ok: false,
      error: 'Incomplete configuration: missing apiKey',
    });
    expect(calls).toHaveLength(0);
  });

  it('measures a plain request and reports TTFB equal to latency', async () => {
    const { client, calls } = clientFor(
      { text: 'Hello there!', usage: { inputTokens: 12, outputTokens: 8 } },
      [1000, 1800],
    );

    const response = await client.chat(messages, {
      stream: false,
      temperature: 0.7,
      maxTokens: 500,
    });

    expect(response).toEqual({
      ok: true,
      content: 'Hello there!',
      latency: 0.8,
      ttfb: 0.8,
      tokens: { promptTokens: 12, completionTokens: 8, totalTokens: 20 },
    });
    expect(calls[0]?.temperature).toBe(0.7);
    expect(calls[0]?.maxOutputTokens).toBe(500);
  });

  it('times the first streamed token', async () => {
    const { client } = clientFor(
      { deltas: ['Hello', ' there!'], usage: { inputTokens: 12, outputTokens: 8 } },
      [1000, 1250, 2200],
    );

    const response = await client.chat(messages, { stream: true });

    expect(response).toEqual({
      ok: true,
      content: 'Hello there!',
      latency: 1.2,
      ttfb: 0.25,
      tokens: { promptTokens: 12, completionTokens: 8, totalTokens: 20 },
    });
  });

  it('uses the total latency as TTFB when the stream carries no text', async () => {
    const { client } = clientFor({ deltas: [] }, [1000, 1500]);

    const response = await client.chat(messages, { stream: true });

    expect(response).toMatchObject({ ok: true, content: '', latency: 0.5, ttfb: 0.5 });
  });

  it('turns a rejected request into a failure', async () => {
    const { client } = clientFor({ failWith: new Error('boom') }, [1000, 1400]);

    expect(await client.chat(messages, { stream: false })).toEqual({
      ok: false,
      error: 'Request failed: boom',
      latency: 0.4,
    });
  });

  it('turns a failed stream into a failure', async () => {
    const { client } = clientFor({ failWith: new Error('stream down') }, [1000, 1300]);

    const response = await client.chat(messages, { stream: true });

    expect(response).toEqual({ ok: false, error: 'Request failed: stream down', latency: 0.3 });
  });
});
