/**
 * Ollama Provider Tests
 *
 * The official client is kept real; only its fetch is replaced by an
 * in-process fake that records each call.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { createCanonicalRequest } from '@ai-relay/domain';
import type { CanonicalRequest, ModelRoute, StreamEvent } from '@ai-relay/domain';
import { OllamaProvider } from '../ollama/ollama.provider.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

interface RecordedCall {
  url: string;
  body: unknown;
}

const chatRoute: ModelRoute = {
  modelName: 'local-llama',
  providerId: 'ollama',
  dialect: 'chat_completions',
  endpointUrl: 'http://ollama.test:11434',
  upstreamModel: 'llama3',
};

const embedRoute: ModelRoute = {
  modelName: 'local-embed',
  providerId: 'ollama',
  dialect: 'embeddings',
  endpointUrl: 'http://ollama.test:11434',
  upstreamModel: 'nomic-embed-text',
};

function chatRequest(overrides: Partial<CanonicalRequest> = {}): CanonicalRequest {
  return createCanonicalRequest({
    model: 'local-llama',
    input: {
      kind: 'messages',
      messages: [
        { role: 'developer', content: 'Be brief.' },
        { role: 'user', content: 'Hi' },
      ],
    },
    stream: false,
    extraOptions: {},
    ...overrides,
  });
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function ndjsonResponse(lines: unknown[]): Response {
  return new Response(lines.map((line) => `${JSON.stringify(line)}\n`).join(''), {
    status: 200,
    headers: { 'content-type': 'application/x-ndjson' },
  });
}

async function collect(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const out: StreamEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('OllamaProvider', () => {
  let calls: RecordedCall[];
  let nextResponse: () => Response;

  const fakeFetch: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    calls.push({ url, body });
    return nextResponse();
  };

  const provider = new OllamaProvider({ id: 'ollama', fetch: fakeFetch });

  beforeEach(() => {
    calls = [];
  });

  it('maps a non-streaming chat call', async () => {
    nextResponse = () =>
      jsonResponse({
        model: 'llama3',
        created_at: '2024-05-01T00:00:00Z',
        message: { role: 'assistant', content: 'Hi!' },
        done: true,
        done_reason: 'stop',
        prompt_eval_count: 4,
        eval_count: 2,
      });

    const response = await provider.complete(
      chatRequest({ temperature: 0.5, extraOptions: { max_tokens: 32, stop: 'END' } }),
      chatRoute,
      new AbortController().signal,
    );

    expect(response.model).toBe('local-llama');
    expect(response.output).toEqual([{ type: 'output_text', text: 'Hi!' }]);
    expect(response.usage).toEqual({ promptTokens: 4, completionTokens: 2, totalTokens: 6 });
    expect(response.finishReason).toBe('stop');

    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('http://ollama.test:11434/api/chat');
    expect(calls[0]?.body).toMatchObject({
      model: 'llama3',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hi' },
      ],
      options: { temperature: 0.5, num_predict: 32, stop: ['END'] },
      stream: false,
    });
  });

  it('streams deltas and closes with usage from the final part', async () => {
    nextResponse = () =>
      ndjsonResponse([
        { model: 'llama3', message: { role: 'assistant', content: 'Hel' }, done: false },
        { model: 'llama3', message: { role: 'assistant', content: 'lo' }, done: false },
        {
          model: 'llama3',
          message: { role: 'assistant', content: '' },
          done: true,
          done_reason: 'stop',
          prompt_eval_count: 3,
          eval_count: 2,
        },
      ]);

    const events = await collect(
      await provider.openStream(chatRequest({ stream: true }), chatRoute, new AbortController().signal),
    );

    expect(events.map((e) => e.type)).toEqual([
      'response.started',
      'output_text.delta',
      'output_text.delta',
      'response.completed',
    ]);
    const last = events[3];
    expect(last?.type === 'response.completed' && last.payload.response.output).toEqual([
      { type: 'output_text', text: 'Hello' },
    ]);
    expect(last?.type === 'response.completed' && last.payload.response.usage).toEqual({
      promptTokens: 3,
      completionTokens: 2,
      totalTokens: 5,
    });
  });

  it('reports an error status from the daemon as upstream_error', async () => {
    nextResponse = () => jsonResponse({ error: "model 'llama3' not found" }, 404);

    await expect(provider.complete(chatRequest(), chatRoute, new AbortController().signal)).rejects.toMatchObject({
      kind: 'upstream_error',
      upstreamStatus: 404,
      message: "Upstream provider 'ollama' responded with status 404",
    });
  });

  it('embeds a chunk of texts with the rewritten model', async () => {
    nextResponse = () =>
      jsonResponse({
        model: 'nomic-embed-text',
        embeddings: [
          [0.1, 0.2],
          [0.3, 0.4],
        ],
        prompt_eval_count: 6,
      });

    const result = await provider.embed(['a', 'b'], embedRoute, {}, new AbortController().signal);

    expect(result).toEqual({
      vectors: [
        [0.1, 0.2],
        [0.3, 0.4],
      ],
      usage: { promptTokens: 6, completionTokens: 0, totalTokens: 6 },
    });
    expect(calls[0]?.url).toBe('http://ollama.test:11434/api/embed');
    expect(calls[0]?.body).toMatchObject({ model: 'nomic-embed-text', input: ['a', 'b'] });
  });

  it('rejects a dimensions override without calling the daemon', async () => {
    await expect(
      provider.embed(['a'], embedRoute, { dimensions: 8 }, new AbortController().signal),
    ).rejects.toMatchObject({ kind: 'bad_request' });
    expect(calls).toHaveLength(0);
  });

  it('refuses image generation without calling the daemon', async () => {
    await expect(
      provider.generateImages(chatRequest(), { ...chatRoute, dialect: 'images' }, new AbortController().signal),
    ).rejects.toMatchObject({
      kind: 'bad_request',
      message: "Model 'local-llama' does not support image generation",
    });
    expect(calls).toHaveLength(0);
  });
});
