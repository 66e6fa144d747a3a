/**
 * Dispatch Core Tests
 *
 * Routing, hooks, timeouts and error reporting around a single upstream
 * attempt, with in-process fake providers.
 */

import { describe, it, expect, jest } from '@jest/globals';
import { createCanonicalRequest, GatewayError } from '@ai-relay/domain';
import type { DispatchContext, DispatchResult, HookContext } from '@ai-relay/domain';

import { BatchingCoordinator } from '../services/batching/batching-coordinator.js';
import { CancellationScope, MAX_TIMEOUT_MS } from '../services/dispatch/cancellation-scope.js';
import { DispatchCore } from '../services/dispatch/dispatch-core.js';
import type { DispatchCoreOptions } from '../services/dispatch/dispatch-core.js';
import { HookRegistry } from '../services/hooks/hook-registry.js';
import { collect, DONE_FRAME, FakeProvider, flush, IMAGE_URL, makeRegistry } from './support/index.js';
import type { FakeProviderScript } from './support/index.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const OPTIONS: DispatchCoreOptions = { upstreamTimeoutMs: 0, embeddingChunkSize: 96, streamBufferSize: 4 };

function setup(script: FakeProviderScript = {}, options: Partial<DispatchCoreOptions> = {}) {
  const provider = new FakeProvider('fake', script);
  const hooks = new HookRegistry();
  const core = new DispatchCore(
    {
      registry: makeRegistry(),
      providers: new Map([[provider.id, provider]]),
      hooks,
      batching: new BatchingCoordinator(2),
    },
    { ...OPTIONS, ...options },
  );
  return { core, provider, hooks };
}

function context(signal: AbortSignal = new AbortController().signal): DispatchContext {
  return { requestId: 'req-1', signal, principal: { teamId: 'search' } };
}

function jsonBody(result: DispatchResult): unknown {
  if (result.kind !== 'json') throw new Error(`expected a json result, got ${result.kind}`);
  return result.body;
}

function frames(result: DispatchResult): AsyncIterable<string> {
  if (result.kind !== 'stream') throw new Error(`expected a stream result, got ${result.kind}`);
  return result.frames;
}

const chat = (model = 'gpt-test', extra: Record<string, unknown> = {}) => ({
  model,
  messages: [{ role: 'user', content: 'Count to 5' }],
  ...extra,
});

// ═══════════════════════════════════════════════════════════════════════════════
// Routing
// ═══════════════════════════════════════════════════════════════════════════════

describe('DispatchCore routing', () => {
  it('completes a chat request through the resolved provider', async () => {
    const { core, provider } = setup();

    const body = jsonBody(await core.handle(chat(), 'chat_completions', context()));

    expect(body).toMatchObject({
      object: 'chat.completion',
      model: 'gpt-test',
      choices: [{ message: { role: 'assistant', content: '1, 2, 3, 4, 5' } }],
    });
    expect(provider.received).toHaveLength(1);
  });

  it('returns model_not_found without calling any upstream', async () => {
    const { core, provider } = setup();

    await expect(core.handle(chat('gpt-missing'), 'chat_completions', context())).rejects.toMatchObject({
      kind: 'not_found',
      code: 'model_not_found',
      message: "The model 'gpt-missing' does not exist",
    });
    expect(provider.received).toHaveLength(0);
  });

  it('refuses a model whose route speaks another kind of API', async () => {
    const { core, provider } = setup();

    await expect(core.handle(chat('embed-test'), 'chat_completions', context())).rejects.toMatchObject({
      kind: 'bad_request',
      message: "Model 'embed-test' does not support chat completion requests",
    });
    await expect(
      core.handle({ model: 'gpt-test', input: 'hello' }, 'embeddings', context()),
    ).rejects.toMatchObject({ message: "Model 'gpt-test' does not support embeddings requests" });
    expect(provider.embedCalls).toHaveLength(0);
  });

  it('serves responses requests from a chat-completions route', async () => {
    const { core } = setup();

    const body = jsonBody(await core.handle({ model: 'gpt-test', input: 'Count to 5' }, 'responses', context()));

    expect(body).toMatchObject({ object: 'response', output: [{ content: [{ text: '1, 2, 3, 4, 5' }] }] });
  });

  it('fails with internal_error when the route names an unknown provider', async () => {
    const orphan = new DispatchCore(
      {
        registry: makeRegistry(),
        providers: new Map(),
        hooks: new HookRegistry(),
        batching: new BatchingCoordinator(1),
      },
      OPTIONS,
    );

    await expect(orphan.handle(chat(), 'chat_completions', context())).rejects.toMatchObject({
      kind: 'internal_error',
      message: 'Internal server error',
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Embeddings
// ═══════════════════════════════════════════════════════════════════════════════

describe('DispatchCore embeddings', () => {
  it('chunks by the route batch size and keeps order', async () => {
    const { core, provider } = setup();

    const body = jsonBody(
      await core.handle({ model: 'embed-test', input: ['a', 'bb', 'ccc'], user: 'u-1' }, 'embeddings', context()),
    );

    expect(provider.embedCalls).toEqual([
      { texts: ['a', 'bb'], options: { user: 'u-1' } },
      { texts: ['ccc'], options: { user: 'u-1' } },
    ]);
    expect(body).toEqual({
      object: 'list',
      data: [
        { object: 'embedding', embedding: [1, 0.5], index: 0 },
        { object: 'embedding', embedding: [2, 0.5], index: 1 },
        { object: 'embedding', embedding: [3, 0.5], index: 2 },
      ],
      model: 'embed-test',
      usage: { prompt_tokens: 3, total_tokens: 3 },
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Images
// ═══════════════════════════════════════════════════════════════════════════════

describe('DispatchCore images', () => {
  it('passes the prompt and options to the provider and encodes the images', async () => {
    const { core, provider } = setup();

    const body = jsonBody(
      await core.handle(
        { model: 'image-test', prompt: 'A red fox', size: '512x512', response_format: 'url' },
        'images',
        context(),
      ),
    );

    expect(provider.received[0]?.input).toEqual({ kind: 'text', texts: ['A red fox'] });
    expect(provider.received[0]?.extraOptions).toEqual({ size: '512x512', response_format: 'url' });
    expect(body).toEqual({
      created: 1700000000,
      data: [{ url: IMAGE_URL, revised_prompt: 'A red fox in snow' }],
    });
  });

  it('refuses image requests for chat models', async () => {
    const { core, provider } = setup();

    await expect(core.handle({ model: 'gpt-test', prompt: 'A red fox' }, 'images', context())).rejects.toMatchObject({
      kind: 'bad_request',
      message: "Model 'gpt-test' does not support image generation requests",
    });
    expect(provider.received).toHaveLength(0);
  });

  it('times out a slow image upstream', async () => {
    const { core } = setup({ delayMs: 1_000 }, { upstreamTimeoutMs: 20 });

    await expect(core.handle({ model: 'image-test', prompt: 'A red fox' }, 'images', context())).rejects.toMatchObject({
      kind: 'timeout',
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Streaming
// ═══════════════════════════════════════════════════════════════════════════════

describe('DispatchCore streaming', () => {
  it('streams frames that end with [DONE]', async () => {
    const { core, provider } = setup();

    const out = await collect(frames(await core.handle(chat('gpt-test', { stream: true }), 'chat_completions', context())));

    expect(out[out.length - 1]).toBe(DONE_FRAME);
    await flush();
    expect(provider.streamsReleased).toBe(1);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Timeouts and cancellation
// ═══════════════════════════════════════════════════════════════════════════════

describe('DispatchCore timeouts', () => {
  it('fails with timeout when the upstream is slower than the limit', async () => {
    const { core, provider } = setup({ delayMs: 1_000 }, { upstreamTimeoutMs: 20 });

    await expect(core.handle(chat(), 'chat_completions', context())).rejects.toMatchObject({
      kind: 'timeout',
      status: 504,
      message: 'Upstream call timed out after 20ms',
    });
    expect(provider.signals[0]?.aborted).toBe(true);
  });

  it('propagates a client disconnect to the upstream call', async () => {
    const { core, provider } = setup({ delayMs: 1_000 });
    const client = new AbortController();

    const pending = core.handle(chat(), 'chat_completions', context(client.signal));
    client.abort();

    await expect(pending).rejects.toBeInstanceOf(GatewayError);
    expect(provider.signals[0]?.aborted).toBe(true);
  });

  it('refuses a timeout that setTimeout would clamp', () => {
    const parent = new AbortController().signal;

    expect(() => new CancellationScope(parent, MAX_TIMEOUT_MS + 1)).toThrow(RangeError);
    const scope = new CancellationScope(parent, MAX_TIMEOUT_MS);
    expect(scope.signal.aborted).toBe(false);
    scope.dispose();
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Hooks
// ═══════════════════════════════════════════════════════════════════════════════

describe('DispatchCore hooks', () => {
  it('lets a request hook rewrite the canonical request', async () => {
    const { core, provider, hooks } = setup();
    hooks.register({
      kind: 'request',
      name: 'cap-tokens',
      beforeRequest: (request) => createCanonicalRequest({ ...request, extraOptions: { max_tokens: 16 } }),
    });

    await core.handle(chat(), 'chat_completions', context());

    expect(provider.received[0]?.extraOptions).toEqual({ max_tokens: 16 });
  });

  it('lets a response hook replace the response', async () => {
    const { core, hooks } = setup();
    hooks.register({
      kind: 'request',
      name: 'redact',
      afterResponse: (_request, response) => ({ ...response, output: [{ type: 'output_text', text: '[redacted]' }] }),
    });

    const body = jsonBody(await core.handle(chat(), 'chat_completions', context()));

    expect(body).toMatchObject({ choices: [{ message: { content: '[redacted]' } }] });
  });

  it('rejects the call when a hook throws a GatewayError', async () => {
    const { core, provider, hooks } = setup();
    hooks.register({
      kind: 'request',
      name: 'deny',
      beforeRequest: () => {
        throw GatewayError.badRequest('Team quota exhausted');
      },
    });

    await expect(core.handle(chat(), 'chat_completions', context())).rejects.toMatchObject({
      kind: 'bad_request',
      message: 'Team quota exhausted',
    });
    expect(provider.received).toHaveLength(0);
  });

  it('drops stream events a stream hook filters out', async () => {
    const { core, hooks } = setup();
    hooks.register({
      kind: 'stream',
      name: 'no-threes',
      onEvent: (event) => (event.type === 'output_text.delta' && event.payload.delta.startsWith('3') ? null : event),
    });

    const out = await collect(frames(await core.handle(chat('gpt-test', { stream: true }), 'chat_completions', context())));

    expect(out.some((f) => f.includes('"content":"3, "'))).toBe(false);
    expect(out.some((f) => f.includes('"content":"4, "'))).toBe(true);
  });

  it('notifies error hooks once per failed call', async () => {
    const { core, hooks } = setup();
    const onError = jest.fn((_error: GatewayError, _ctx: HookContext) => undefined);
    hooks.register({ kind: 'error', name: 'count', onError });

    await expect(core.handle(chat('gpt-missing'), 'chat_completions', context())).rejects.toBeInstanceOf(GatewayError);

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[1]).toEqual({
      requestId: 'req-1',
      dialect: 'chat_completions',
      principal: { teamId: 'search' },
    });
  });

  it('notifies error hooks when a stream fails mid-flight', async () => {
    const { core, hooks } = setup({ failBeforePiece: 2 });
    const kinds: string[] = [];
    hooks.register({ kind: 'error', name: 'collect', onError: (error) => kinds.push(error.kind) });

    const out = await collect(frames(await core.handle(chat('gpt-test', { stream: true }), 'chat_completions', context())));

    expect(out[out.length - 1]).toBe(DONE_FRAME);
    await flush();
    expect(kinds).toEqual(['upstream_interrupted']);
  });
});
