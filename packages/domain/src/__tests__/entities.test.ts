/**
 * Domain Entity Tests
 *
 * The domain package is mostly interfaces plus a handful of pure helpers.
 * These tests verify:
 *   1. Canonical requests are frozen copies of their inputs
 *   2. Input helpers view either input kind as messages or texts
 *   3. Response helpers (text concatenation, usage sums) behave as documented
 *   4. Chunk partitioning covers every index exactly once
 */

import { describe, it, expect } from '@jest/globals';

import {
  createCanonicalRequest,
  partitionRanges,
  requestMessages,
  requestTexts,
  responseText,
  routeServes,
  sumUsage,
  textDelta,
  upstreamModelName,
} from '../index.js';
import type { CanonicalRequest, CanonicalResponse, ModelRoute, StreamEvent } from '../index.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function expectType<T>(_val: T): void {
  /* compile-time assertion */
}

function makeRoute(overrides: Partial<ModelRoute> = {}): ModelRoute {
  return {
    modelName: 'gpt-test',
    providerId: 'openai',
    dialect: 'chat_completions',
    endpointUrl: 'http://upstream.test/v1/chat/completions',
    ...overrides,
  };
}

function makeResponse(overrides: Partial<CanonicalResponse> = {}): CanonicalResponse {
  return {
    id: 'resp_1',
    model: 'gpt-test',
    created: 1700000000,
    status: 'completed',
    output: [],
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CanonicalRequest
// ═══════════════════════════════════════════════════════════════════════════════

describe('createCanonicalRequest', () => {
  it('returns a deeply frozen copy', () => {
    const messages = [{ role: 'user' as const, content: 'Hi' }];
    const extraOptions: Record<string, unknown> = { max_tokens: 5 };
    const request = createCanonicalRequest({
      model: 'gpt-test',
      input: { kind: 'messages', messages },
      stream: false,
      extraOptions,
    });

    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.input)).toBe(true);
    expect(Object.isFrozen(request.extraOptions)).toBe(true);
    expect(Object.isFrozen(requestMessages(request)[0])).toBe(true);

    messages.push({ role: 'user', content: 'later' });
    extraOptions['max_tokens'] = 99;
    expect(requestMessages(request)).toHaveLength(1);
    expect(request.extraOptions['max_tokens']).toBe(5);
  });

  it('copies text inputs', () => {
    const texts = ['a', 'b'];
    const request = createCanonicalRequest({
      model: 'embed-test',
      input: { kind: 'text', texts },
      stream: false,
      extraOptions: {},
    });
    texts.push('c');

    expect(requestTexts(request)).toEqual(['a', 'b']);
  });

  it('freezes a copy of the metadata and omits it when absent', () => {
    const metadata: Record<string, string> = { team: 'search' };
    const tagged = createCanonicalRequest({
      model: 'gpt-test',
      input: { kind: 'text', texts: ['a'] },
      stream: false,
      extraOptions: {},
      metadata,
    });
    metadata['team'] = 'other';

    expect(tagged.metadata).toEqual({ team: 'search' });
    expect(Object.isFrozen(tagged.metadata)).toBe(true);

    const untagged = createCanonicalRequest({
      model: 'gpt-test',
      input: { kind: 'text', texts: ['a'] },
      stream: false,
      extraOptions: {},
    });
    expect('metadata' in untagged).toBe(false);
  });
});

describe('requestMessages / requestTexts', () => {
  const messagesRequest: CanonicalRequest = createCanonicalRequest({
    model: 'gpt-test',
    input: {
      kind: 'messages',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hi' },
      ],
    },
    stream: false,
    extraOptions: {},
  });

  const textRequest: CanonicalRequest = createCanonicalRequest({
    model: 'embed-test',
    input: { kind: 'text', texts: ['one', 'two'] },
    stream: false,
    extraOptions: {},
  });

  it('views text input as user messages', () => {
    expect(requestMessages(textRequest)).toEqual([
      { role: 'user', content: 'one' },
      { role: 'user', content: 'two' },
    ]);
  });

  it('views messages as their contents', () => {
    expect(requestTexts(messagesRequest)).toEqual(['Be brief.', 'Hi']);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// CanonicalResponse
// ═══════════════════════════════════════════════════════════════════════════════

describe('responseText', () => {
  it('concatenates text blocks in order and skips embeddings', () => {
    const response = makeResponse({
      output: [
        { type: 'output_text', text: 'Hello, ' },
        { type: 'embedding', index: 0, embedding: [0.5] },
        { type: 'output_text', text: 'world' },
      ],
    });

    expect(responseText(response)).toBe('Hello, world');
  });
});

describe('sumUsage', () => {
  it('adds every counter', () => {
    expect(
      sumUsage(
        { promptTokens: 1, completionTokens: 2, totalTokens: 3 },
        { promptTokens: 10, completionTokens: 20, totalTokens: 30 },
      ),
    ).toEqual({ promptTokens: 11, completionTokens: 22, totalTokens: 33 });
  });

  it('keeps whichever side is present', () => {
    const usage = { promptTokens: 4, completionTokens: 0, totalTokens: 4 };
    expect(sumUsage(undefined, usage)).toBe(usage);
    expect(sumUsage(usage, undefined)).toBe(usage);
    expect(sumUsage(undefined, undefined)).toBeUndefined();
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// ModelRoute / StreamEvent / EmbeddingBatch
// ═══════════════════════════════════════════════════════════════════════════════

describe('routeServes', () => {
  it('lets chat-style routes serve chat and responses requests', () => {
    for (const dialect of ['chat_completions', 'responses'] as const) {
      const route = makeRoute({ dialect });
      expect(routeServes(route, 'chat_completions')).toBe(true);
      expect(routeServes(route, 'responses')).toBe(true);
      expect(routeServes(route, 'embeddings')).toBe(false);
    }
  });

  it('keeps embeddings routes for embeddings requests only', () => {
    const route = makeRoute({ dialect: 'embeddings' });
    expect(routeServes(route, 'embeddings')).toBe(true);
    expect(routeServes(route, 'chat_completions')).toBe(false);
  });

  it('keeps image routes for image requests only', () => {
    const route = makeRoute({ dialect: 'images' });
    expect(routeServes(route, 'images')).toBe(true);
    expect(routeServes(route, 'responses')).toBe(false);
    expect(routeServes(makeRoute(), 'images')).toBe(false);
  });
});

describe('upstreamModelName', () => {
  it('prefers the upstream override and falls back to the public name', () => {
    expect(upstreamModelName(makeRoute({ upstreamModel: 'gpt-upstream' }))).toBe('gpt-upstream');
    expect(upstreamModelName(makeRoute())).toBe('gpt-test');
  });
});

describe('StreamEvent', () => {
  it('textDelta builds an output_text.delta event', () => {
    const event = textDelta('Hel');
    expectType<StreamEvent>(event);
    expect(event).toEqual({ type: 'output_text.delta', payload: { delta: 'Hel' } });
  });
});

describe('partitionRanges', () => {
  it('splits 25 inputs into 10, 10, 5', () => {
    expect(partitionRanges(25, 10)).toEqual([
      { start: 0, end: 10 },
      { start: 10, end: 20 },
      { start: 20, end: 25 },
    ]);
  });

  it('returns one range when the chunk covers everything', () => {
    expect(partitionRanges(3, 10)).toEqual([{ start: 0, end: 3 }]);
  });

  it('covers every index exactly once', () => {
    for (const [length, size] of [
      [1, 1],
      [7, 3],
      [96, 96],
      [97, 96],
      [100, 7],
    ] as const) {
      const covered = partitionRanges(length, size).flatMap(({ start, end }) =>
        Array.from({ length: end - start }, (_, i) => start + i),
      );
      expect(covered).toEqual(Array.from({ length }, (_, i) => i));
    }
  });

  it('returns no ranges for empty input', () => {
    expect(partitionRanges(0, 4)).toEqual([]);
  });
});
