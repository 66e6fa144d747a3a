import { describe, it, expect } from '@jest/globals';
import { GatewayError } from '@ai-relay/domain';
import type { ModelRoute } from '@ai-relay/domain';
import { InMemoryModelRegistry } from '../registry/in-memory-model-registry.js';

function route(modelName: string, overrides: Partial<ModelRoute> = {}): ModelRoute {
  return {
    modelName,
    providerId: 'openai',
    dialect: 'chat_completions',
    endpointUrl: 'http://upstream.test/v1/chat/completions',
    ...overrides,
  };
}

describe('InMemoryModelRegistry', () => {
  it('resolves a registered model to its route', () => {
    const registry = new InMemoryModelRegistry([route('gpt-test', { upstreamModel: 'gpt-upstream' })]);

    expect(registry.resolve('gpt-test')).toEqual(route('gpt-test', { upstreamModel: 'gpt-upstream' }));
  });

  it('throws model_not_found for an unknown model', () => {
    const registry = new InMemoryModelRegistry([route('gpt-test')]);

    expect(() => registry.resolve('missing')).toThrow(GatewayError);
    try {
      registry.resolve('missing');
    } catch (err) {
      expect(err).toMatchObject({
        kind: 'not_found',
        code: 'model_not_found',
        message: "The model 'missing' does not exist",
      });
    }
  });

  it('lists routes sorted by model name', () => {
    const registry = new InMemoryModelRegistry([route('zeta'), route('alpha'), route('mid')]);

    expect(registry.list().map((r) => r.modelName)).toEqual(['alpha', 'mid', 'zeta']);
    expect(registry.size).toBe(3);
  });

  it('rejects duplicate model names', () => {
    expect(() => new InMemoryModelRegistry([route('dup'), route('dup')])).toThrow(
      "duplicate route for model 'dup'",
    );
  });

  it('swaps the whole table on reload', () => {
    const registry = new InMemoryModelRegistry([route('old')]);
    const before = registry.list();

    registry.reload([route('new-a'), route('new-b')]);

    expect(registry.list().map((r) => r.modelName)).toEqual(['new-a', 'new-b']);
    expect(() => registry.resolve('old')).toThrow(GatewayError);
    expect(before.map((r) => r.modelName)).toEqual(['old']);
  });

  it('keeps the previous table when a reload is invalid', () => {
    const registry = new InMemoryModelRegistry([route('stable')]);

    expect(() => registry.reload([route('dup'), route('dup')])).toThrow();
    expect(registry.resolve('stable').modelName).toBe('stable');
  });

  it('stores frozen copies of routes', () => {
    const input = route('gpt-test');
    const registry = new InMemoryModelRegistry([input]);

    expect(Object.isFrozen(registry.resolve('gpt-test'))).toBe(true);
    expect(registry.resolve('gpt-test')).not.toBe(input);
  });
});
