import { GatewayError } from '@ai-relay/domain';
import type { ModelRegistryPort, ModelRoute } from '@ai-relay/domain';
import { createLogger } from '../logging/console-logger.js';

const log = createLogger('model-registry');

function buildSnapshot(routes: readonly ModelRoute[]): ReadonlyMap<string, ModelRoute> {
  const snapshot = new Map<string, ModelRoute>();
  for (const route of routes) {
    if (snapshot.has(route.modelName)) {
      throw new Error(`duplicate route for model '${route.modelName}'`);
    }
    snapshot.set(route.modelName, Object.freeze({ ...route }));
  }
  return snapshot;
}

/**
 * Model name → route lookup backed by an immutable snapshot.
 *
 * `reload()` builds a complete new map and swaps the reference in one
 * assignment, so a concurrent `resolve()` sees either the old or the new
 * table, never a partially built one.
 */
export class InMemoryModelRegistry implements ModelRegistryPort {
  private snapshot: ReadonlyMap<string, ModelRoute>;

  constructor(routes: readonly ModelRoute[] = []) {
    this.snapshot = buildSnapshot(routes);
  }

  resolve(modelName: string): ModelRoute {
    const route = this.snapshot.get(modelName);
    if (!route) throw GatewayError.modelNotFound(modelName);
    return route;
  }

  list(): readonly ModelRoute[] {
    return [...this.snapshot.values()].sort((a, b) => a.modelName.localeCompare(b.modelName));
  }

  get size(): number {
    return this.snapshot.size;
  }

  reload(routes: readonly ModelRoute[]): void {
    const next = buildSnapshot(routes);
    this.snapshot = next;
    for (const route of next.values()) {
      log.info('registered model', {
        model: route.modelName,
        dialect: route.dialect,
        provider: route.providerId,
        ...(route.upstreamModel ? { rewriteTo: route.upstreamModel } : {}),
      });
    }
  }
}
