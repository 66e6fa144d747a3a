import type { ModelRoute } from '../../entities/model-route.js';

export interface ModelRegistryPort {
  /** Throws a `not_found` GatewayError when no route is registered. */
  resolve(modelName: string): ModelRoute;
  list(): readonly ModelRoute[];
}
