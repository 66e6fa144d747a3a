/** Wire protocol spoken by a client endpoint or an upstream provider. */
export type Dialect = 'chat_completions' | 'responses' | 'embeddings' | 'images';

export interface ModelRoute {
  readonly modelName: string;
  readonly providerId: string;
  /** Dialect the upstream speaks at `endpointUrl`. */
  readonly dialect: Dialect;
  readonly endpointUrl: string;
  /** Model name sent upstream when it differs from the public name. */
  readonly upstreamModel?: string;
  /** Overrides the gateway-wide embedding chunk size for this route. */
  readonly maxBatchSize?: number;
}

/** Chat and responses requests can be served by either chat-style upstream. */
export function routeServes(route: ModelRoute, inbound: Dialect): boolean {
  if (inbound === 'embeddings' || inbound === 'images') return route.dialect === inbound;
  return route.dialect === 'chat_completions' || route.dialect === 'responses';
}

/** Model name to send upstream for this route. */
export function upstreamModelName(route: ModelRoute): string {
  return route.upstreamModel ?? route.modelName;
}
