import type { Dialect } from '../../entities/model-route.js';
import type { Principal } from '../outbound/credential-verifier.port.js';

export interface DispatchContext {
  readonly requestId: string;
  /** Aborted when the client goes away. */
  readonly signal: AbortSignal;
  readonly principal?: Principal;
}

export type DispatchResult =
  | { readonly kind: 'json'; readonly status: number; readonly body: unknown }
  | { readonly kind: 'stream'; readonly frames: AsyncIterable<string> };

export interface DispatchPort {
  handle(payload: unknown, dialect: Dialect, ctx: DispatchContext): Promise<DispatchResult>;
}
