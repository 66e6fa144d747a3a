import type { CanonicalRequest } from '../../entities/canonical-request.js';
import type { CanonicalResponse } from '../../entities/canonical-response.js';
import type { Dialect } from '../../entities/model-route.js';
import type { StreamEvent } from '../../entities/stream-event.js';
import type { GatewayError } from '../../errors/gateway-error.js';
import type { Principal } from './credential-verifier.port.js';

export interface HookContext {
  readonly requestId: string;
  readonly dialect: Dialect;
  readonly principal?: Principal;
}

interface NamedHook {
  readonly name: string;
}

export interface RequestHook extends NamedHook {
  readonly kind: 'request';
  beforeRequest?(
    request: CanonicalRequest,
    ctx: HookContext,
  ): CanonicalRequest | void | Promise<CanonicalRequest | void>;
  afterResponse?(
    request: CanonicalRequest,
    response: CanonicalResponse,
    ctx: HookContext,
  ): CanonicalResponse | void | Promise<CanonicalResponse | void>;
}

export interface StreamHook extends NamedHook {
  readonly kind: 'stream';
  /** Return `null` to drop the event. */
  onEvent(event: StreamEvent, ctx: HookContext): StreamEvent | null;
}

export interface ErrorHook extends NamedHook {
  readonly kind: 'error';
  onError(error: GatewayError, ctx: HookContext): void;
}

export type GatewayHook = RequestHook | StreamHook | ErrorHook;
