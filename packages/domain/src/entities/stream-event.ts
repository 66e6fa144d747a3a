import type { CanonicalResponse } from './canonical-response.js';
import type { GatewayErrorKind } from '../errors/gateway-error.js';

export type StreamEvent =
  | {
      readonly type: 'response.started';
      readonly payload: { readonly id: string; readonly model: string; readonly created: number };
    }
  | { readonly type: 'output_text.delta'; readonly payload: { readonly delta: string } }
  | { readonly type: 'response.completed'; readonly payload: { readonly response: CanonicalResponse } }
  | {
      readonly type: 'error';
      readonly payload: { readonly kind: GatewayErrorKind; readonly message: string };
    }
  | {
      readonly type: 'unknown';
      readonly payload: { readonly upstreamType: string; readonly data: unknown };
    };

export function textDelta(delta: string): StreamEvent {
  return { type: 'output_text.delta', payload: { delta } };
}
