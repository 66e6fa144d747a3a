export type GatewayErrorKind =
  | 'bad_request'
  | 'unauthorized'
  | 'not_found'
  | 'upstream_error'
  | 'upstream_interrupted'
  | 'timeout'
  | 'internal_error';

export interface ErrorEnvelope {
  error: {
    message: string;
    type: string;
    code: string;
  };
}

interface KindProfile {
  status: number;
  type: string;
  code: string;
}

const PROFILES: Record<GatewayErrorKind, KindProfile> = {
  bad_request: { status: 400, type: 'invalid_request_error', code: 'bad_request' },
  unauthorized: { status: 401, type: 'authentication_error', code: 'invalid_api_key' },
  not_found: { status: 404, type: 'invalid_request_error', code: 'not_found' },
  upstream_error: { status: 502, type: 'api_error', code: 'upstream_error' },
  upstream_interrupted: { status: 502, type: 'api_error', code: 'upstream_interrupted' },
  timeout: { status: 504, type: 'timeout_error', code: 'timeout' },
  internal_error: { status: 500, type: 'server_error', code: 'internal_error' },
};

export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

export interface GatewayErrorOptions {
  /** Overrides the kind's default machine-readable code. */
  code?: string;
  /** HTTP status reported by the upstream provider, when there is one. */
  upstreamStatus?: number;
  cause?: unknown;
}

/**
 * Error raised anywhere in the request pipeline. The message is client-facing;
 * anything sensitive belongs in `cause`, which is logged but never rendered.
 */
export class GatewayError extends Error {
  readonly kind: GatewayErrorKind;
  readonly code: string;
  readonly upstreamStatus?: number;

  constructor(kind: GatewayErrorKind, message: string, options: GatewayErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'GatewayError';
    this.kind = kind;
    this.code = options.code ?? PROFILES[kind].code;
    this.upstreamStatus = options.upstreamStatus;
  }

  get status(): number {
    return PROFILES[this.kind].status;
  }

  get type(): string {
    return PROFILES[this.kind].type;
  }

  toEnvelope(): ErrorEnvelope {
    return { error: { message: this.message, type: this.type, code: this.code } };
  }

  static badRequest(message: string, cause?: unknown): GatewayError {
    return new GatewayError('bad_request', message, { cause });
  }

  static modelNotFound(model: string): GatewayError {
    return new GatewayError('not_found', `The model '${model}' does not exist`, {
      code: 'model_not_found',
    });
  }

  static internal(cause?: unknown): GatewayError {
    return new GatewayError('internal_error', INTERNAL_ERROR_MESSAGE, { cause });
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}

/** Anything that is not already a GatewayError becomes an opaque internal error. */
export function toGatewayError(err: unknown): GatewayError {
  return isGatewayError(err) ? err : GatewayError.internal(err);
}
