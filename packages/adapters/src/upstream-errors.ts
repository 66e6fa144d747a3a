import { GatewayError, isGatewayError } from '@ai-relay/domain';

/**
 * Error to raise when an upstream call fails because its signal fired. A
 * GatewayError abort reason (the dispatch timeout) wins over the transport's
 * own AbortError.
 */
export function abortError(signal: AbortSignal, cause: unknown): GatewayError {
  const reason: unknown = signal.reason;
  if (isGatewayError(reason)) return reason;
  return new GatewayError('upstream_error', 'Upstream call was aborted', { cause: reason ?? cause });
}
