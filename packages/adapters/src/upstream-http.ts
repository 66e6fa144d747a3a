import { fetch } from 'undici';
import type { Dispatcher, Response } from 'undici';
import { GatewayError } from '@ai-relay/domain';
import type { Dialect } from '@ai-relay/domain';
import type { Logger } from './logging/console-logger.js';
import { abortError } from './upstream-errors.js';

export interface UpstreamPost {
  readonly providerId: string;
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly payload: unknown;
  readonly signal: AbortSignal;
  readonly dispatcher?: Dispatcher;
  /** Upstream model name, logged when the call is rejected. */
  readonly model: string;
}

/**
 * POSTs a JSON payload to an HTTP upstream. Transport failures become
 * "unreachable", non-2xx statuses carry `upstreamStatus`, and a fired signal
 * surfaces as its abort reason.
 */
export async function postUpstream(call: UpstreamPost, log: Logger): Promise<Response> {
  let res: Response;
  try {
    res = await fetch(call.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...call.headers },
      body: JSON.stringify(call.payload),
      signal: call.signal,
      dispatcher: call.dispatcher,
    });
  } catch (err) {
    if (call.signal.aborted) throw abortError(call.signal, err);
    throw new GatewayError('upstream_error', `Upstream provider '${call.providerId}' is unreachable`, {
      cause: err,
    });
  }

  if (!res.ok) {
    const detail = await res.text().catch((err: unknown) => `<unreadable body: ${String(err)}>`);
    log.warn('upstream call rejected', {
      provider: call.providerId,
      model: call.model,
      status: res.status,
      detail: detail.slice(0, 500),
    });
    throw new GatewayError(
      'upstream_error',
      `Upstream provider '${call.providerId}' responded with status ${res.status}`,
      { upstreamStatus: res.status, cause: detail },
    );
  }
  return res;
}

export async function readUpstreamJson(res: Response, providerId: string, signal: AbortSignal): Promise<unknown> {
  try {
    return await res.json();
  } catch (err) {
    if (signal.aborted) throw abortError(signal, err);
    throw new GatewayError('upstream_error', `Upstream provider '${providerId}' returned invalid JSON`, {
      cause: err,
    });
  }
}

export function unexpectedPayload(providerId: string, dialect: Dialect, cause: unknown): GatewayError {
  return new GatewayError(
    'upstream_error',
    `Upstream provider '${providerId}' returned an unexpected ${dialect} payload`,
    { cause },
  );
}

export function emptyStream(providerId: string): GatewayError {
  return new GatewayError('upstream_error', `Upstream provider '${providerId}' returned an empty stream`);
}
