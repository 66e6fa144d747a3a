import { v4 as uuidv4 } from 'uuid';
import { GatewayError, isGatewayError, unixNow } from '@ai-relay/domain';
import type { CanonicalRequest, StreamEvent } from '@ai-relay/domain';
import { createLogger, describeError } from '@ai-relay/adapters';
import { DONE_FRAME, renderFrame } from '../../dialects/dialect.js';
import type { StreamEncoder } from '../../dialects/dialect.js';
import { BoundedChannel } from './bounded-channel.js';

const log = createLogger('stream');

export type StreamStatus = 'completed' | 'synthesized' | 'failed' | 'cancelled';

export interface StreamOutcome {
  readonly status: StreamStatus;
  /** Events handed to the encoder, after stream hooks. */
  readonly forwarded: number;
  readonly error?: GatewayError;
}

/** The slice of a cancellation scope the proxy drives. */
export interface StreamScope {
  readonly signal: AbortSignal;
  abort(reason?: unknown): void;
  dispose(): void;
}

export interface ProxyStreamArgs {
  events: AsyncIterable<StreamEvent>;
  encoder: StreamEncoder;
  request: CanonicalRequest;
  scope: StreamScope;
  /** Aborted when the client disconnects. */
  clientSignal: AbortSignal;
  bufferSize: number;
  /** Returns the event to forward, or `null` to drop it. */
  onEvent?: (event: StreamEvent) => StreamEvent | null;
  onClose?: (outcome: StreamOutcome) => void;
}

interface Progress {
  forwarded: number;
  text: string;
  started?: { id: string; created: number };
}

/**
 * Proxies one upstream event stream to SSE text frames.
 *
 * A producer task reads upstream events, runs them through the stream hooks
 * and the dialect encoder, and pushes rendered frames onto a bounded channel;
 * the returned iterable is that channel. Whatever happens upstream, a stream
 * that is not cancelled by its consumer ends with exactly one `[DONE]` frame:
 * - upstream completion is forwarded as is;
 * - an upstream end without completion gets a synthesized `response.completed`;
 * - an upstream failure becomes an in-band `error` event.
 * Stopping iteration aborts the scope and releases the upstream iterator.
 */
export function proxyStream(args: ProxyStreamArgs): AsyncIterable<string> {
  const channel = new BoundedChannel<string>(args.bufferSize, () => args.scope.abort());
  void produce(args, channel).catch((err: unknown) => {
    log.error('stream producer crashed', { error: describeError(err) });
    channel.close();
  });
  return channel;
}

async function produce(args: ProxyStreamArgs, channel: BoundedChannel<string>): Promise<void> {
  const iterator = args.events[Symbol.asyncIterator]();
  const progress: Progress = { forwarded: 0, text: '' };
  let outcome: StreamOutcome = { status: 'cancelled', forwarded: 0 };

  try {
    outcome = await pump(iterator, args, channel, progress);
  } finally {
    channel.close();
    if (outcome.status !== 'completed') args.scope.abort();
    await release(iterator);
    args.scope.dispose();
    args.onClose?.(outcome);
  }
}

async function pump(
  iterator: AsyncIterator<StreamEvent>,
  args: ProxyStreamArgs,
  channel: BoundedChannel<string>,
  progress: Progress,
): Promise<StreamOutcome> {
  const cancelled = (): StreamOutcome => ({ status: 'cancelled', forwarded: progress.forwarded });

  const send = async (event: StreamEvent): Promise<boolean> => {
    for (const frame of args.encoder.encodeStreamEvent(event)) {
      if (!(await channel.push(renderFrame(frame)))) return false;
    }
    return true;
  };

  const forward = async (raw: StreamEvent): Promise<boolean> => {
    const event = args.onEvent ? args.onEvent(raw) : raw;
    if (event === null) return true;
    if (event.type === 'response.started') progress.started = event.payload;
    if (event.type === 'output_text.delta') progress.text += event.payload.delta;
    progress.forwarded += 1;
    return send(event);
  };

  let outcome: StreamOutcome;
  try {
    outcome = await forwardAll(iterator, args.request, progress, forward);
  } catch (err) {
    if (channel.isCancelled || args.clientSignal.aborted) return cancelled();
    const error = streamFailure(err, args.scope.signal);
    log.warn('upstream stream failed', { kind: error.kind, forwarded: progress.forwarded, error: describeError(err) });
    if (!(await send({ type: 'error', payload: { kind: error.kind, message: error.message } }))) return cancelled();
    outcome = { status: 'failed', forwarded: progress.forwarded, error };
  }

  if (outcome.status === 'cancelled') return outcome;
  if (!(await channel.push(DONE_FRAME))) return cancelled();
  return outcome;
}

async function forwardAll(
  iterator: AsyncIterator<StreamEvent>,
  request: CanonicalRequest,
  progress: Progress,
  forward: (event: StreamEvent) => Promise<boolean>,
): Promise<StreamOutcome> {
  for (;;) {
    const step = await iterator.next();

    if (step.done) {
      const delivered = await forward(synthesizeCompletion(request, progress));
      return { status: delivered ? 'synthesized' : 'cancelled', forwarded: progress.forwarded };
    }

    const event = step.value;
    if (!(await forward(event))) return { status: 'cancelled', forwarded: progress.forwarded };
    if (event.type === 'response.completed') return { status: 'completed', forwarded: progress.forwarded };
    if (event.type === 'error') {
      return {
        status: 'failed',
        forwarded: progress.forwarded,
        error: new GatewayError(event.payload.kind, event.payload.message),
      };
    }
  }
}

function synthesizeCompletion(request: CanonicalRequest, progress: Progress): StreamEvent {
  return {
    type: 'response.completed',
    payload: {
      response: {
        id: progress.started?.id ?? `resp_${uuidv4()}`,
        model: request.model,
        created: progress.started?.created ?? unixNow(),
        status: 'completed',
        output: [{ type: 'output_text', text: progress.text }],
        finishReason: 'stop',
      },
    },
  };
}

function streamFailure(err: unknown, signal: AbortSignal): GatewayError {
  const reason: unknown = signal.reason;
  if (signal.aborted && isGatewayError(reason)) return reason;
  if (isGatewayError(err)) return err;
  return new GatewayError('upstream_interrupted', 'Upstream stream was interrupted before completion', {
    cause: err,
  });
}

async function release(iterator: AsyncIterator<StreamEvent>): Promise<void> {
  if (!iterator.return) return;
  try {
    await iterator.return();
  } catch (err) {
    log.debug('upstream iterator raised while closing', { error: describeError(err) });
  }
}
