import { GatewayError, partitionRanges, sumUsage, toGatewayError } from '@ai-relay/domain';
import type { ChunkRange, EmbeddingBatch, EmbeddingChunkResult, TokenUsage } from '@ai-relay/domain';
import { createLogger } from '@ai-relay/adapters';

const log = createLogger('batching');

export type EmbedChunkFn = (
  texts: readonly string[],
  range: ChunkRange,
  signal: AbortSignal,
) => Promise<EmbeddingChunkResult>;

function assertPositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function describeRange(range: ChunkRange): string {
  return `[${range.start}, ${range.end})`;
}

/**
 * Splits embedding inputs into provider-sized chunks and runs them with a
 * bounded number in flight. Results land at their original offsets, so the
 * output order never depends on completion order. The first chunk failure
 * aborts the remaining chunks and fails the whole batch.
 */
export class BatchingCoordinator {
  constructor(private readonly maxConcurrency: number) {
    assertPositiveInt('maxConcurrency', maxConcurrency);
  }

  async embedBatch(
    inputs: readonly string[],
    chunkSize: number,
    embedChunk: EmbedChunkFn,
    signal: AbortSignal,
  ): Promise<EmbeddingBatch> {
    assertPositiveInt('chunkSize', chunkSize);

    const ranges = partitionRanges(inputs.length, chunkSize);
    const results = new Array<readonly number[]>(inputs.length);
    const scope = new AbortController();
    const onAbort = (): void => scope.abort(signal.reason);
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    const state: { cursor: number; usage?: TokenUsage; failure?: GatewayError } = { cursor: 0 };

    const worker = async (): Promise<void> => {
      while (state.failure === undefined && !scope.signal.aborted) {
        const range = ranges[state.cursor];
        if (!range) return;
        state.cursor += 1;

        try {
          const chunk = await embedChunk(inputs.slice(range.start, range.end), range, scope.signal);
          const expected = range.end - range.start;
          if (chunk.vectors.length !== expected) {
            throw new GatewayError(
              'upstream_error',
              `upstream returned ${chunk.vectors.length} vectors for ${expected} inputs`,
            );
          }
          chunk.vectors.forEach((vector, i) => {
            results[range.start + i] = vector;
          });
          state.usage = sumUsage(state.usage, chunk.usage);
        } catch (err) {
          if (state.failure === undefined) {
            const failure = chunkFailure(err, range, signal);
            state.failure = failure;
            log.warn('embedding chunk failed', { range: describeRange(range), error: failure.message });
            scope.abort(failure);
          }
          return;
        }
      }
    };

    try {
      const workers = Math.min(this.maxConcurrency, ranges.length);
      await Promise.all(Array.from({ length: workers }, () => worker()));
    } finally {
      signal.removeEventListener('abort', onAbort);
    }

    if (state.failure) throw state.failure;
    if (scope.signal.aborted) throw toGatewayError(scope.signal.reason);

    log.debug('batch complete', { inputs: inputs.length, chunks: ranges.length });
    return { inputs, chunkSize, results, usage: state.usage };
  }
}

function chunkFailure(err: unknown, range: ChunkRange, parent: AbortSignal): GatewayError {
  // Cancellation and timeouts belong to the whole call, not to this chunk.
  if (parent.aborted) return toGatewayError(parent.reason);

  const inner = toGatewayError(err);
  if (inner.kind === 'internal_error') return inner;
  return new GatewayError(
    inner.kind === 'bad_request' ? 'bad_request' : 'upstream_error',
    `Embedding chunk ${describeRange(range)} failed: ${inner.message}`,
    { upstreamStatus: inner.upstreamStatus, cause: err },
  );
}
