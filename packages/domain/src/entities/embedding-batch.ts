import type { TokenUsage } from './canonical-response.js';

export interface EmbeddingBatch {
  readonly inputs: readonly string[];
  readonly chunkSize: number;
  /** Aligned index-for-index with `inputs`. */
  readonly results: readonly (readonly number[])[];
  readonly usage?: TokenUsage;
}

/** Half-open `[start, end)` slice of the batch inputs. */
export interface ChunkRange {
  readonly start: number;
  readonly end: number;
}

export function partitionRanges(length: number, chunkSize: number): ChunkRange[] {
  const ranges: ChunkRange[] = [];
  for (let start = 0; start < length; start += chunkSize) {
    ranges.push({ start, end: Math.min(start + chunkSize, length) });
  }
  return ranges;
}
