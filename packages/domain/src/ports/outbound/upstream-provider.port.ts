import type { CanonicalRequest } from '../../entities/canonical-request.js';
import type { CanonicalResponse, TokenUsage } from '../../entities/canonical-response.js';
import type { ModelRoute } from '../../entities/model-route.js';
import type { StreamEvent } from '../../entities/stream-event.js';

export interface EmbeddingOptions {
  dimensions?: number;
  user?: string;
}

export interface EmbeddingChunkResult {
  vectors: number[][];
  usage?: TokenUsage;
}

export interface UpstreamProviderPort {
  readonly id: string;

  complete(
    request: CanonicalRequest,
    route: ModelRoute,
    signal: AbortSignal,
  ): Promise<CanonicalResponse>;

  /**
   * Resolves once the upstream has accepted the call, so status failures
   * surface before any event is produced.
   */
  openStream(
    request: CanonicalRequest,
    route: ModelRoute,
    signal: AbortSignal,
  ): Promise<AsyncIterable<StreamEvent>>;

  embed(
    texts: readonly string[],
    route: ModelRoute,
    options: EmbeddingOptions,
    signal: AbortSignal,
  ): Promise<EmbeddingChunkResult>;

  /** The prompt is the request's single text input; the result holds image blocks. */
  generateImages(
    request: CanonicalRequest,
    route: ModelRoute,
    signal: AbortSignal,
  ): Promise<CanonicalResponse>;
}

export interface ProviderDirectory {
  get(providerId: string): UpstreamProviderPort | undefined;
}
