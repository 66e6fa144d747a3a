export type ResponseStatus = 'completed' | 'in_progress' | 'failed';

export interface OutputTextBlock {
  readonly type: 'output_text';
  readonly text: string;
}

export interface EmbeddingBlock {
  readonly type: 'embedding';
  readonly index: number;
  readonly embedding: readonly number[];
}

/** One generated image; exactly one of `url` and `b64Json` is set. */
export interface ImageBlock {
  readonly type: 'image';
  readonly index: number;
  readonly url?: string;
  readonly b64Json?: string;
  readonly revisedPrompt?: string;
}

export type ContentBlock = OutputTextBlock | EmbeddingBlock | ImageBlock;

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

export interface CanonicalResponse {
  readonly id: string;
  readonly model: string;
  /** Unix seconds. */
  readonly created: number;
  readonly status: ResponseStatus;
  readonly output: readonly ContentBlock[];
  readonly usage?: TokenUsage;
  readonly finishReason?: string;
}

/** Concatenation of every text block, in order. */
export function responseText(response: CanonicalResponse): string {
  return response.output
    .map((block) => (block.type === 'output_text' ? block.text : ''))
    .join('');
}

export function sumUsage(a: TokenUsage | undefined, b: TokenUsage | undefined): TokenUsage | undefined {
  if (!a) return b;
  if (!b) return a;
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

export function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}
