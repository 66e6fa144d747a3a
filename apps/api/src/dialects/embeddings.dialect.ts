import { z } from 'zod';
import { createCanonicalRequest, GatewayError } from '@ai-relay/domain';
import type { CanonicalRequest, CanonicalResponse, EmbeddingBlock } from '@ai-relay/domain';
import { parsePayload, pickOptions } from './dialect.js';
import type { DialectAdapter, StreamEncoder } from './dialect.js';

const embeddingsRequestSchema = z.object({
  model: z.string().min(1),
  input: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  dimensions: z.number().int().positive().optional(),
  encoding_format: z.enum(['float', 'base64']).optional(),
  user: z.string().optional(),
});

const FORWARDED_OPTIONS = ['dimensions', 'encoding_format', 'user'] as const;

/** Packs a vector as little-endian float32, the layout OpenAI clients decode. */
export function encodeBase64Vector(vector: readonly number[]): string {
  const buffer = Buffer.alloc(vector.length * 4);
  vector.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
  return buffer.toString('base64');
}

function isEmbedding(block: CanonicalResponse['output'][number]): block is EmbeddingBlock {
  return block.type === 'embedding';
}

export const embeddingsDialect: DialectAdapter = {
  dialect: 'embeddings',

  decode(payload: unknown): CanonicalRequest {
    const body = parsePayload(embeddingsRequestSchema, payload);
    return createCanonicalRequest({
      model: body.model,
      input: { kind: 'text', texts: typeof body.input === 'string' ? [body.input] : body.input },
      stream: false,
      extraOptions: pickOptions(body, FORWARDED_OPTIONS),
    });
  },

  encode(response: CanonicalResponse, request: CanonicalRequest) {
    const base64 = request.extraOptions['encoding_format'] === 'base64';
    return {
      object: 'list',
      data: response.output.filter(isEmbedding).map((block) => ({
        object: 'embedding',
        embedding: base64 ? encodeBase64Vector(block.embedding) : [...block.embedding],
        index: block.index,
      })),
      model: response.model,
      ...(response.usage
        ? { usage: { prompt_tokens: response.usage.promptTokens, total_tokens: response.usage.totalTokens } }
        : {}),
    };
  },

  createStreamEncoder(): StreamEncoder {
    throw GatewayError.badRequest('Streaming is not supported for embeddings');
  },
};
