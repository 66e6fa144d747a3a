import { z } from 'zod';
import { createCanonicalRequest, GatewayError } from '@ai-relay/domain';
import type { CanonicalRequest, CanonicalResponse, ImageBlock } from '@ai-relay/domain';
import { parsePayload, pickOptions } from './dialect.js';
import type { DialectAdapter, StreamEncoder } from './dialect.js';

const DEFAULT_IMAGE_MODEL = 'dall-e-3';

const imagesRequestSchema = z.object({
  model: z.string().min(1).default(DEFAULT_IMAGE_MODEL),
  prompt: z.string().min(1),
  n: z.number().int().min(1).max(10).optional(),
  size: z.string().min(1).optional(),
  quality: z.string().min(1).optional(),
  style: z.string().min(1).optional(),
  response_format: z.enum(['url', 'b64_json']).optional(),
  user: z.string().optional(),
});

const FORWARDED_OPTIONS = ['n', 'size', 'quality', 'style', 'response_format', 'user'] as const;

function isImage(block: CanonicalResponse['output'][number]): block is ImageBlock {
  return block.type === 'image';
}

/** POST /v1/images/generations. The prompt travels as the request's only text input. */
export const imagesDialect: DialectAdapter = {
  dialect: 'images',

  decode(payload: unknown): CanonicalRequest {
    const body = parsePayload(imagesRequestSchema, payload);
    return createCanonicalRequest({
      model: body.model,
      input: { kind: 'text', texts: [body.prompt] },
      stream: false,
      extraOptions: pickOptions(body, FORWARDED_OPTIONS),
    });
  },

  encode(response: CanonicalResponse) {
    return {
      created: response.created,
      data: response.output.filter(isImage).map((image) => ({
        ...(image.b64Json === undefined ? { url: image.url } : { b64_json: image.b64Json }),
        ...(image.revisedPrompt === undefined ? {} : { revised_prompt: image.revisedPrompt }),
      })),
    };
  },

  createStreamEncoder(): StreamEncoder {
    throw GatewayError.badRequest('Streaming is not supported for image generation');
  },
};
