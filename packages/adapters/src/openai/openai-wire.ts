import { z } from 'zod';
import { requestMessages, requestTexts, unixNow, upstreamModelName } from '@ai-relay/domain';
import type {
  CanonicalRequest,
  CanonicalResponse,
  ImageBlock,
  ModelRoute,
  ResponseStatus,
  TokenUsage,
} from '@ai-relay/domain';

// ─── Upstream payload schemas ─────────────────────────────────────────────────
// Lenient on purpose: only the fields the gateway reads are declared.

const chatUsageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative().default(0),
  completion_tokens: z.number().int().nonnegative().default(0),
  total_tokens: z.number().int().nonnegative().default(0),
});

export const chatCompletionSchema = z.object({
  id: z.string().optional(),
  created: z.number().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).passthrough(),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1),
  usage: chatUsageSchema.nullish(),
});

export const chatChunkSchema = z.object({
  id: z.string().optional(),
  created: z.number().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().optional(),
        delta: z.object({ content: z.string().nullish() }).passthrough().optional(),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  usage: chatUsageSchema.nullish(),
});

const responsesUsageSchema = z.object({
  input_tokens: z.number().int().nonnegative().default(0),
  output_tokens: z.number().int().nonnegative().default(0),
  total_tokens: z.number().int().nonnegative().default(0),
});

export const responsesBodySchema = z.object({
  id: z.string().optional(),
  created_at: z.number().optional(),
  status: z.string().optional(),
  output: z
    .array(
      z
        .object({
          type: z.string(),
          content: z
            .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
            .optional(),
        })
        .passthrough(),
    )
    .default([]),
  usage: responsesUsageSchema.nullish(),
});

export const embeddingsBodySchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().int() })),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative().default(0),
      total_tokens: z.number().int().nonnegative().default(0),
    })
    .nullish(),
});

export const imagesBodySchema = z.object({
  created: z.number().optional(),
  data: z.array(
    z
      .object({
        url: z.string().optional(),
        b64_json: z.string().optional(),
        revised_prompt: z.string().optional(),
      })
      .refine((image) => image.url !== undefined || image.b64_json !== undefined, {
        message: 'image carries neither url nor b64_json',
      }),
  ),
});

export const upstreamErrorSchema = z.object({
  error: z.object({ message: z.string() }).passthrough(),
});

type ResponsesBody = z.infer<typeof responsesBodySchema>;

// ─── Canonical → upstream ─────────────────────────────────────────────────────

/** Options that only make sense for embeddings or for the client-side encoding. */
const NON_CHAT_OPTIONS = new Set(['dimensions', 'encoding_format']);

/** Chat upstreams reject `stream_options` on non-streamed calls. */
const STREAM_ONLY_OPTIONS = new Set(['stream_options']);

const IMAGE_OPTIONS = ['n', 'size', 'quality', 'style', 'response_format', 'user'] as const;

export function toChatCompletionBody(
  request: CanonicalRequest,
  route: ModelRoute,
  stream: boolean,
): Record<string, unknown> {
  const options = Object.fromEntries(
    Object.entries(request.extraOptions).filter(
      ([key]) => !NON_CHAT_OPTIONS.has(key) && (stream || !STREAM_ONLY_OPTIONS.has(key)),
    ),
  );
  return {
    ...options,
    model: upstreamModelName(route),
    messages: requestMessages(request).map((m) => ({ role: m.role, content: m.content })),
    ...(request.temperature === undefined ? {} : { temperature: request.temperature }),
    stream,
  };
}

export function toResponsesBody(
  request: CanonicalRequest,
  route: ModelRoute,
  stream: boolean,
): Record<string, unknown> {
  const { max_tokens: maxTokens, top_p: topP, user } = request.extraOptions;
  return {
    model: upstreamModelName(route),
    input: requestMessages(request).map((m) => ({
      type: 'message',
      role: m.role,
      content: m.content,
    })),
    ...(request.temperature === undefined ? {} : { temperature: request.temperature }),
    ...(maxTokens === undefined ? {} : { max_output_tokens: maxTokens }),
    ...(topP === undefined ? {} : { top_p: topP }),
    ...(user === undefined ? {} : { user }),
    ...(request.metadata === undefined ? {} : { metadata: request.metadata }),
    stream,
  };
}

export function toImagesBody(request: CanonicalRequest, route: ModelRoute): Record<string, unknown> {
  const options: Record<string, unknown> = {};
  for (const key of IMAGE_OPTIONS) {
    if (request.extraOptions[key] !== undefined) options[key] = request.extraOptions[key];
  }
  return { model: upstreamModelName(route), prompt: requestTexts(request).join('\n'), ...options };
}

// ─── Upstream → canonical ─────────────────────────────────────────────────────

export function chatUsage(usage: z.infer<typeof chatUsageSchema> | null | undefined): TokenUsage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens || usage.prompt_tokens + usage.completion_tokens,
  };
}

export function fromChatCompletion(
  body: z.infer<typeof chatCompletionSchema>,
  request: CanonicalRequest,
  fallbackId: string,
): CanonicalResponse {
  const [choice] = body.choices;
  return {
    id: body.id ?? fallbackId,
    model: request.model,
    created: body.created ?? unixNow(),
    status: 'completed',
    output: [{ type: 'output_text', text: choice?.message.content ?? '' }],
    usage: chatUsage(body.usage),
    finishReason: choice?.finish_reason ?? 'stop',
  };
}

function responsesStatus(status: string | undefined): ResponseStatus {
  if (status === 'failed') return 'failed';
  if (status === 'in_progress' || status === 'queued') return 'in_progress';
  return 'completed';
}

export function fromResponsesBody(
  body: ResponsesBody,
  request: CanonicalRequest,
  fallbackId: string,
): CanonicalResponse {
  const text = body.output
    .filter((item) => item.type === 'message')
    .flatMap((item) => item.content ?? [])
    .filter((part) => part.type === 'output_text')
    .map((part) => part.text ?? '')
    .join('');

  const usage = body.usage
    ? {
        promptTokens: body.usage.input_tokens,
        completionTokens: body.usage.output_tokens,
        totalTokens: body.usage.total_tokens || body.usage.input_tokens + body.usage.output_tokens,
      }
    : undefined;

  return {
    id: body.id ?? fallbackId,
    model: request.model,
    created: body.created_at ?? unixNow(),
    status: responsesStatus(body.status),
    output: [{ type: 'output_text', text }],
    usage,
    finishReason: body.status === 'incomplete' ? 'length' : 'stop',
  };
}

export function fromImagesBody(
  body: z.infer<typeof imagesBodySchema>,
  request: CanonicalRequest,
  fallbackId: string,
): CanonicalResponse {
  return {
    id: fallbackId,
    model: request.model,
    created: body.created ?? unixNow(),
    status: 'completed',
    output: body.data.map(
      (image, index): ImageBlock => ({
        type: 'image',
        index,
        ...(image.b64_json === undefined ? { url: image.url } : { b64Json: image.b64_json }),
        ...(image.revised_prompt === undefined ? {} : { revisedPrompt: image.revised_prompt }),
      }),
    ),
  };
}
