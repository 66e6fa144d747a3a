import { z } from 'zod';
import { requestMessages, unixNow } from '@ai-relay/domain';
import type { CanonicalRequest, CanonicalResponse, TokenUsage } from '@ai-relay/domain';

// ─── Upstream payload schemas ─────────────────────────────────────────────────

const partSchema = z.object({ text: z.string().optional() }).passthrough();

const usageMetadataSchema = z.object({
  promptTokenCount: z.number().int().nonnegative().default(0),
  candidatesTokenCount: z.number().int().nonnegative().default(0),
  totalTokenCount: z.number().int().nonnegative().default(0),
});

/** Shape of both a `generateContent` body and each `streamGenerateContent` chunk. */
export const generateContentSchema = z.object({
  responseId: z.string().optional(),
  candidates: z
    .array(
      z
        .object({
          content: z.object({ parts: z.array(partSchema).default([]) }).passthrough().optional(),
          finishReason: z.string().optional(),
          index: z.number().int().optional(),
        })
        .passthrough(),
    )
    .default([]),
  usageMetadata: usageMetadataSchema.optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).passthrough().optional(),
});

export type GenerateContentBody = z.infer<typeof generateContentSchema>;

export const batchEmbedSchema = z.object({
  embeddings: z.array(z.object({ values: z.array(z.number()) })),
});

export const geminiErrorSchema = z.object({
  error: z.object({ message: z.string(), status: z.string().optional() }).passthrough(),
});

// ─── Canonical → upstream ─────────────────────────────────────────────────────

interface Content {
  role: 'user' | 'model';
  parts: { text: string }[];
}

function stopSequences(stop: unknown): string[] | undefined {
  if (typeof stop === 'string') return stop ? [stop] : undefined;
  if (Array.isArray(stop)) {
    const sequences = stop.filter((s): s is string => typeof s === 'string' && s !== '');
    return sequences.length > 0 ? sequences : undefined;
  }
  return undefined;
}

function numberOption(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function wantsJson(responseFormat: unknown): boolean {
  const format = z.object({ type: z.literal('json_object') }).safeParse(responseFormat);
  return format.success;
}

/**
 * System and developer messages become `systemInstruction`; assistant turns
 * are sent with Gemini's `model` role.
 */
export function toGenerateContentBody(request: CanonicalRequest): Record<string, unknown> {
  const system: { text: string }[] = [];
  const contents: Content[] = [];
  for (const message of requestMessages(request)) {
    if (message.role === 'system' || message.role === 'developer') {
      system.push({ text: message.content });
      continue;
    }
    contents.push({ role: message.role === 'assistant' ? 'model' : 'user', parts: [{ text: message.content }] });
  }

  const options = request.extraOptions;
  const generationConfig = Object.fromEntries(
    Object.entries({
      temperature: request.temperature,
      topP: numberOption(options['top_p']),
      maxOutputTokens: numberOption(options['max_tokens']),
      stopSequences: stopSequences(options['stop']),
      presencePenalty: numberOption(options['presence_penalty']),
      frequencyPenalty: numberOption(options['frequency_penalty']),
      seed: numberOption(options['seed']),
      responseMimeType: wantsJson(options['response_format']) ? 'application/json' : undefined,
    }).filter(([, value]) => value !== undefined),
  );

  return {
    contents,
    ...(system.length > 0 ? { systemInstruction: { parts: system } } : {}),
    ...(Object.keys(generationConfig).length > 0 ? { generationConfig } : {}),
  };
}

export function toBatchEmbedBody(
  texts: readonly string[],
  model: string,
  dimensions: number | undefined,
): Record<string, unknown> {
  return {
    requests: texts.map((text) => ({
      model: `models/${model}`,
      content: { parts: [{ text }] },
      ...(dimensions === undefined ? {} : { outputDimensionality: dimensions }),
    })),
  };
}

// ─── Upstream → canonical ─────────────────────────────────────────────────────

const FILTER_REASONS = new Set(['SAFETY', 'RECITATION', 'BLOCKLIST', 'PROHIBITED_CONTENT', 'SPII']);

/** Maps a Gemini finish reason onto the chat-completions vocabulary. */
export function finishReasonOf(reason: string | undefined): string {
  if (reason === 'MAX_TOKENS') return 'length';
  if (reason !== undefined && FILTER_REASONS.has(reason)) return 'content_filter';
  return 'stop';
}

export function geminiUsage(usage: z.infer<typeof usageMetadataSchema> | undefined): TokenUsage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.promptTokenCount,
    completionTokens: usage.candidatesTokenCount,
    totalTokens: usage.totalTokenCount || usage.promptTokenCount + usage.candidatesTokenCount,
  };
}

/** Text of the first candidate; Gemini only ever returns one unless asked. */
export function candidateText(body: GenerateContentBody): string {
  const [candidate] = body.candidates;
  return (candidate?.content?.parts ?? []).map((part) => part.text ?? '').join('');
}

export function candidateFinishReason(body: GenerateContentBody): string | undefined {
  const [candidate] = body.candidates;
  if (candidate?.finishReason) return candidate.finishReason;
  return body.promptFeedback?.blockReason === undefined ? undefined : 'SAFETY';
}

export function fromGenerateContent(
  body: GenerateContentBody,
  request: CanonicalRequest,
  fallbackId: string,
): CanonicalResponse {
  return {
    id: body.responseId ?? fallbackId,
    model: request.model,
    created: unixNow(),
    status: 'completed',
    output: [{ type: 'output_text', text: candidateText(body) }],
    usage: geminiUsage(body.usageMetadata),
    finishReason: finishReasonOf(candidateFinishReason(body)),
  };
}
