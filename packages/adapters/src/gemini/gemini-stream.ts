import { GatewayError, unixNow } from '@ai-relay/domain';
import type { CanonicalRequest, StreamEvent, TokenUsage } from '@ai-relay/domain';
import type { SseMessage } from '../openai/sse-decoder.js';
import {
  candidateFinishReason,
  candidateText,
  finishReasonOf,
  generateContentSchema,
  geminiErrorSchema,
  geminiUsage,
} from './gemini-wire.js';

function parseChunk(message: SseMessage, providerId: string): unknown {
  try {
    return JSON.parse(message.data);
  } catch (err) {
    throw new GatewayError('upstream_error', `Upstream provider '${providerId}' sent a malformed stream chunk`, {
      cause: err,
    });
  }
}

/**
 * Translates a `streamGenerateContent?alt=sse` body into canonical events.
 * Gemini has no end marker: `response.completed` follows the last chunk once
 * a finish reason has been seen, otherwise the stream is left for the proxy
 * to close.
 */
export async function* generateContentEvents(
  messages: AsyncIterable<SseMessage>,
  request: CanonicalRequest,
  providerId: string,
  fallbackId: string,
): AsyncGenerator<StreamEvent> {
  let id = fallbackId;
  const created = unixNow();
  let started = false;
  let text = '';
  let finishReason: string | undefined;
  let usage: TokenUsage | undefined;

  for await (const message of messages) {
    const payload = parseChunk(message, providerId);
    const failure = geminiErrorSchema.safeParse(payload);
    if (failure.success) {
      throw new GatewayError('upstream_error', `Upstream provider '${providerId}' reported: ${failure.data.error.message}`);
    }

    const chunk = generateContentSchema.safeParse(payload);
    if (!chunk.success) {
      yield { type: 'unknown', payload: { upstreamType: message.event ?? 'message', data: payload } };
      continue;
    }

    if (!started) {
      started = true;
      id = chunk.data.responseId ?? id;
      yield { type: 'response.started', payload: { id, model: request.model, created } };
    }

    const delta = candidateText(chunk.data);
    if (delta) {
      text += delta;
      yield { type: 'output_text.delta', payload: { delta } };
    }
    finishReason = candidateFinishReason(chunk.data) ?? finishReason;
    usage = geminiUsage(chunk.data.usageMetadata) ?? usage;
  }

  if (finishReason === undefined) return;
  yield {
    type: 'response.completed',
    payload: {
      response: {
        id,
        model: request.model,
        created,
        status: 'completed',
        output: [{ type: 'output_text', text }],
        usage,
        finishReason: finishReasonOf(finishReason),
      },
    },
  };
}
