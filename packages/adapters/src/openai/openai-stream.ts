import { z } from 'zod';
import { GatewayError, unixNow } from '@ai-relay/domain';
import type { CanonicalRequest, StreamEvent, TokenUsage } from '@ai-relay/domain';
import { DONE_MARKER } from './sse-decoder.js';
import type { SseMessage } from './sse-decoder.js';
import {
  chatChunkSchema,
  chatUsage,
  fromResponsesBody,
  responsesBodySchema,
  upstreamErrorSchema,
} from './openai-wire.js';

function parseData(message: SseMessage, providerId: string): unknown {
  try {
    return JSON.parse(message.data);
  } catch (err) {
    throw new GatewayError('upstream_error', `Upstream provider '${providerId}' sent a malformed stream chunk`, {
      cause: err,
    });
  }
}

function raiseIfError(payload: unknown, providerId: string): void {
  const parsed = upstreamErrorSchema.safeParse(payload);
  if (parsed.success) {
    throw new GatewayError('upstream_error', `Upstream provider '${providerId}' reported: ${parsed.data.error.message}`);
  }
}

/**
 * Translates an upstream chat-completions SSE stream into canonical events.
 * `response.completed` is produced only when the upstream sends `[DONE]`;
 * a stream that simply ends is left for the proxy to close.
 */
export async function* chatCompletionEvents(
  messages: AsyncIterable<SseMessage>,
  request: CanonicalRequest,
  providerId: string,
  fallbackId: string,
): AsyncGenerator<StreamEvent> {
  let id = fallbackId;
  let created = unixNow();
  let started = false;
  let text = '';
  let finishReason: string | undefined;
  let usage: TokenUsage | undefined;

  const start = (): StreamEvent => {
    started = true;
    return { type: 'response.started', payload: { id, model: request.model, created } };
  };

  for await (const message of messages) {
    if (message.data === DONE_MARKER) {
      if (!started) yield start();
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
            finishReason: finishReason ?? 'stop',
          },
        },
      };
      return;
    }

    const payload = parseData(message, providerId);
    raiseIfError(payload, providerId);

    const chunk = chatChunkSchema.safeParse(payload);
    if (!chunk.success) {
      yield { type: 'unknown', payload: { upstreamType: message.event ?? 'message', data: payload } };
      continue;
    }

    if (!started) {
      id = chunk.data.id ?? id;
      created = chunk.data.created ?? created;
      yield start();
    }

    for (const choice of chunk.data.choices) {
      if ((choice.index ?? 0) !== 0) continue;
      const delta = choice.delta?.content;
      if (delta) {
        text += delta;
        yield { type: 'output_text.delta', payload: { delta } };
      }
      if (choice.finish_reason) finishReason = choice.finish_reason;
    }
    usage = chatUsage(chunk.data.usage) ?? usage;
  }
}

/** Responses lifecycle events that the client-side encoder regenerates itself. */
const STRUCTURAL_EVENTS = new Set([
  'response.queued',
  'response.in_progress',
  'response.output_item.added',
  'response.output_item.done',
  'response.content_part.added',
  'response.content_part.done',
  'response.output_text.done',
]);

const recordSchema = z.record(z.unknown());

function readField(payload: unknown, key: string): unknown {
  const record = recordSchema.safeParse(payload);
  return record.success ? record.data[key] : undefined;
}

function eventTypeOf(payload: unknown, message: SseMessage): string {
  const type = readField(payload, 'type');
  return typeof type === 'string' ? type : (message.event ?? 'message');
}

function failureMessage(detail: unknown, providerId: string): string {
  return typeof detail === 'string' && detail
    ? `Upstream provider '${providerId}' reported: ${detail}`
    : `Upstream provider '${providerId}' failed the response`;
}

/** Translates an upstream responses-API SSE stream into canonical events. */
export async function* responsesEvents(
  messages: AsyncIterable<SseMessage>,
  request: CanonicalRequest,
  providerId: string,
  fallbackId: string,
): AsyncGenerator<StreamEvent> {
  for await (const message of messages) {
    if (message.data === DONE_MARKER) return;

    const payload = parseData(message, providerId);
    const type = eventTypeOf(payload, message);
    if (STRUCTURAL_EVENTS.has(type)) continue;

    switch (type) {
      case 'response.created': {
        const body = responsesBodySchema.safeParse(readField(payload, 'response'));
        yield {
          type: 'response.started',
          payload: {
            id: (body.success ? body.data.id : undefined) ?? fallbackId,
            model: request.model,
            created: (body.success ? body.data.created_at : undefined) ?? unixNow(),
          },
        };
        break;
      }
      case 'response.output_text.delta': {
        const delta = readField(payload, 'delta');
        if (typeof delta === 'string' && delta) yield { type: 'output_text.delta', payload: { delta } };
        break;
      }
      case 'response.completed': {
        const body = responsesBodySchema.safeParse(readField(payload, 'response'));
        if (!body.success) {
          throw new GatewayError('upstream_error', `Upstream provider '${providerId}' sent an invalid completion event`, {
            cause: body.error,
          });
        }
        yield { type: 'response.completed', payload: { response: fromResponsesBody(body.data, request, fallbackId) } };
        return;
      }
      case 'response.failed':
      case 'error':
        raiseIfError(payload, providerId);
        raiseIfError(readField(payload, 'response'), providerId);
        throw new GatewayError('upstream_error', failureMessage(readField(payload, 'message'), providerId));
      default:
        yield { type: 'unknown', payload: { upstreamType: type, data: payload } };
    }
  }
}
