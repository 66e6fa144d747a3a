import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { createCanonicalRequest, responseText, unixNow } from '@ai-relay/domain';
import type { CanonicalRequest, CanonicalResponse, ChatMessage, StreamEvent } from '@ai-relay/domain';
import { parsePayload, pickOptions } from './dialect.js';
import type { DialectAdapter, SseFrame, StreamEncoder } from './dialect.js';

// ─── Request schema ───────────────────────────────────────────────────────────

const inputPartSchema = z.object({
  type: z.enum(['input_text', 'output_text', 'text']),
  text: z.string(),
});

const inputItemSchema = z.object({
  type: z.literal('message').optional(),
  role: z.enum(['system', 'developer', 'user', 'assistant']),
  content: z.union([z.string(), z.array(inputPartSchema)]),
});

const responsesRequestSchema = z.object({
  model: z.string().min(1),
  input: z.union([z.string().min(1), z.array(inputItemSchema).min(1)]),
  instructions: z.string().nullish(),
  temperature: z.number().min(0).max(2).optional(),
  stream: z.boolean().optional().default(false),
  max_output_tokens: z.number().int().positive().optional(),
  top_p: z.number().min(0).max(1).optional(),
  user: z.string().optional(),
  metadata: z.record(z.string()).optional(),
});

const FORWARDED_OPTIONS = ['top_p', 'user'] as const;

type InputItem = z.infer<typeof inputItemSchema>;

function itemMessage(item: InputItem): ChatMessage {
  const content =
    typeof item.content === 'string' ? item.content : item.content.map((part) => part.text).join('');
  return { role: item.role, content };
}

// ─── Wire shapes ──────────────────────────────────────────────────────────────

function messageId(responseId: string): string {
  return `msg_${responseId.replace(/^resp_/, '')}`;
}

function textPart(text: string) {
  return { type: 'output_text', text, annotations: [] };
}

function messageItem(responseId: string, status: 'in_progress' | 'completed', text?: string) {
  return {
    type: 'message',
    id: messageId(responseId),
    status,
    role: 'assistant',
    content: text === undefined ? [] : [textPart(text)],
  };
}

type Metadata = CanonicalRequest['metadata'];

function encodeResponse(response: CanonicalResponse, metadata: Metadata) {
  return {
    id: response.id,
    object: 'response',
    created_at: response.created,
    status: response.status,
    model: response.model,
    metadata: { ...metadata },
    output: [messageItem(response.id, 'completed', responseText(response))],
    ...(response.usage
      ? {
          usage: {
            input_tokens: response.usage.promptTokens,
            output_tokens: response.usage.completionTokens,
            total_tokens: response.usage.totalTokens,
          },
        }
      : {}),
  };
}

/**
 * Renders canonical events as the responses-API lifecycle: created,
 * in_progress, output item and content part openers, text deltas, then the
 * matching closers and `response.completed`. Every frame carries a
 * monotonically increasing `sequence_number`.
 */
class ResponsesStreamEncoder implements StreamEncoder {
  private id = `resp_${uuidv4()}`;
  private created = unixNow();
  private sequence = 0;
  private opened = false;
  private text = '';

  constructor(
    private readonly model: string,
    private readonly metadata: Metadata,
  ) {}

  encodeStreamEvent(event: StreamEvent): SseFrame[] {
    switch (event.type) {
      case 'response.started':
        if (this.opened) return [];
        this.id = event.payload.id;
        this.created = event.payload.created;
        return this.open();
      case 'output_text.delta':
        this.text += event.payload.delta;
        return [
          ...this.open(),
          this.frame('response.output_text.delta', {
            item_id: messageId(this.id),
            output_index: 0,
            content_index: 0,
            delta: event.payload.delta,
          }),
        ];
      case 'response.completed':
        return [...this.open(), ...this.close(event.payload.response)];
      case 'error':
        return [
          this.frame('error', {
            code: event.payload.kind,
            message: event.payload.message,
            param: null,
          }),
        ];
      case 'unknown':
        return [
          this.frame('unknown', {
            upstream_type: event.payload.upstreamType,
            data: event.payload.data,
          }),
        ];
    }
  }

  private open(): SseFrame[] {
    if (this.opened) return [];
    this.opened = true;
    const snapshot = {
      id: this.id,
      object: 'response',
      created_at: this.created,
      status: 'in_progress',
      model: this.model,
      metadata: { ...this.metadata },
      output: [],
    };
    return [
      this.frame('response.created', { response: snapshot }),
      this.frame('response.in_progress', { response: snapshot }),
      this.frame('response.output_item.added', {
        output_index: 0,
        item: messageItem(this.id, 'in_progress'),
      }),
      this.frame('response.content_part.added', {
        item_id: messageId(this.id),
        output_index: 0,
        content_index: 0,
        part: textPart(''),
      }),
    ];
  }

  private close(response: CanonicalResponse): SseFrame[] {
    const final: CanonicalResponse = { ...response, id: this.id, created: this.created, model: this.model };
    const text = responseText(final) || this.text;
    const itemId = messageId(this.id);
    return [
      this.frame('response.output_text.done', { item_id: itemId, output_index: 0, content_index: 0, text }),
      this.frame('response.content_part.done', {
        item_id: itemId,
        output_index: 0,
        content_index: 0,
        part: textPart(text),
      }),
      this.frame('response.output_item.done', { output_index: 0, item: messageItem(this.id, 'completed', text) }),
      this.frame('response.completed', {
        response: encodeResponse({ ...final, output: [{ type: 'output_text', text }] }, this.metadata),
      }),
    ];
  }

  private frame(type: string, fields: Record<string, unknown>): SseFrame {
    const data = JSON.stringify({ type, sequence_number: this.sequence, ...fields });
    this.sequence += 1;
    return { event: type, data };
  }
}

// ─── Adapter ──────────────────────────────────────────────────────────────────

export const responsesDialect: DialectAdapter = {
  dialect: 'responses',

  decode(payload: unknown): CanonicalRequest {
    const body = parsePayload(responsesRequestSchema, payload);

    const messages: ChatMessage[] = [];
    if (body.instructions) messages.push({ role: 'system', content: body.instructions });
    if (typeof body.input === 'string') messages.push({ role: 'user', content: body.input });
    else messages.push(...body.input.map(itemMessage));

    const extraOptions = pickOptions(body, FORWARDED_OPTIONS);
    if (body.max_output_tokens !== undefined) extraOptions['max_tokens'] = body.max_output_tokens;

    return createCanonicalRequest({
      model: body.model,
      input: { kind: 'messages', messages },
      temperature: body.temperature,
      stream: body.stream,
      extraOptions,
      metadata: body.metadata,
    });
  },

  encode(response: CanonicalResponse, request: CanonicalRequest) {
    return encodeResponse(response, request.metadata);
  },

  createStreamEncoder(request: CanonicalRequest): StreamEncoder {
    return new ResponsesStreamEncoder(request.model, request.metadata);
  },
};
