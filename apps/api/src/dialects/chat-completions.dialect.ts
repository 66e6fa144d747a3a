import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { createCanonicalRequest, GatewayError, responseText, unixNow } from '@ai-relay/domain';
import type {
  CanonicalRequest,
  CanonicalResponse,
  ChatMessage,
  StreamEvent,
  TokenUsage,
} from '@ai-relay/domain';
import { parsePayload, pickOptions } from './dialect.js';
import type { DialectAdapter, SseFrame, StreamEncoder } from './dialect.js';

// ─── Request schema ───────────────────────────────────────────────────────────

const textPartSchema = z.object({ type: z.literal('text'), text: z.string() });

const messageSchema = z.object({
  role: z.enum(['system', 'developer', 'user', 'assistant']),
  content: z.union([z.string(), z.null(), z.array(textPartSchema)]).optional(),
});

const chatRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(messageSchema).min(1),
  temperature: z.number().min(0).max(2).optional(),
  stream: z.boolean().optional().default(false),
  stream_options: z.object({ include_usage: z.boolean().optional() }).nullish(),
  n: z.literal(1).optional(),
  max_tokens: z.number().int().positive().optional(),
  max_completion_tokens: z.number().int().positive().optional(),
  top_p: z.number().min(0).max(1).optional(),
  stop: z.union([z.string(), z.array(z.string()).max(4)]).optional(),
  presence_penalty: z.number().min(-2).max(2).optional(),
  frequency_penalty: z.number().min(-2).max(2).optional(),
  seed: z.number().int().optional(),
  user: z.string().optional(),
  response_format: z.record(z.unknown()).optional(),
  logit_bias: z.record(z.number()).optional(),
});

/** Options forwarded upstream unchanged. */
const FORWARDED_OPTIONS = [
  'max_tokens',
  'top_p',
  'stop',
  'presence_penalty',
  'frequency_penalty',
  'seed',
  'user',
  'response_format',
  'logit_bias',
] as const;

function messageContent(content: z.infer<typeof messageSchema>['content']): string {
  if (content === undefined || content === null) return '';
  if (typeof content === 'string') return content;
  return content.map((part) => part.text).join('');
}

// ─── Wire shapes ──────────────────────────────────────────────────────────────

function wireUsage(usage: TokenUsage) {
  return {
    prompt_tokens: usage.promptTokens,
    completion_tokens: usage.completionTokens,
    total_tokens: usage.totalTokens,
  };
}

class ChatCompletionsStreamEncoder implements StreamEncoder {
  private id = `chatcmpl-${uuidv4()}`;
  private created = unixNow();
  private roleSent = false;

  constructor(private readonly model: string) {}

  encodeStreamEvent(event: StreamEvent): SseFrame[] {
    switch (event.type) {
      case 'response.started':
        if (this.roleSent) return [];
        this.id = event.payload.id;
        this.created = event.payload.created;
        return this.ensureRole();
      case 'output_text.delta':
        return [...this.ensureRole(), this.chunk({ content: event.payload.delta }, null)];
      case 'response.completed': {
        const { response } = event.payload;
        return [...this.ensureRole(), this.chunk({}, response.finishReason ?? 'stop', response.usage)];
      }
      case 'error':
        return [
          { data: JSON.stringify(new GatewayError(event.payload.kind, event.payload.message).toEnvelope()) },
        ];
      case 'unknown':
        return [
          {
            event: 'unknown',
            data: JSON.stringify({
              type: 'unknown',
              upstream_type: event.payload.upstreamType,
              data: event.payload.data,
            }),
          },
        ];
    }
  }

  private ensureRole(): SseFrame[] {
    if (this.roleSent) return [];
    this.roleSent = true;
    return [this.chunk({ role: 'assistant', content: '' }, null)];
  }

  private chunk(delta: Record<string, string>, finishReason: string | null, usage?: TokenUsage): SseFrame {
    return {
      data: JSON.stringify({
        id: this.id,
        object: 'chat.completion.chunk',
        created: this.created,
        model: this.model,
        choices: [{ index: 0, delta, finish_reason: finishReason }],
        ...(usage ? { usage: wireUsage(usage) } : {}),
      }),
    };
  }
}

// ─── Adapter ──────────────────────────────────────────────────────────────────

export const chatCompletionsDialect: DialectAdapter = {
  dialect: 'chat_completions',

  decode(payload: unknown): CanonicalRequest {
    const body = parsePayload(chatRequestSchema, payload);
    const extraOptions = pickOptions(body, FORWARDED_OPTIONS);
    if (extraOptions['max_tokens'] === undefined && body.max_completion_tokens !== undefined) {
      extraOptions['max_tokens'] = body.max_completion_tokens;
    }
    if (body.stream && body.stream_options) extraOptions['stream_options'] = body.stream_options;

    return createCanonicalRequest({
      model: body.model,
      input: {
        kind: 'messages',
        messages: body.messages.map(
          (m): ChatMessage => ({ role: m.role, content: messageContent(m.content) }),
        ),
      },
      temperature: body.temperature,
      stream: body.stream,
      extraOptions,
    });
  },

  encode(response: CanonicalResponse) {
    return {
      id: response.id,
      object: 'chat.completion',
      created: response.created,
      model: response.model,
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content: responseText(response) },
          finish_reason: response.finishReason ?? 'stop',
        },
      ],
      ...(response.usage ? { usage: wireUsage(response.usage) } : {}),
    };
  },

  createStreamEncoder(request: CanonicalRequest): StreamEncoder {
    return new ChatCompletionsStreamEncoder(request.model);
  },
};
