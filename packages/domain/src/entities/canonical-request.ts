export type MessageRole = 'system' | 'developer' | 'user' | 'assistant';

export interface ChatMessage {
  readonly role: MessageRole;
  readonly content: string;
}

export type CanonicalInput =
  | { readonly kind: 'messages'; readonly messages: readonly ChatMessage[] }
  | { readonly kind: 'text'; readonly texts: readonly string[] };

/**
 * Dialect-neutral request. Option names in `extraOptions` follow the
 * chat-completions vocabulary (`max_tokens`, `top_p`, `stop`, ...).
 */
export interface CanonicalRequest {
  readonly model: string;
  readonly input: CanonicalInput;
  readonly temperature?: number;
  readonly stream: boolean;
  readonly extraOptions: Readonly<Record<string, unknown>>;
  /** Caller-supplied tags, echoed back on responses-API objects. */
  readonly metadata?: Readonly<Record<string, string>>;
}

export function createCanonicalRequest(fields: CanonicalRequest): CanonicalRequest {
  const { metadata, ...rest } = fields;
  const input: CanonicalInput =
    rest.input.kind === 'messages'
      ? {
          kind: 'messages',
          messages: Object.freeze(rest.input.messages.map((m) => Object.freeze({ ...m }))),
        }
      : { kind: 'text', texts: Object.freeze([...rest.input.texts]) };

  return Object.freeze({
    ...rest,
    input: Object.freeze(input),
    extraOptions: Object.freeze({ ...rest.extraOptions }),
    ...(metadata ? { metadata: Object.freeze({ ...metadata }) } : {}),
  });
}

export function requestMessages(request: CanonicalRequest): readonly ChatMessage[] {
  if (request.input.kind === 'messages') return request.input.messages;
  return request.input.texts.map((text): ChatMessage => ({ role: 'user', content: text }));
}

export function requestTexts(request: CanonicalRequest): readonly string[] {
  if (request.input.kind === 'text') return request.input.texts;
  return request.input.messages.map((m) => m.content);
}
