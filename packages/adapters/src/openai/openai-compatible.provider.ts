import type { Dispatcher, Response } from 'undici';
import { v4 as uuidv4 } from 'uuid';
import { upstreamModelName } from '@ai-relay/domain';
import type {
  CanonicalRequest,
  CanonicalResponse,
  EmbeddingChunkResult,
  EmbeddingOptions,
  GatewayError,
  ModelRoute,
  StreamEvent,
  UpstreamProviderPort,
} from '@ai-relay/domain';
import { createLogger } from '../logging/console-logger.js';
import { emptyStream, postUpstream, readUpstreamJson, unexpectedPayload } from '../upstream-http.js';
import { decodeSse } from './sse-decoder.js';
import { chatCompletionEvents, responsesEvents } from './openai-stream.js';
import {
  chatCompletionSchema,
  embeddingsBodySchema,
  fromChatCompletion,
  fromImagesBody,
  fromResponsesBody,
  imagesBodySchema,
  responsesBodySchema,
  toChatCompletionBody,
  toImagesBody,
  toResponsesBody,
} from './openai-wire.js';

const log = createLogger('openai-provider');

export interface OpenAiCompatibleProviderOptions {
  id: string;
  apiKey?: string;
  /** Extra headers sent with every upstream call. */
  headers?: Record<string, string>;
  /** undici dispatcher, e.g. a pooled Agent or a MockAgent in tests. */
  dispatcher?: Dispatcher;
}

/**
 * Provider for any upstream that speaks the OpenAI wire formats. The route's
 * dialect decides whether chat traffic goes out as chat-completions or as
 * responses-API calls; image routes post to `images/generations`.
 */
export class OpenAiCompatibleProvider implements UpstreamProviderPort {
  readonly id: string;

  constructor(private readonly options: OpenAiCompatibleProviderOptions) {
    this.id = options.id;
  }

  async complete(
    request: CanonicalRequest,
    route: ModelRoute,
    signal: AbortSignal,
  ): Promise<CanonicalResponse> {
    if (route.dialect === 'responses') {
      const json = await this.postJson(route, toResponsesBody(request, route, false), signal);
      const body = responsesBodySchema.safeParse(json);
      if (!body.success) throw this.invalidBody(route, body.error);
      return fromResponsesBody(body.data, request, `resp_${uuidv4()}`);
    }

    const json = await this.postJson(route, toChatCompletionBody(request, route, false), signal);
    const body = chatCompletionSchema.safeParse(json);
    if (!body.success) throw this.invalidBody(route, body.error);
    return fromChatCompletion(body.data, request, `chatcmpl-${uuidv4()}`);
  }

  async openStream(
    request: CanonicalRequest,
    route: ModelRoute,
    signal: AbortSignal,
  ): Promise<AsyncIterable<StreamEvent>> {
    const responses = route.dialect === 'responses';
    const payload = responses
      ? toResponsesBody(request, route, true)
      : toChatCompletionBody(request, route, true);

    const res = await this.post(route, payload, signal, 'text/event-stream');
    if (!res.body) throw emptyStream(this.id);

    const messages = decodeSse(res.body);
    return responses
      ? responsesEvents(messages, request, this.id, `resp_${uuidv4()}`)
      : chatCompletionEvents(messages, request, this.id, `chatcmpl-${uuidv4()}`);
  }

  async embed(
    texts: readonly string[],
    route: ModelRoute,
    options: EmbeddingOptions,
    signal: AbortSignal,
  ): Promise<EmbeddingChunkResult> {
    const json = await this.postJson(
      route,
      {
        model: upstreamModelName(route),
        input: [...texts],
        encoding_format: 'float',
        ...(options.dimensions === undefined ? {} : { dimensions: options.dimensions }),
        ...(options.user === undefined ? {} : { user: options.user }),
      },
      signal,
    );

    const body = embeddingsBodySchema.safeParse(json);
    if (!body.success) throw this.invalidBody(route, body.error);

    const vectors = [...body.data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
    const usage = body.data.usage
      ? {
          promptTokens: body.data.usage.prompt_tokens,
          completionTokens: 0,
          totalTokens: body.data.usage.total_tokens,
        }
      : undefined;
    return { vectors, usage };
  }

  async generateImages(
    request: CanonicalRequest,
    route: ModelRoute,
    signal: AbortSignal,
  ): Promise<CanonicalResponse> {
    const json = await this.postJson(route, toImagesBody(request, route), signal);
    const body = imagesBodySchema.safeParse(json);
    if (!body.success) throw this.invalidBody(route, body.error);
    return fromImagesBody(body.data, request, `img-${uuidv4()}`);
  }

  // ─── HTTP ───────────────────────────────────────────────────────────────────

  private async postJson(route: ModelRoute, payload: unknown, signal: AbortSignal): Promise<unknown> {
    const res = await this.post(route, payload, signal, 'application/json');
    return readUpstreamJson(res, this.id, signal);
  }

  private post(route: ModelRoute, payload: unknown, signal: AbortSignal, accept: string): Promise<Response> {
    const headers: Record<string, string> = { Accept: accept, ...this.options.headers };
    if (this.options.apiKey) headers['Authorization'] = `Bearer ${this.options.apiKey}`;
    return postUpstream(
      {
        providerId: this.id,
        url: route.endpointUrl,
        headers,
        payload,
        signal,
        dispatcher: this.options.dispatcher,
        model: upstreamModelName(route),
      },
      log,
    );
  }

  private invalidBody(route: ModelRoute, cause: unknown): GatewayError {
    return unexpectedPayload(this.id, route.dialect, cause);
  }
}
