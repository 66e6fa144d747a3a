import type { Dispatcher } from 'undici';
import { v4 as uuidv4 } from 'uuid';
import { GatewayError, upstreamModelName } from '@ai-relay/domain';
import type {
  CanonicalRequest,
  CanonicalResponse,
  EmbeddingChunkResult,
  EmbeddingOptions,
  ModelRoute,
  StreamEvent,
  UpstreamProviderPort,
} from '@ai-relay/domain';
import { createLogger } from '../logging/console-logger.js';
import { decodeSse } from '../openai/sse-decoder.js';
import { emptyStream, postUpstream, readUpstreamJson, unexpectedPayload } from '../upstream-http.js';
import { generateContentEvents } from './gemini-stream.js';
import {
  batchEmbedSchema,
  fromGenerateContent,
  generateContentSchema,
  toBatchEmbedBody,
  toGenerateContentBody,
} from './gemini-wire.js';

const log = createLogger('gemini');

export interface GeminiProviderOptions {
  id: string;
  apiKey?: string;
  headers?: Record<string, string>;
  dispatcher?: Dispatcher;
}

/**
 * Provider for the Gemini `generativelanguage` API. A route's endpoint is the
 * API base (e.g. `https://generativelanguage.googleapis.com/v1beta`); the
 * model method is appended per call.
 */
export class GeminiProvider implements UpstreamProviderPort {
  readonly id: string;

  constructor(private readonly options: GeminiProviderOptions) {
    this.id = options.id;
  }

  async complete(
    request: CanonicalRequest,
    route: ModelRoute,
    signal: AbortSignal,
  ): Promise<CanonicalResponse> {
    const res = await this.post(route, 'generateContent', toGenerateContentBody(request), signal);
    const body = generateContentSchema.safeParse(await readUpstreamJson(res, this.id, signal));
    if (!body.success) throw unexpectedPayload(this.id, route.dialect, body.error);
    return fromGenerateContent(body.data, request, `chatcmpl-${uuidv4()}`);
  }

  async openStream(
    request: CanonicalRequest,
    route: ModelRoute,
    signal: AbortSignal,
  ): Promise<AsyncIterable<StreamEvent>> {
    const res = await this.post(route, 'streamGenerateContent?alt=sse', toGenerateContentBody(request), signal);
    if (!res.body) throw emptyStream(this.id);
    return generateContentEvents(decodeSse(res.body), request, this.id, `chatcmpl-${uuidv4()}`);
  }

  async embed(
    texts: readonly string[],
    route: ModelRoute,
    options: EmbeddingOptions,
    signal: AbortSignal,
  ): Promise<EmbeddingChunkResult> {
    const res = await this.post(
      route,
      'batchEmbedContents',
      toBatchEmbedBody(texts, upstreamModelName(route), options.dimensions),
      signal,
    );
    const body = batchEmbedSchema.safeParse(await readUpstreamJson(res, this.id, signal));
    if (!body.success) throw unexpectedPayload(this.id, route.dialect, body.error);
    if (body.data.embeddings.length !== texts.length) {
      throw unexpectedPayload(
        this.id,
        route.dialect,
        `expected ${texts.length} embeddings, got ${body.data.embeddings.length}`,
      );
    }
    // Gemini does not report token counts for embeddings.
    return { vectors: body.data.embeddings.map((embedding) => embedding.values) };
  }

  async generateImages(
    _request: CanonicalRequest,
    route: ModelRoute,
    _signal: AbortSignal,
  ): Promise<CanonicalResponse> {
    throw GatewayError.badRequest(`Model '${route.modelName}' does not support image generation`);
  }

  private post(route: ModelRoute, method: string, payload: unknown, signal: AbortSignal) {
    const model = upstreamModelName(route);
    const headers: Record<string, string> = { ...this.options.headers };
    if (this.options.apiKey) headers['x-goog-api-key'] = this.options.apiKey;
    return postUpstream(
      {
        providerId: this.id,
        url: `${route.endpointUrl.replace(/\/+$/, '')}/models/${encodeURIComponent(model)}:${method}`,
        headers,
        payload,
        signal,
        dispatcher: this.options.dispatcher,
        model,
      },
      log,
    );
  }
}
