import { Ollama } from 'ollama';
import type { ChatResponse, Message, Options } from 'ollama';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { GatewayError, requestMessages, unixNow, upstreamModelName } from '@ai-relay/domain';
import type {
  CanonicalRequest,
  CanonicalResponse,
  EmbeddingChunkResult,
  EmbeddingOptions,
  ModelRoute,
  StreamEvent,
  TokenUsage,
  UpstreamProviderPort,
} from '@ai-relay/domain';
import { createLogger, describeError } from '../logging/console-logger.js';
import { abortError } from '../upstream-errors.js';

const log = createLogger('ollama');

export interface OllamaProviderOptions {
  id: string;
  /** Replaces the global fetch; tests hand in a fake server here. */
  fetch?: typeof fetch;
  headers?: Record<string, string>;
}

const responseErrorSchema = z.object({ error: z.string(), status_code: z.number() });

/**
 * Provider backed by a local Ollama daemon via the official client. Routes
 * point at the daemon's base URL; the client appends its own `/api/*` paths.
 */
export class OllamaProvider implements UpstreamProviderPort {
  readonly id: string;

  constructor(private readonly options: OllamaProviderOptions) {
    this.id = options.id;
  }

  async complete(
    request: CanonicalRequest,
    route: ModelRoute,
    signal: AbortSignal,
  ): Promise<CanonicalResponse> {
    const client = this.client(route, signal);
    try {
      const response = await client.chat({
        model: upstreamModelName(route),
        messages: toOllamaMessages(request),
        options: toOllamaOptions(request),
        stream: false,
      });
      return {
        id: `chatcmpl-${uuidv4()}`,
        model: request.model,
        created: unixNow(),
        status: 'completed',
        output: [{ type: 'output_text', text: response.message.content }],
        usage: ollamaUsage(response),
        finishReason: finishReason(response),
      };
    } catch (err) {
      throw this.translate(err, signal);
    }
  }

  async openStream(
    request: CanonicalRequest,
    route: ModelRoute,
    signal: AbortSignal,
  ): Promise<AsyncIterable<StreamEvent>> {
    const client = this.client(route, signal);
    let parts: AsyncIterable<ChatResponse>;
    try {
      parts = await client.chat({
        model: upstreamModelName(route),
        messages: toOllamaMessages(request),
        options: toOllamaOptions(request),
        stream: true,
      });
    } catch (err) {
      throw this.translate(err, signal);
    }
    return this.events(parts, request, signal);
  }

  async embed(
    texts: readonly string[],
    route: ModelRoute,
    options: EmbeddingOptions,
    signal: AbortSignal,
  ): Promise<EmbeddingChunkResult> {
    if (options.dimensions !== undefined) {
      throw GatewayError.badRequest(`Model '${route.modelName}' does not support the 'dimensions' parameter`);
    }

    const client = this.client(route, signal);
    try {
      const response = await client.embed({
        model: upstreamModelName(route),
        input: [...texts],
      });
      const promptTokens = response.prompt_eval_count ?? 0;
      return {
        vectors: response.embeddings,
        usage: { promptTokens, completionTokens: 0, totalTokens: promptTokens },
      };
    } catch (err) {
      throw this.translate(err, signal);
    }
  }

  async generateImages(
    _request: CanonicalRequest,
    route: ModelRoute,
    _signal: AbortSignal,
  ): Promise<CanonicalResponse> {
    throw GatewayError.badRequest(`Model '${route.modelName}' does not support image generation`);
  }

  private async *events(
    parts: AsyncIterable<ChatResponse>,
    request: CanonicalRequest,
    signal: AbortSignal,
  ): AsyncGenerator<StreamEvent> {
    const id = `chatcmpl-${uuidv4()}`;
    const created = unixNow();
    let text = '';

    yield { type: 'response.started', payload: { id, model: request.model, created } };
    try {
      for await (const part of parts) {
        const delta = part.message.content;
        if (delta) {
          text += delta;
          yield { type: 'output_text.delta', payload: { delta } };
        }
        if (part.done) {
          yield {
            type: 'response.completed',
            payload: {
              response: {
                id,
                model: request.model,
                created,
                status: 'completed',
                output: [{ type: 'output_text', text }],
                usage: ollamaUsage(part),
                finishReason: finishReason(part),
              },
            },
          };
          return;
        }
      }
    } catch (err) {
      throw this.translate(err, signal);
    }
  }

  private client(route: ModelRoute, signal: AbortSignal): Ollama {
    // The client has no per-call signal for non-streaming calls, so the
    // dispatch signal is threaded through fetch instead.
    const base = this.options.fetch ?? fetch;
    const scoped: typeof fetch = (input, init) =>
      base(input, {
        ...init,
        signal: init?.signal ? AbortSignal.any([init.signal, signal]) : signal,
      });
    return new Ollama({
      host: new URL(route.endpointUrl).origin,
      fetch: scoped,
      headers: this.options.headers,
    });
  }

  private translate(err: unknown, signal: AbortSignal): GatewayError {
    if (err instanceof GatewayError) return err;
    if (signal.aborted) return abortError(signal, err);

    const response = responseErrorSchema.safeParse(err);
    if (response.success) {
      log.warn('daemon rejected call', { provider: this.id, status: response.data.status_code, error: response.data.error });
      return new GatewayError(
        'upstream_error',
        `Upstream provider '${this.id}' responded with status ${response.data.status_code}`,
        { upstreamStatus: response.data.status_code, cause: response.data.error },
      );
    }
    log.error('daemon unreachable', { provider: this.id, error: describeError(err) });
    return new GatewayError('upstream_error', `Upstream provider '${this.id}' is unreachable`, { cause: err });
  }
}

// ─── Mapping ──────────────────────────────────────────────────────────────────

function toOllamaMessages(request: CanonicalRequest): Message[] {
  return requestMessages(request).map((m) => ({
    role: m.role === 'developer' ? 'system' : m.role,
    content: m.content,
  }));
}

function numberOption(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function stopOption(value: unknown): string[] | undefined {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.filter((item): item is string => typeof item === 'string');
  return undefined;
}

function toOllamaOptions(request: CanonicalRequest): Partial<Options> {
  const extra = request.extraOptions;
  const options: Partial<Options> = {};
  if (request.temperature !== undefined) options.temperature = request.temperature;

  const maxTokens = numberOption(extra['max_tokens']) ?? numberOption(extra['max_output_tokens']);
  if (maxTokens !== undefined) options.num_predict = maxTokens;
  const topP = numberOption(extra['top_p']);
  if (topP !== undefined) options.top_p = topP;
  const seed = numberOption(extra['seed']);
  if (seed !== undefined) options.seed = seed;
  const stop = stopOption(extra['stop']);
  if (stop !== undefined) options.stop = stop;
  return options;
}

function ollamaUsage(response: ChatResponse): TokenUsage {
  const promptTokens = response.prompt_eval_count ?? 0;
  const completionTokens = response.eval_count ?? 0;
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

function finishReason(response: ChatResponse): string {
  return response.done_reason === 'length' ? 'length' : 'stop';
}
