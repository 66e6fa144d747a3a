import { v4 as uuidv4 } from 'uuid';
import {
  GatewayError,
  isGatewayError,
  requestTexts,
  routeServes,
  toGatewayError,
  unixNow,
} from '@ai-relay/domain';
import type {
  CanonicalRequest,
  CanonicalResponse,
  Dialect,
  DispatchContext,
  DispatchPort,
  DispatchResult,
  EmbeddingBlock,
  EmbeddingOptions,
  HookContext,
  ModelRegistryPort,
  ModelRoute,
  ProviderDirectory,
  StreamEvent,
  UpstreamProviderPort,
} from '@ai-relay/domain';
import { createLogger, describeError } from '@ai-relay/adapters';
import { DIALECT_ADAPTERS } from '../../dialects/index.js';
import type { DialectAdapter } from '../../dialects/index.js';
import type { BatchingCoordinator } from '../batching/batching-coordinator.js';
import type { HookRegistry } from '../hooks/hook-registry.js';
import { proxyStream } from '../streaming/streaming-proxy.js';
import type { StreamOutcome } from '../streaming/streaming-proxy.js';
import { CancellationScope } from './cancellation-scope.js';

const log = createLogger('dispatch');

export interface DispatchCoreDeps {
  registry: ModelRegistryPort;
  providers: ProviderDirectory;
  hooks: HookRegistry;
  batching: BatchingCoordinator;
  dialects?: Readonly<Record<Dialect, DialectAdapter>>;
}

export interface DispatchCoreOptions {
  /** Applies to the whole upstream call, streams included. 0 disables it. */
  upstreamTimeoutMs: number;
  embeddingChunkSize: number;
  streamBufferSize: number;
}

const DIALECT_LABELS: Record<Dialect, string> = {
  chat_completions: 'chat completion',
  responses: 'responses',
  embeddings: 'embeddings',
  images: 'image generation',
};

interface CallContext {
  readonly request: CanonicalRequest;
  readonly route: ModelRoute;
  readonly provider: UpstreamProviderPort;
  readonly adapter: DialectAdapter;
  readonly hookCtx: HookContext;
}

/**
 * Runs one inbound call end to end: decode, route, hooks, a single upstream
 * attempt inside a cancellation scope, encode. Every failure leaves as a
 * GatewayError and is reported to the error hooks exactly once.
 */
export class DispatchCore implements DispatchPort {
  private readonly dialects: Readonly<Record<Dialect, DialectAdapter>>;

  constructor(
    private readonly deps: DispatchCoreDeps,
    private readonly options: DispatchCoreOptions,
  ) {
    this.dialects = deps.dialects ?? DIALECT_ADAPTERS;
  }

  async handle(payload: unknown, dialect: Dialect, ctx: DispatchContext): Promise<DispatchResult> {
    const hookCtx: HookContext = { requestId: ctx.requestId, dialect, principal: ctx.principal };
    try {
      const call = await this.prepare(payload, dialect, hookCtx);
      if (dialect === 'embeddings') return await this.embed(call, ctx);
      if (dialect === 'images') return await this.generateImages(call, ctx);
      if (call.request.stream) return await this.stream(call, ctx);
      return await this.complete(call, ctx);
    } catch (err) {
      throw this.fail(err, hookCtx, ctx.signal);
    }
  }

  // ─── Stages ─────────────────────────────────────────────────────────────────

  private async prepare(payload: unknown, dialect: Dialect, hookCtx: HookContext): Promise<CallContext> {
    const adapter = this.dialects[dialect];
    const decoded = adapter.decode(payload);
    const route = this.deps.registry.resolve(decoded.model);
    if (!routeServes(route, dialect)) {
      throw GatewayError.badRequest(
        `Model '${decoded.model}' does not support ${DIALECT_LABELS[dialect]} requests`,
      );
    }

    const provider = this.deps.providers.get(route.providerId);
    if (!provider) {
      throw GatewayError.internal(new Error(`no provider registered under '${route.providerId}'`));
    }

    const request = await this.deps.hooks.beforeRequest(decoded, hookCtx);
    return { request, route, provider, adapter, hookCtx };
  }

  /** One unary upstream call inside a cancellation scope, then the response hooks. */
  private async respond(
    call: CallContext,
    ctx: DispatchContext,
    invoke: (signal: AbortSignal) => Promise<CanonicalResponse>,
  ): Promise<DispatchResult> {
    const { request, adapter, hookCtx } = call;
    const scope = this.openScope(ctx);
    let response: CanonicalResponse;
    try {
      response = await invoke(scope.signal);
    } catch (err) {
      throw scoped(err, scope.signal);
    } finally {
      scope.dispose();
    }

    response = await this.deps.hooks.afterResponse(request, response, hookCtx);
    log.debug('call complete', { requestId: ctx.requestId, model: request.model, usage: response.usage });
    return { kind: 'json', status: 200, body: adapter.encode(response, request) };
  }

  private complete(call: CallContext, ctx: DispatchContext): Promise<DispatchResult> {
    return this.respond(call, ctx, (signal) => call.provider.complete(call.request, call.route, signal));
  }

  private generateImages(call: CallContext, ctx: DispatchContext): Promise<DispatchResult> {
    return this.respond(call, ctx, (signal) => call.provider.generateImages(call.request, call.route, signal));
  }

  private async stream(call: CallContext, ctx: DispatchContext): Promise<DispatchResult> {
    const { request, route, provider, adapter, hookCtx } = call;
    const encoder = adapter.createStreamEncoder(request);
    const scope = this.openScope(ctx);

    let events: AsyncIterable<StreamEvent>;
    try {
      events = await provider.openStream(request, route, scope.signal);
    } catch (err) {
      scope.dispose();
      throw scoped(err, scope.signal);
    }

    const hooks = this.deps.hooks;
    const frames = proxyStream({
      events,
      encoder,
      request,
      scope,
      clientSignal: ctx.signal,
      bufferSize: this.options.streamBufferSize,
      onEvent: hooks.hasStreamHooks ? (event) => hooks.applyStream(event, hookCtx) : undefined,
      onClose: (outcome) => this.streamClosed(outcome, hookCtx),
    });
    return { kind: 'stream', frames };
  }

  private embed(call: CallContext, ctx: DispatchContext): Promise<DispatchResult> {
    const { request, route, provider } = call;
    const options = embeddingOptions(request);
    const chunkSize = route.maxBatchSize ?? this.options.embeddingChunkSize;

    return this.respond(call, ctx, async (signal) => {
      const batch = await this.deps.batching.embedBatch(
        requestTexts(request),
        chunkSize,
        (texts, _range, chunkSignal) => provider.embed(texts, route, options, chunkSignal),
        signal,
      );
      return {
        id: `emb-${uuidv4()}`,
        model: request.model,
        created: unixNow(),
        status: 'completed',
        output: batch.results.map(
          (embedding, index): EmbeddingBlock => ({ type: 'embedding', index, embedding }),
        ),
        usage: batch.usage,
      };
    });
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  private openScope(ctx: DispatchContext): CancellationScope {
    return new CancellationScope(ctx.signal, this.options.upstreamTimeoutMs);
  }

  private fail(err: unknown, hookCtx: HookContext, clientSignal: AbortSignal): GatewayError {
    const error = toGatewayError(err);
    if (clientSignal.aborted) {
      log.debug('client went away', { requestId: hookCtx.requestId });
    } else if (error.kind === 'internal_error') {
      log.error('call failed', { requestId: hookCtx.requestId, error: describeError(err) });
    } else {
      log.warn('call failed', { requestId: hookCtx.requestId, kind: error.kind, message: error.message });
    }
    this.deps.hooks.notifyError(error, hookCtx);
    return error;
  }

  private streamClosed(outcome: StreamOutcome, hookCtx: HookContext): void {
    log.debug('stream closed', { requestId: hookCtx.requestId, status: outcome.status, events: outcome.forwarded });
    if (outcome.error) this.deps.hooks.notifyError(outcome.error, hookCtx);
  }
}

/** Prefers the scope's abort reason (the timeout) over the transport error it caused. */
function scoped(err: unknown, signal: AbortSignal): unknown {
  const reason: unknown = signal.reason;
  if (signal.aborted && isGatewayError(reason)) return reason;
  return err;
}

function embeddingOptions(request: CanonicalRequest): EmbeddingOptions {
  const { dimensions, user } = request.extraOptions;
  return {
    ...(typeof dimensions === 'number' ? { dimensions } : {}),
    ...(typeof user === 'string' ? { user } : {}),
  };
}
