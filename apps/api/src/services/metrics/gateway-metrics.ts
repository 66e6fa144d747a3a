import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { RequestHandler } from 'express';
import type { GatewayHook, TokenUsage } from '@ai-relay/domain';
import { createLogger, describeError } from '@ai-relay/adapters';

const log = createLogger('metrics');

/** Paths reported under their own `route` label; everything else is `other`. */
const KNOWN_ROUTES = new Set([
  '/healthz',
  '/v1/chat/completions',
  '/v1/responses',
  '/v1/embeddings',
  '/v1/images/generations',
  '/v1/models',
]);

export interface GatewayMetricsOptions {
  prefix?: string;
  /** Process metrics (CPU, heap, event loop). Off in tests. */
  defaultMetrics?: boolean;
}

/**
 * Prometheus instruments for the gateway, kept on a private registry so that
 * several apps can live in one process.
 */
export class GatewayMetrics {
  readonly registry = new Registry();
  private readonly requests: Counter<'method' | 'route' | 'status'>;
  private readonly duration: Histogram<'method' | 'route'>;
  private readonly active: Gauge;
  private readonly tokens: Counter<'model' | 'type'>;
  private readonly errors: Counter<'dialect' | 'kind'>;

  constructor(options: GatewayMetricsOptions = {}) {
    const prefix = options.prefix ?? 'airelay_';
    const registers = [this.registry];

    this.requests = new Counter({
      name: `${prefix}requests_total`,
      help: 'HTTP requests by method, route and status',
      labelNames: ['method', 'route', 'status'] as const,
      registers,
    });
    this.duration = new Histogram({
      name: `${prefix}request_duration_seconds`,
      help: 'HTTP request duration, streams included',
      labelNames: ['method', 'route'] as const,
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60, 120],
      registers,
    });
    this.active = new Gauge({
      name: `${prefix}active_requests`,
      help: 'HTTP requests in flight',
      registers,
    });
    this.tokens = new Counter({
      name: `${prefix}tokens_total`,
      help: 'Tokens reported by upstreams, by public model and direction',
      labelNames: ['model', 'type'] as const,
      registers,
    });
    this.errors = new Counter({
      name: `${prefix}errors_total`,
      help: 'Failed gateway calls by dialect and error kind',
      labelNames: ['dialect', 'kind'] as const,
      registers,
    });

    if (options.defaultMetrics) collectDefaultMetrics({ register: this.registry, prefix });
  }

  /** Counts and times every request that reaches it. */
  middleware(): RequestHandler {
    return (req, res, next) => {
      const path = req.originalUrl.split('?')[0] ?? '';
      const route = KNOWN_ROUTES.has(path) ? path : 'other';
      const stop = this.duration.startTimer({ method: req.method, route });
      this.active.inc();

      let recorded = false;
      const record = (): void => {
        if (recorded) return;
        recorded = true;
        this.active.dec();
        stop();
        this.requests.inc({ method: req.method, route, status: String(res.statusCode) });
      };
      res.on('finish', record);
      res.on('close', record);
      next();
    };
  }

  /** Serves the registry in the Prometheus text format. */
  handler(): RequestHandler {
    return (_req, res, next) => {
      this.registry
        .metrics()
        .then((body) => {
          res.set('Content-Type', this.registry.contentType).send(body);
        })
        .catch((err: unknown) => {
          log.error('could not render metrics', { error: describeError(err) });
          next(err);
        });
    };
  }

  /** Hooks that feed token and error counters from the dispatch pipeline. */
  hooks(): GatewayHook[] {
    return [
      {
        kind: 'request',
        name: 'metrics-usage',
        afterResponse: (request, response) => {
          this.countTokens(request.model, response.usage);
        },
      },
      {
        kind: 'stream',
        name: 'metrics-stream-usage',
        onEvent: (event) => {
          if (event.type === 'response.completed') {
            this.countTokens(event.payload.response.model, event.payload.response.usage);
          }
          return event;
        },
      },
      {
        kind: 'error',
        name: 'metrics-errors',
        onError: (error, ctx) => {
          this.errors.inc({ dialect: ctx.dialect, kind: error.kind });
        },
      },
    ];
  }

  private countTokens(model: string, usage: TokenUsage | undefined): void {
    if (!usage) return;
    this.tokens.inc({ model, type: 'prompt' }, usage.promptTokens);
    this.tokens.inc({ model, type: 'completion' }, usage.completionTokens);
  }
}
