import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { CredentialVerifierPort, DispatchPort, ModelRegistryPort } from '@ai-relay/domain';

import { createV1Router } from './controllers/v1.controller.js';
import { requireApiKey } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestContext } from './middleware/request-context.js';
import type { GatewayMetrics } from './services/metrics/gateway-metrics.js';

export interface AppDeps {
  dispatch: DispatchPort;
  registry: ModelRegistryPort;
  verifier: CredentialVerifierPort;
  corsOrigin?: string;
  /** Access logging; off by default under Jest. */
  accessLog?: boolean;
  /** When set, GET /metrics is served and every later request is measured. */
  metrics?: GatewayMetrics;
}

export function buildApp(deps: AppDeps): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  app.use(requestContext());
  if (deps.metrics) {
    // Registered before the measuring middleware so scrapes are not counted.
    app.get('/metrics', deps.metrics.handler());
    app.use(deps.metrics.middleware());
  }
  if (deps.accessLog ?? process.env['NODE_ENV'] !== 'test') app.use(morgan('combined'));
  app.use(express.json({ limit: '10mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      models: deps.registry.list().length,
    });
  });

  app.use(
    '/v1',
    requireApiKey(deps.verifier),
    createV1Router({ dispatch: deps.dispatch, registry: deps.registry }),
  );

  // ─── Fallbacks (must be last) ───────────────────────────────────────────────
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
