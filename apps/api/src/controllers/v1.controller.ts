import { Router } from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { unixNow } from '@ai-relay/domain';
import type { Dialect, DispatchPort, ModelRegistryPort } from '@ai-relay/domain';
import { createLogger } from '@ai-relay/adapters';
import { writeSse } from '../services/streaming/sse-writer.js';
import type {} from '../middleware/request-context.js';

const log = createLogger('v1');

export interface V1RouterDeps {
  dispatch: DispatchPort;
  registry: ModelRegistryPort;
  /** Reported as `created` in the model list. */
  startedAt?: number;
}

export function createV1Router(deps: V1RouterDeps): Router {
  const router = Router();
  const startedAt = deps.startedAt ?? unixNow();

  const dispatchTo =
    (dialect: Dialect): RequestHandler =>
    async (req: Request, res: Response, next: NextFunction) => {
      const disconnect = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) disconnect.abort();
      });

      try {
        const result = await deps.dispatch.handle(req.body, dialect, {
          requestId: req.requestId ?? '',
          signal: disconnect.signal,
          principal: req.principal,
        });
        if (result.kind === 'json') {
          res.status(result.status).json(result.body);
          return;
        }
        await writeSse(res, result.frames);
      } catch (err) {
        if (disconnect.signal.aborted) {
          log.debug('dropping error for disconnected client', { requestId: req.requestId });
          return;
        }
        next(err);
      }
    };

  /** POST /v1/chat/completions */
  router.post('/chat/completions', dispatchTo('chat_completions'));

  /** POST /v1/responses */
  router.post('/responses', dispatchTo('responses'));

  /** POST /v1/embeddings */
  router.post('/embeddings', dispatchTo('embeddings'));

  /** POST /v1/images/generations */
  router.post('/images/generations', dispatchTo('images'));

  /** GET /v1/models */
  router.get('/models', (_req: Request, res: Response) => {
    res.json({
      object: 'list',
      data: deps.registry.list().map((route) => ({
        id: route.modelName,
        object: 'model',
        created: startedAt,
        owned_by: route.providerId,
      })),
    });
  });

  return router;
}
