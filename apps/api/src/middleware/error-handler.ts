import type { Request, Response, NextFunction } from 'express';
import { ZodError, z } from 'zod';
import { GatewayError, isGatewayError } from '@ai-relay/domain';
import { createLogger, describeError } from '@ai-relay/adapters';
import type {} from './request-context.js';

const log = createLogger('http');

/** Shape of the errors thrown by express.json() (body-parser). */
const bodyParserErrorSchema = z.object({ type: z.string(), status: z.number().optional() });

const BODY_PARSER_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Request body is not valid JSON',
  'entity.too.large': 'Request body is too large',
  'encoding.unsupported': 'Request body encoding is not supported',
};

function toEnvelopeError(err: unknown): GatewayError {
  if (isGatewayError(err)) return err;
  if (err instanceof ZodError) {
    return GatewayError.badRequest(err.issues[0]?.message ?? 'Invalid request body', err);
  }
  const parsed = bodyParserErrorSchema.safeParse(err);
  if (parsed.success) {
    const message = BODY_PARSER_MESSAGES[parsed.data.type];
    if (message) return GatewayError.badRequest(message, err);
  }
  return GatewayError.internal(err);
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new GatewayError('not_found', `Unknown route: ${req.method} ${req.path}`));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const error = toEnvelopeError(err);
  if (error.kind === 'internal_error') {
    log.error('unhandled error', { requestId: req.requestId, error: describeError(err) });
  }

  if (res.headersSent) {
    res.end();
    return;
  }
  res.status(error.status).json(error.toEnvelope());
}
