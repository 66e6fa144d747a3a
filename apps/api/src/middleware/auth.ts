import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { GatewayError } from '@ai-relay/domain';
import type { CredentialVerifierPort } from '@ai-relay/domain';
import type {} from './request-context.js';

function bearerToken(req: Request): string | null {
  const header = req.header('authorization')?.trim();
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header);
  return match?.[1]?.trim() || null;
}

/** Resolves the caller's principal from `Authorization: Bearer <key>`. */
export function requireApiKey(verifier: CredentialVerifierPort): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      const principal = await verifier.verify(bearerToken(req));
      if (!principal) {
        return next(new GatewayError('unauthorized', 'Invalid or missing API key'));
      }
      req.principal = principal;
      return next();
    } catch (err) {
      return next(err);
    }
  };
}
