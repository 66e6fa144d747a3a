import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import type { Principal } from '@ai-relay/domain';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      principal?: Principal;
    }
  }
}

export const REQUEST_ID_HEADER = 'x-request-id';

/** Tags every request with an id, reusing a caller-supplied uuid when present. */
export function requestContext(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const incoming = req.header(REQUEST_ID_HEADER)?.trim();
    const requestId = incoming && isUuid(incoming) ? incoming : uuidv4();
    req.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);
    next();
  };
}
