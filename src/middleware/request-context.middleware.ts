/**
 * Request Context Middleware
 *
 * Assigns every request an ID and runs the rest of the request inside a
 * query context, so slow query logs can be tied back to the request.
 */

import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { withQueryContext } from '../shared/query-context';

// Extend Express Request type to include requestId
declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

// Max 128 chars, alphanumeric + hyphens only (prevents log injection)
const CLIENT_REQUEST_ID_PATTERN = /^[a-zA-Z0-9-]{1,128}$/;

/**
 * Accepts X-Request-ID from the client when well formed, otherwise generates
 * one, and echoes it in the response header.
 */
export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const clientId = req.get('x-request-id');
  const requestId =
    clientId && CLIENT_REQUEST_ID_PATTERN.test(clientId) ? clientId : randomUUID();

  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  withQueryContext({ requestId }, () => {
    next();
  });
}
