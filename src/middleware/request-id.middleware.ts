import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

// Extend Express Request type to include requestId
declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

const REQUEST_ID_PATTERN = /^[a-zA-Z0-9-]{1,128}$/;

/**
 * Request ID middleware
 * - Accepts X-Request-ID from the client when it is well formed
 * - Generates a new UUID otherwise
 * - Returns the id in the response header so logs can be matched to a card
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const clientId = req.get('x-request-id');
  const requestId = clientId && REQUEST_ID_PATTERN.test(clientId) ? clientId : randomUUID();

  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}
