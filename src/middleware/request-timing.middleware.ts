import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger.config';

/** Cards take a network round trip plus a render; anything slower than this is worth a look */
const SLOW_REQUEST_MS = 2000;

export function requestTimingMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const path = req.route?.path || req.path;
    const method = req.method;
    const status = res.statusCode;

    if (duration > SLOW_REQUEST_MS) {
      logger.warn('Slow request detected', { method, path, status, durationMs: duration, requestId: req.requestId });
    } else {
      logger.debug('Request completed', { method, path, status, durationMs: duration, requestId: req.requestId });
    }
  });

  next();
}
