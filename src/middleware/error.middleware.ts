import { Request, Response, NextFunction } from 'express';
import { AppException, ErrorCode } from '../utils/exceptions';
import { logger } from '../config/logger.config';
import { env } from '../config/env.config';

export const errorHandler = (
  err: Error | AppException,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  // Handle custom AppException instances
  if (err instanceof AppException) {
    const logPayload = {
      code: err.errorCode,
      message: err.message,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method,
      requestId: req.requestId,
    };
    // 5xx means the card could not be produced for reasons the caller can't fix
    if (err.statusCode >= 500) {
      logger.error('Card request failed', logPayload);
    } else {
      logger.warn('Application error', logPayload);
    }

    return res.status(err.statusCode).json({
      error: {
        code: err.errorCode,
        message: err.message,
      },
    });
  }

  // Handle unexpected errors
  const logPayload: Record<string, unknown> = {
    error: err.message,
    path: req.path,
    method: req.method,
    requestId: req.requestId,
  };

  if (env.NODE_ENV !== 'production') {
    logPayload.stack = err.stack;
  } else {
    logPayload.errorType = err.constructor.name;
  }

  logger.error('Unexpected error', logPayload);

  return res.status(500).json({
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An error occurred while processing your request',
    },
  });
};
