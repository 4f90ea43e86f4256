import rateLimit from 'express-rate-limit';
import { Request } from 'express';
import { ErrorCode } from '../utils/exceptions';

/**
 * Rate limiter for card rendering.
 * Each card costs upstream stats calls and a render, so limit per client IP:
 * 30 cards per minute. In-memory store: limits are per process.
 */
export const cardLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 30,
  message: {
    error: {
      code: ErrorCode.RATE_LIMITED,
      message: 'Too many card requests. Please try again later.',
    },
  },
  keyGenerator: (req: Request) => req.ip || 'unknown',
  standardHeaders: true,
  legacyHeaders: false,
});
