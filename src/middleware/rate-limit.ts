/**
 * Rate Limiting Middleware
 *
 * In-memory limiter for the reporting API. The service runs as a single
 * process, so the default express-rate-limit store is sufficient.
 *
 * Returns 429 Too Many Requests with Retry-After header.
 * Adds standard RateLimit-* headers to all limited responses.
 */

import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import type { Request, Response } from 'express';
import { logHelpers } from '../utils/logger';

const WINDOW_MS = 60 * 1000;

function rateLimitExceededHandler(req: Request, res: Response): void {
  const retryAfter = Math.ceil(WINDOW_MS / 1000);

  logHelpers.security('rate_limit_exceeded', 'medium', {
    path: req.path,
    method: req.method,
    ip: req.ip,
  });

  res.setHeader('Retry-After', String(retryAfter));
  res.status(429).json({
    success: false,
    error: {
      code: 'RATE_LIMIT_EXCEEDED',
      message: 'Rate limit exceeded. Please try again later.',
      details: { retryAfter },
    },
  });
}

export function createQueryRateLimiter(maxPerMinute: number): RateLimitRequestHandler {
  return rateLimit({
    windowMs: WINDOW_MS,
    limit: maxPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    handler: rateLimitExceededHandler,
  });
}
