/**
 * Correlation ID Middleware
 *
 * Generates or extracts correlation IDs for request tracing.
 * Correlation IDs are automatically included in all log entries within the request scope.
 */

import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { asyncLocalStorage, logHelpers } from '../utils/logger';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim() !== '' ? first.trim() : undefined;
}

export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
  const correlationId = headerValue(req.headers[CORRELATION_ID_HEADER]) ?? randomUUID();

  asyncLocalStorage.run({ correlationId }, () => {
    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    const startTime = Date.now();

    logHelpers.apiRequest(req.method, req.path, {
      query: req.query,
      ip: req.ip,
      userAgent: req.headers['user-agent'],
    });

    res.once('finish', () => {
      logHelpers.apiResponse(req.method, req.path, res.statusCode, Date.now() - startTime);
    });

    next();
  });
}
