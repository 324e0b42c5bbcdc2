/**
 * Error Handler Middleware
 *
 * Global error handling with structured logging and standardized responses.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ApiError, InternalError, ValidationError } from '../models/errors/api-error';
import { errorResponse } from '../utils/response';
import { logger } from '../utils/logger';

/**
 * body-parser failures (oversized or unreadable bodies) carry an HTTP status
 */
function httpStatusOf(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction
): void {
  if (err instanceof ZodError) {
    const validationError = new ValidationError(
      'Request validation failed',
      err.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
        code: e.code,
      }))
    );

    logger.warn('Validation error', {
      path: req.path,
      method: req.method,
      errors: validationError.details,
    });

    errorResponse(res, validationError);
    return;
  }

  if (err instanceof ApiError) {
    const log = err.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log('API error', {
      code: err.code,
      message: err.message,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method,
      ...(err.statusCode >= 500 && { stack: err.stack }),
    });

    errorResponse(res, err);
    return;
  }

  const clientStatus = httpStatusOf(err);
  if (clientStatus !== undefined) {
    logger.warn('Request rejected by body parser', { path: req.path, statusCode: clientStatus, message: err.message });
    errorResponse(res, new ApiError(err.message, clientStatus, 'BAD_REQUEST'));
    return;
  }

  logger.error('Unexpected error', {
    message: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  // Don't expose internal error details in production
  const isDevelopment = process.env.NODE_ENV !== 'production';

  errorResponse(
    res,
    isDevelopment ? new InternalError(err.message, { stack: err.stack }) : new InternalError()
  );
}

/**
 * 404 handler for unknown routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', {
    path: req.path,
    method: req.method,
  });

  res.status(404).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: 'Route not found',
      path: req.path,
    },
  });
}
