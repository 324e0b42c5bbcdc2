/**
 * Response Helpers
 *
 * Standardized response formatting for success and error responses.
 */

import type { Response } from 'express';
import type { ApiResponse, ApiErrorResponse } from '../models/dtos/common.dto';
import type { ApiError } from '../models/errors/api-error';

export function successResponse<T>(
  res: Response,
  data: T,
  meta?: Record<string, unknown>,
  statusCode = 200
): Response<ApiResponse<T>> {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  if (meta) {
    response.meta = meta;
  }

  return res.status(statusCode).json(response);
}

export function errorResponse(res: Response, error: ApiError): Response<ApiErrorResponse> {
  const errorObj: ApiErrorResponse['error'] = {
    code: error.code,
    message: error.message,
  };

  if (error.details !== undefined) {
    errorObj.details = error.details;
  }

  return res.status(error.statusCode).json({
    success: false,
    error: errorObj,
  });
}
