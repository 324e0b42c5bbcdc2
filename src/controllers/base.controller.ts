/**
 * Base Controller
 *
 * Common response helpers for all controllers.
 */

import type { Response } from 'express';
import { successResponse } from '../utils/response';

export class BaseController {
  /**
   * Send successful response with data
   */
  protected success<T>(res: Response, data: T, meta?: Record<string, unknown>) {
    return successResponse(res, data, meta);
  }
}
