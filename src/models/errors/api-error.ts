/**
 * API Error Hierarchy
 *
 * Typed error classes for the webhook pipeline and the reporting API.
 * All errors extend ApiError with a statusCode, a machine-readable code and optional details.
 */

export class ApiError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, code?: string, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code || this.name;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export type AuthFailureReason = 'MissingSignature' | 'InvalidSignature';

/**
 * Webhook delivery could not be authenticated (403)
 */
export class AuthError extends ApiError {
  public readonly reason: AuthFailureReason;

  constructor(reason: AuthFailureReason, message?: string) {
    super(
      message || (reason === 'MissingSignature' ? 'Missing webhook signature' : 'Invalid webhook signature'),
      403,
      reason === 'MissingSignature' ? 'MISSING_SIGNATURE' : 'INVALID_SIGNATURE'
    );
    this.reason = reason;
  }
}

export class MalformedPayloadError extends ApiError {
  constructor(message = 'Invalid JSON payload', details?: unknown) {
    super(message, 400, 'MALFORMED_PAYLOAD', details);
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class AuthenticationError extends ApiError {
  constructor(message = 'Authentication failed') {
    super(message, 401, 'AUTHENTICATION_ERROR');
  }
}

export class PersistenceError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'PERSISTENCE_ERROR', details);
  }
}

export class DispatchError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 502, 'DISPATCH_ERROR', details);
  }
}

export class ExternalServiceError extends ApiError {
  constructor(service: string, message?: string) {
    super(message || `External service error: ${service}`, 502, 'EXTERNAL_SERVICE_ERROR');
  }
}

export class InternalError extends ApiError {
  constructor(message = 'Internal server error', details?: unknown) {
    super(message, 500, 'INTERNAL_SERVER_ERROR', details);
  }
}

/**
 * Extract a log-safe message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
