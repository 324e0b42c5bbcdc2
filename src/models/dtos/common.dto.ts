/**
 * Common DTOs
 *
 * Shared data transfer objects used across the API.
 */

// ============================================================================
// API Response Envelope
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
  meta?: Record<string, unknown>;
}

export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// ============================================================================
// Health Check
// ============================================================================

export interface HealthCheckResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  services: {
    database: ServiceHealth;
  };
}

export interface ServiceHealth {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}
