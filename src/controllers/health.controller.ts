/**
 * Health Controller
 *
 * Liveness plus database connectivity.
 */

import type { Request, Response } from 'express';
import { BaseController } from './base.controller';
import type { HealthCheckResponse, ServiceHealth } from '../models/dtos/common.dto';
import type { EventStore } from '../repositories/event.repository';
import { errorMessage } from '../models/errors/api-error';
import { logger } from '../utils/logger';

export class HealthController extends BaseController {
  constructor(private readonly store: EventStore) {
    super();
  }

  /**
   * GET /health
   */
  async checkHealth(req: Request, res: Response): Promise<Response> {
    const database = await this.checkDatabase();

    const health: HealthCheckResponse = {
      status: database.status === 'up' ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      services: { database },
    };

    if (health.status !== 'healthy') {
      logger.warn('Health check failed', { health });
    }

    return this.success(res, health);
  }

  private async checkDatabase(): Promise<ServiceHealth> {
    const startTime = Date.now();
    try {
      await this.store.ping();
      return { status: 'up', latency: Date.now() - startTime };
    } catch (error) {
      logger.error('Database health check failed', { error: errorMessage(error) });
      return { status: 'down', error: errorMessage(error) };
    }
  }
}
