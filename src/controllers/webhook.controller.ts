/**
 * Webhook Controller
 *
 * Receives provider deliveries on the raw-body route, runs them through the
 * ingestion pipeline and acknowledges with the outcome. Alert dispatch is
 * deferred until the response has been written.
 */

import type { Request, Response } from 'express';
import { BaseController } from './base.controller';
import type { IngestionPipeline } from '../services/ingestion.service';
import type { AlertDispatcher } from '../services/alert-dispatcher.service';
import type { BackgroundTaskRunner } from '../utils/background-tasks';
import { logger } from '../utils/logger';

export interface WebhookControllerDeps {
  pipeline: IngestionPipeline;
  dispatcher: AlertDispatcher;
  backgroundTasks: BackgroundTaskRunner;
  signatureHeader: string;
}

export class WebhookController extends BaseController {
  constructor(private readonly deps: WebhookControllerDeps) {
    super();
  }

  /**
   * POST /webhook/motive
   */
  async receive(req: Request, res: Response): Promise<Response> {
    const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const header = req.headers[this.deps.signatureHeader];
    const signature = Array.isArray(header) ? header[0] : header;

    const { outcome, notifications } = await this.deps.pipeline.process({ rawBody, signature });

    if (notifications.length > 0) {
      logger.debug('Deferring alert dispatch', { count: notifications.length });
      this.deps.backgroundTasks.runAfterResponse(res, 'dispatch-alerts', async () => {
        await this.deps.dispatcher.dispatchAll(notifications);
      });
    }

    return this.success(res, outcome);
  }
}
