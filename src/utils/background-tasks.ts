/**
 * Background Task Runner
 *
 * Runs work outside the request/response cycle. Tasks registered with
 * runAfterResponse() start only once the response has been flushed, so a
 * slow outbound call can never delay the webhook provider's 2xx.
 *
 * Task failures are logged and never rethrown. drain() lets shutdown (and
 * tests) wait for everything that is still in flight.
 */

import type { Response } from 'express';
import { logger } from './logger';
import { errorMessage } from '../models/errors/api-error';

export type BackgroundTask = () => Promise<void>;

export class BackgroundTaskRunner {
  private readonly pending = new Set<Promise<void>>();

  /**
   * Schedule a task on the next macrotask turn
   */
  schedule(name: string, task: BackgroundTask): void {
    const run: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(task)
      .catch((error: unknown) => {
        logger.error('Background task failed', { task: name, error: errorMessage(error) });
      })
      .finally(() => {
        this.pending.delete(run);
      });

    this.pending.add(run);
  }

  /**
   * Schedule a task once the response is finished (or the socket closed)
   */
  runAfterResponse(res: Response, name: string, task: BackgroundTask): void {
    let scheduled = false;
    const fire = (): void => {
      if (scheduled) return;
      scheduled = true;
      this.schedule(name, task);
    };

    if (res.writableFinished) {
      fire();
      return;
    }

    res.once('finish', fire);
    res.once('close', fire);
  }

  get size(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
