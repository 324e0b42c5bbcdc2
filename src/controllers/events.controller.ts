/**
 * Events Controller
 *
 * Read-only access to stored events for the reporting dashboard.
 */

import type { Request, Response } from 'express';
import { BaseController } from './base.controller';
import type { EventStore } from '../repositories/event.repository';
import { ListEventsQuerySchema, toEventView } from '../models/dtos/event.dto';

export class EventsController extends BaseController {
  constructor(private readonly store: EventStore) {
    super();
  }

  /**
   * GET /api/events
   * Most recent events first, at most 50
   */
  async listRecent(req: Request, res: Response): Promise<Response> {
    const { limit } = ListEventsQuerySchema.parse(req.query);
    const events = await this.store.listRecent(limit);

    return this.success(res, events.map(toEventView), { count: events.length, limit });
  }
}
