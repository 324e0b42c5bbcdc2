/**
 * Events Routes
 *
 * Reporting API for the dashboard. Authentication and rate limiting are
 * mounted in front of this router by the app.
 */

import { Router } from 'express';
import { EventsController } from '../controllers/events.controller';
import type { EventStore } from '../repositories/event.repository';
import { asyncHandler } from '../utils/async-handler';

export function createEventsRouter(store: EventStore): Router {
  const router = Router();
  const controller = new EventsController(store);

  /**
   * @openapi
   * /api/events:
   *   get:
   *     tags: [Events]
   *     summary: List the most recent events
   *     description: Newest first by event timestamp. At most 50 events are returned.
   *     security:
   *       - basicAuth: []
   *     parameters:
   *       - name: limit
   *         in: query
   *         required: false
   *         schema:
   *           type: integer
   *           minimum: 1
   *           maximum: 50
   *           default: 50
   *     responses:
   *       200:
   *         description: Recent events
   *         content:
   *           application/json:
   *             schema:
   *               allOf:
   *                 - $ref: '#/components/schemas/SuccessResponse'
   *                 - type: object
   *                   properties:
   *                     data:
   *                       type: array
   *                       items:
   *                         $ref: '#/components/schemas/StoredEvent'
   *       400:
   *         $ref: '#/components/responses/BadRequestError'
   *       401:
   *         $ref: '#/components/responses/UnauthorizedError'
   *       429:
   *         $ref: '#/components/responses/RateLimitError'
   */
  router.get('/', asyncHandler(controller.listRecent.bind(controller)));

  return router;
}
