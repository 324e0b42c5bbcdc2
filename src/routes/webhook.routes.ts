/**
 * Webhook Routes
 *
 * The body is read as a raw Buffer: the HMAC covers the exact bytes the
 * provider sent, so no JSON parser may run before verification.
 */

import express, { Router } from 'express';
import { WebhookController, type WebhookControllerDeps } from '../controllers/webhook.controller';
import { asyncHandler } from '../utils/async-handler';

export const WEBHOOK_BODY_LIMIT = '1mb';

export function createWebhookRouter(deps: WebhookControllerDeps): Router {
  const router = Router();
  const controller = new WebhookController(deps);

  /**
   * @openapi
   * /webhook/motive:
   *   post:
   *     tags: [Webhook]
   *     summary: Receive a fleet telemetry webhook delivery
   *     description: |
   *       Accepts a single event object or an array of events. The body must be
   *       signed with HMAC-SHA1 (hex) using the shared webhook secret and the
   *       digest sent in the `X-KT-Webhook-Signature` header.
   *
   *       Recognized actions are `speeding_event_created` and
   *       `safety_event_created`; anything else is acknowledged and ignored.
   *       Alerts are sent after the response.
   *     parameters:
   *       - name: X-KT-Webhook-Signature
   *         in: header
   *         required: true
   *         schema:
   *           type: string
   *       - $ref: '#/components/parameters/CorrelationIdHeader'
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             oneOf:
   *               - $ref: '#/components/schemas/WebhookEvent'
   *               - type: array
   *                 items:
   *                   $ref: '#/components/schemas/WebhookEvent'
   *     responses:
   *       200:
   *         description: Delivery processed
   *         content:
   *           application/json:
   *             schema:
   *               allOf:
   *                 - $ref: '#/components/schemas/SuccessResponse'
   *                 - type: object
   *                   properties:
   *                     data:
   *                       $ref: '#/components/schemas/IngestionOutcome'
   *       400:
   *         $ref: '#/components/responses/BadRequestError'
   *       403:
   *         $ref: '#/components/responses/ForbiddenError'
   */
  router.post(
    '/motive',
    express.raw({ type: () => true, limit: WEBHOOK_BODY_LIMIT }),
    asyncHandler(controller.receive.bind(controller))
  );

  return router;
}
