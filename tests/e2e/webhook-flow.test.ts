/**
 * E2E Test: Webhook to Alert Flow
 *
 * Drives the Express app over HTTP with in-process fakes for the database,
 * the unit directory and the chat client:
 *   - signed delivery → stored record → alert after the response
 *   - batch accounting, auth failures, malformed bodies
 *   - reporting API auth and ordering, health probes
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import { buildTestApp, DASHBOARD_PASSWORD, DASHBOARD_USER, TEST_CHAT_ID, type TestContext } from '../helpers/test-app';
import { SIGNATURE_HEADER, safetyPayload, sign, speedingPayload } from '../helpers/webhook';

function postWebhook(ctx: TestContext, body: string, signature: string | null = sign(body)) {
  const req = request(ctx.app).post('/webhook/motive').set('Content-Type', 'application/json');
  return signature === null ? req.send(body) : req.set(SIGNATURE_HEADER, signature).send(body);
}

describe('POST /webhook/motive', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = buildTestApp();
  });

  it('stores a speeding event and alerts after responding', async () => {
    const response = await postWebhook(ctx, JSON.stringify(speedingPayload()));

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      success: true,
      data: { status: 'accepted', eventIds: [101], summary: { total: 1, accepted: 1 } },
    });
    expect(ctx.store.records).toHaveLength(1);

    await ctx.settle();

    expect(ctx.chat.sent).toEqual([
      {
        chatId: TEST_CHAT_ID,
        text: [
          '🚨 *Speeding Alert*',
          'Driver: Ana Lee',
          'Unit: Truck 12',
          'Vehicle ID: 42',
          'Event ID: 101',
          'Limit: 31.1 mph',
          'Speed: 43.5 mph',
          'Over: +12.4 mph',
          '[View on map](https://www.google.com/maps?q=37.7749,-122.4194)',
        ].join('\n'),
      },
    ]);
  });

  it('processes a batch and ignores unknown actions', async () => {
    const body = JSON.stringify([speedingPayload(), { action: 'vehicle_location_updated' }, safetyPayload()]);
    const response = await postWebhook(ctx, body);

    expect(response.status).toBe(200);
    expect(response.body.data.eventIds).toEqual([101, 202]);
    expect(response.body.data.summary).toEqual({ total: 3, accepted: 2, ignored: 1, invalid: 0, failed: 0 });

    await ctx.settle();
    expect(ctx.chat.sent.map((m) => m.text.split('\n')[0])).toEqual(['🚨 *Speeding Alert*', '⚠️ *Hard Brake*']);
  });

  it('normalizes the "Hard Braking Event" label', async () => {
    const response = await postWebhook(ctx, JSON.stringify(safetyPayload()));

    expect(response.body.data.accepted).toEqual([{ index: 0, eventId: 202, recordId: 1, eventType: 'hard_brake' }]);
    expect(ctx.store.records[0].eventType).toBe('hard_brake');
  });

  it('suppresses the alert for a small overage but still stores the event', async () => {
    const body = JSON.stringify(speedingPayload({ max_vehicle_speed: 55, max_over_speed_in_kph: 5 }));
    const response = await postWebhook(ctx, body);

    expect(response.status).toBe(200);
    await ctx.settle();
    expect(ctx.store.records).toHaveLength(1);
    expect(ctx.chat.sent).toEqual([]);
  });

  it('rejects a missing signature with 403 and no side effects', async () => {
    const response = await postWebhook(ctx, JSON.stringify(speedingPayload()), null);

    expect(response.status).toBe(403);
    expect(response.body).toEqual({
      success: false,
      error: { code: 'MISSING_SIGNATURE', message: 'Missing webhook signature' },
    });

    await ctx.settle();
    expect(ctx.store.records).toHaveLength(0);
    expect(ctx.chat.sent).toEqual([]);
  });

  it('rejects a wrong signature with 403', async () => {
    const body = JSON.stringify(speedingPayload());
    const response = await postWebhook(ctx, body, sign(body, 'not-the-secret'));

    expect(response.status).toBe(403);
    expect(response.body.error.code).toBe('INVALID_SIGNATURE');
    expect(ctx.store.records).toHaveLength(0);
  });

  it('verifies the signature over the exact bytes received', async () => {
    const body = '{ "action": "speeding_event_created",\n  "id": 101, "driver_id": 7, "vehicle_id": 42,\n  "max_vehicle_speed": 70, "max_posted_speed_limit_in_kph": 50 }';
    const response = await postWebhook(ctx, body);

    expect(response.status).toBe(200);
    expect(response.body.data.eventIds).toEqual([101]);
  });

  it('accepts a signed delivery sent without a content type', async () => {
    const body = JSON.stringify(safetyPayload());
    const response = await request(ctx.app)
      .post('/webhook/motive')
      .set(SIGNATURE_HEADER, sign(body))
      .send(Buffer.from(body));

    expect(response.status).toBe(200);
    expect(response.body.data.eventIds).toEqual([202]);
  });

  it('accepts numeric fields sent as strings', async () => {
    const body = JSON.stringify(speedingPayload({ id: '101', vehicle_id: '42', max_vehicle_speed: '70' }));
    const response = await postWebhook(ctx, body);

    expect(response.status).toBe(200);
    expect(response.body.data.accepted).toEqual([{ index: 0, eventId: 101, recordId: 1, eventType: 'speeding' }]);
    expect(ctx.store.records[0]).toMatchObject({ vehicleUnit: 'Truck 12', speed: 70 });
  });

  it('returns 400 for a body that is not JSON', async () => {
    const body = '{"action": ';
    const response = await postWebhook(ctx, body);

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('MALFORMED_PAYLOAD');
    expect(ctx.store.records).toHaveLength(0);
  });

  it('returns 400 with the issues for an invalid single event', async () => {
    const body = JSON.stringify(speedingPayload({ vehicle_id: 'abc' }));
    const response = await postWebhook(ctx, body);

    expect(response.status).toBe(400);
    expect(response.body.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Invalid speeding event payload',
      details: ['vehicle_id: Expected number, received string'],
    });
  });

  it('acknowledges an unrecognized single event as ignored', async () => {
    const response = await postWebhook(ctx, JSON.stringify({ action: 'driver_updated' }));

    expect(response.status).toBe(200);
    expect(response.body.data).toMatchObject({ status: 'ignored', reason: "Action 'driver_updated' not processed" });
  });

  it('answers 200 even when the chat client fails', async () => {
    ctx.chat.failures.push(new Error('chat unavailable'));
    const response = await postWebhook(ctx, JSON.stringify(safetyPayload()));

    expect(response.status).toBe(200);
    await ctx.settle();
    expect(ctx.chat.sent).toEqual([]);
    expect(ctx.store.records).toHaveLength(1);
  });

  it('returns 500 when the store fails outside a single event', async () => {
    ctx.store.batchError = new Error('connection terminated unexpectedly');
    const response = await postWebhook(ctx, JSON.stringify(safetyPayload()));

    expect(response.status).toBe(500);
    expect(response.body.error.code).toBe('INTERNAL_SERVER_ERROR');
    expect(response.body.error.message).toBe('connection terminated unexpectedly');

    await ctx.settle();
    expect(ctx.chat.sent).toEqual([]);
  });

  it('echoes the correlation id header', async () => {
    const body = JSON.stringify(safetyPayload());
    const response = await request(ctx.app)
      .post('/webhook/motive')
      .set(SIGNATURE_HEADER, sign(body))
      .set('x-correlation-id', 'test-correlation')
      .send(body);

    expect(response.headers['x-correlation-id']).toBe('test-correlation');
  });
});

describe('GET /api/events', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = buildTestApp();
    const body = JSON.stringify([
      speedingPayload({ id: 1, timestamp: '2024-05-01T08:00:00Z' }),
      safetyPayload({ id: 2, timestamp: '2024-05-01T09:00:00Z' }),
      speedingPayload({ id: 3, timestamp: '2024-05-01T07:00:00Z' }),
    ]);
    await postWebhook(ctx, body);
    await ctx.settle();
  });

  it('requires basic credentials', async () => {
    const response = await request(ctx.app).get('/api/events');

    expect(response.status).toBe(401);
    expect(response.headers['www-authenticate']).toBe('Basic realm="fleet-safety-alerts", charset="UTF-8"');
    expect(response.body.error).toEqual({ code: 'AUTHENTICATION_ERROR', message: 'Missing credentials' });
  });

  it('rejects wrong credentials', async () => {
    const response = await request(ctx.app).get('/api/events').auth(DASHBOARD_USER, 'wrong-password');

    expect(response.status).toBe(401);
    expect(response.body.error.message).toBe('Invalid credentials');
  });

  it('lists events newest first', async () => {
    const response = await request(ctx.app).get('/api/events').auth(DASHBOARD_USER, DASHBOARD_PASSWORD);

    expect(response.status).toBe(200);
    expect(response.body.data.map((e: { providerEventId: number }) => e.providerEventId)).toEqual([2, 1, 3]);
    expect(response.body.data[0]).toMatchObject({
      eventType: 'hard_brake',
      vehicleUnit: 'Truck 12',
      timestamp: '2024-05-01T09:00:00.000Z',
    });
    expect(response.body.meta).toEqual({ count: 3, limit: 50 });
  });

  it('honours and caps the limit', async () => {
    const limited = await request(ctx.app).get('/api/events?limit=1').auth(DASHBOARD_USER, DASHBOARD_PASSWORD);
    expect(limited.body.data).toHaveLength(1);

    const capped = await request(ctx.app).get('/api/events?limit=500').auth(DASHBOARD_USER, DASHBOARD_PASSWORD);
    expect(capped.body.meta.limit).toBe(50);
  });

  it('rejects a non-numeric limit', async () => {
    const response = await request(ctx.app).get('/api/events?limit=lots').auth(DASHBOARD_USER, DASHBOARD_PASSWORD);

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('rate limits the reporting API', async () => {
    const limitedCtx = buildTestApp({ rateLimitPerMinute: 1 });

    const first = await request(limitedCtx.app).get('/api/events').auth(DASHBOARD_USER, DASHBOARD_PASSWORD);
    const second = await request(limitedCtx.app).get('/api/events').auth(DASHBOARD_USER, DASHBOARD_PASSWORD);

    expect(first.status).toBe(200);
    expect(second.status).toBe(429);
    expect(second.body.error.code).toBe('RATE_LIMIT_EXCEEDED');
  });
});

describe('health endpoints', () => {
  it('GET / reports the service is running', async () => {
    const ctx = buildTestApp();
    const response = await request(ctx.app).get('/');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', service: 'fleet-safety-alerts' });
  });

  it('GET /health reports database connectivity', async () => {
    const ctx = buildTestApp();
    const healthy = await request(ctx.app).get('/health');
    expect(healthy.body.data).toMatchObject({ status: 'healthy', services: { database: { status: 'up' } } });

    ctx.store.pingError = new Error('connection refused');
    const degraded = await request(ctx.app).get('/health');
    expect(degraded.status).toBe(200);
    expect(degraded.body.data).toMatchObject({
      status: 'degraded',
      services: { database: { status: 'down', error: 'connection refused' } },
    });
  });

  it('returns 404 for unknown routes', async () => {
    const ctx = buildTestApp();
    const response = await request(ctx.app).get('/nope');

    expect(response.status).toBe(404);
    expect(response.body.error.code).toBe('NOT_FOUND');
  });
});
