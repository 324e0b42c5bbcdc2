/**
 * Unit Tests: Ingestion Pipeline
 *
 * Runs the pipeline against the in-memory store and a stub unit directory.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { IngestionPipeline, parseDelivery } from '../../src/services/ingestion.service';
import { UnitResolver } from '../../src/services/unit-resolver.service';
import { AuthError, MalformedPayloadError, ValidationError } from '../../src/models/errors/api-error';
import { InMemoryEventStore } from '../helpers/in-memory-event-store';
import { StubUnitDirectory } from '../helpers/fakes';
import { TEST_SECRET, safetyPayload, sign, speedingPayload } from '../helpers/webhook';

const RECEIVED_AT = new Date('2024-06-01T12:00:00.000Z');

function delivery(payload: unknown) {
  const body = JSON.stringify(payload);
  return { rawBody: Buffer.from(body), signature: sign(body) };
}

describe('parseDelivery()', () => {
  it('wraps a single object as a batch of one', () => {
    expect(parseDelivery(Buffer.from('{"a":1}'))).toEqual({ events: [{ a: 1 }], isBatch: false });
  });

  it('passes arrays through as batches', () => {
    expect(parseDelivery(Buffer.from('[1,{"a":2}]'))).toEqual({ events: [1, { a: 2 }], isBatch: true });
  });

  it('rejects invalid JSON and scalar payloads', () => {
    expect(() => parseDelivery(Buffer.from('{oops'))).toThrow(MalformedPayloadError);
    expect(() => parseDelivery(Buffer.from('42'))).toThrow('Payload must be a JSON object or an array of objects');
    expect(() => parseDelivery(Buffer.from('null'))).toThrow(MalformedPayloadError);
  });
});

describe('IngestionPipeline', () => {
  let store: InMemoryEventStore;
  let directory: StubUnitDirectory;
  let pipeline: IngestionPipeline;

  beforeEach(() => {
    store = new InMemoryEventStore(() => RECEIVED_AT);
    directory = new StubUnitDirectory({ 42: 'Truck 12' });
    pipeline = new IngestionPipeline({
      store,
      unitResolver: new UnitResolver(directory),
      secret: TEST_SECRET,
      clock: () => RECEIVED_AT,
    });
  });

  describe('authentication', () => {
    it('rejects before parsing or writing when the signature is missing', async () => {
      const error = await pipeline
        .process({ rawBody: Buffer.from('{not json'), signature: undefined })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ reason: 'MissingSignature' });
      expect(store.batches).toBe(0);
    });

    it('rejects a body signed with another secret', async () => {
      const body = JSON.stringify(speedingPayload());
      await expect(pipeline.process({ rawBody: Buffer.from(body), signature: sign(body, 'other') })).rejects.toThrow(
        'Invalid webhook signature'
      );
      expect(store.records).toHaveLength(0);
    });
  });

  describe('single events', () => {
    it('persists an enriched speeding event and returns its alert', async () => {
      const result = await pipeline.process(delivery(speedingPayload({ timestamp: '2024-05-01T10:00:00Z' })));

      expect(result.outcome).toEqual({
        status: 'accepted',
        eventIds: [101],
        accepted: [{ index: 0, eventId: 101, recordId: 1, eventType: 'speeding' }],
        rejected: [],
        summary: { total: 1, accepted: 1, ignored: 0, invalid: 0, failed: 0 },
      });

      expect(store.records).toEqual([
        {
          id: 1,
          eventType: 'speeding',
          providerEventId: 101,
          vehicleUnit: 'Truck 12',
          timestamp: new Date('2024-05-01T10:00:00Z'),
          lat: 37.7749,
          lon: -122.4194,
          speed: 70,
          limit: 50,
          mapLink: 'https://www.google.com/maps?q=37.7749,-122.4194',
          receivedAt: RECEIVED_AT,
        },
      ]);

      expect(result.notifications).toHaveLength(1);
      expect(result.notifications[0]).toMatchObject({
        kind: 'speeding',
        recordId: 1,
        vehicleUnit: 'Truck 12',
        mapLink: 'https://www.google.com/maps?q=37.7749,-122.4194',
      });
    });

    it('stamps events without a timestamp with the receive time', async () => {
      await pipeline.process(delivery(speedingPayload()));
      expect(store.records[0].timestamp).toEqual(RECEIVED_AT);
    });

    it('classifies safety subtypes and stores no speed fields', async () => {
      const result = await pipeline.process(delivery(safetyPayload()));

      expect(result.outcome.accepted).toEqual([{ index: 0, eventId: 202, recordId: 1, eventType: 'hard_brake' }]);
      expect(store.records[0]).toMatchObject({
        eventType: 'hard_brake',
        speed: null,
        limit: null,
        lat: 40,
        lon: -105.25,
        mapLink: 'https://www.google.com/maps?q=40,-105.25',
      });
    });

    it('accepts a safety event without an id', async () => {
      const result = await pipeline.process(
        delivery({ action: 'safety_event_created', vehicle_id: 9, type: 'Harsh Cornering' })
      );

      expect(result.outcome.eventIds).toEqual([null]);
      expect(store.records[0]).toMatchObject({
        providerEventId: null,
        eventType: 'cornering',
        vehicleUnit: 'Unit Unknown',
        mapLink: null,
      });
    });

    it('acknowledges an unrecognized action without writing', async () => {
      const result = await pipeline.process(delivery({ action: 'vehicle_location_updated', id: 5 }));

      expect(result.outcome).toMatchObject({
        status: 'ignored',
        eventIds: [],
        reason: "Action 'vehicle_location_updated' not processed",
      });
      expect(result.notifications).toEqual([]);
      expect(store.records).toHaveLength(0);
    });

    it('rejects a recognized but invalid event with a ValidationError', async () => {
      const { max_vehicle_speed: _speed, ...payload } = speedingPayload();
      const error = await pipeline.process(delivery(payload)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: 'Invalid speeding event payload',
        details: ['max_vehicle_speed: Required'],
      });
      expect(store.batches).toBe(0);
    });
  });

  describe('batches', () => {
    it('accounts for every event exactly once', async () => {
      const result = await pipeline.process(
        delivery([speedingPayload(), { action: 'vehicle_location_updated' }, safetyPayload()])
      );

      expect(result.outcome).toEqual({
        status: 'accepted',
        eventIds: [101, 202],
        accepted: [
          { index: 0, eventId: 101, recordId: 1, eventType: 'speeding' },
          { index: 2, eventId: 202, recordId: 2, eventType: 'hard_brake' },
        ],
        rejected: [{ index: 1, outcome: 'ignored', reason: "Action 'vehicle_location_updated' not processed" }],
        summary: { total: 3, accepted: 2, ignored: 1, invalid: 0, failed: 0 },
      });
      expect(result.notifications.map((n) => n.recordId)).toEqual([1, 2]);
      expect(store.batches).toBe(1);
    });

    it('skips invalid members instead of failing the delivery', async () => {
      const result = await pipeline.process(
        delivery([speedingPayload({ vehicle_id: 'x' }), 'not an event', safetyPayload()])
      );

      expect(result.outcome.rejected).toEqual([
        { index: 0, outcome: 'invalid', reason: 'Invalid speeding event: vehicle_id: Expected number, received string' },
        { index: 1, outcome: 'ignored', reason: "Action 'none' not processed" },
      ]);
      expect(result.outcome.summary).toEqual({ total: 3, accepted: 1, ignored: 1, invalid: 1, failed: 0 });
    });

    it('isolates a failed write from its siblings', async () => {
      store.failWhen = (record) => record.providerEventId === 102;

      const result = await pipeline.process(
        delivery([speedingPayload({ id: 101 }), speedingPayload({ id: 102 }), speedingPayload({ id: 103 })])
      );

      expect(result.outcome.eventIds).toEqual([101, 103]);
      expect(result.outcome.rejected).toEqual([{ index: 1, outcome: 'failed', reason: 'Simulated write failure' }]);
      expect(result.outcome.summary.failed).toBe(1);
      expect(store.records.map((r) => r.providerEventId)).toEqual([101, 103]);
      expect(result.notifications).toHaveLength(2);
    });

    it('reports an empty batch as ignored', async () => {
      const result = await pipeline.process(delivery([]));

      expect(result.outcome).toEqual({
        status: 'ignored',
        eventIds: [],
        accepted: [],
        rejected: [],
        summary: { total: 0, accepted: 0, ignored: 0, invalid: 0, failed: 0 },
        reason: 'Empty batch',
      });
    });

    it('explains a batch where nothing qualified', async () => {
      const result = await pipeline.process(delivery([{ action: 'a' }, { action: 'b' }]));
      expect(result.outcome.reason).toBe('No events in the delivery qualified for processing');
    });

    it('looks up each vehicle once per process', async () => {
      await pipeline.process(delivery([speedingPayload({ id: 1 }), speedingPayload({ id: 2 })]));
      await pipeline.process(delivery([safetyPayload()]));
      expect(directory.calls).toEqual([42]);
    });
  });
});
