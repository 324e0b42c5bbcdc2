/**
 * Webhook Ingestion Pipeline
 *
 * verify → parse → per event (classify → validate → enrich → persist) → commit
 *
 * Auth and parse failures abort the delivery. Everything per-event is
 * isolated: an ignored, invalid or unpersistable event is recorded in the
 * outcome and its siblings carry on. Alerts for accepted events are handed
 * back to the caller, to be dispatched after the transaction has committed
 * and the response has been sent.
 */

import type { EventBatchWriter, EventStore } from '../repositories/event.repository';
import type { UnitResolver } from './unit-resolver.service';
import { verifySignature } from './signature.service';
import {
  buildMapLink,
  classify,
  extractLocation,
  extractTimestamp,
  normalizeSafetySubtype,
  parseSafetyEvent,
  parseSpeedingEvent,
} from './payload-normalizer.service';
import type {
  AcceptedEvent,
  ClassifiedEvent,
  EnrichedEvent,
  EnrichedSafetyEvent,
  EnrichedSpeedingEvent,
  IngestionOutcome,
  IngestionResult,
  ParseResult,
  RawEvent,
  RejectedEvent,
  SafetyEvent,
  SpeedingEvent,
} from '../models/dtos/webhook.dto';
import type { PersistedEvent } from '../models/dtos/event.dto';
import { MalformedPayloadError, PersistenceError, ValidationError } from '../models/errors/api-error';
import { logHelpers, logger } from '../utils/logger';

export interface InboundDelivery {
  rawBody: Buffer;
  signature: string | undefined;
}

export interface IngestionPipelineDeps {
  store: EventStore;
  unitResolver: UnitResolver;
  secret: string;
  clock?: () => Date;
}

type Validated =
  | { kind: 'speeding'; raw: RawEvent; event: SpeedingEvent }
  | { kind: 'safety'; raw: RawEvent; event: SafetyEvent };

type EnrichmentDraft = Omit<EnrichedSpeedingEvent, 'recordId'> | Omit<EnrichedSafetyEvent, 'recordId'>;

type EventResult =
  | { outcome: 'accepted'; accepted: AcceptedEvent; enriched: EnrichedEvent; persisted: PersistedEvent }
  | RejectedEvent;

/**
 * A single object delivery is a batch of one; an array is the batch itself.
 */
export function parseDelivery(rawBody: Buffer): { events: unknown[]; isBatch: boolean } {
  let payload: unknown;
  try {
    payload = JSON.parse(rawBody.toString('utf8'));
  } catch (error) {
    throw new MalformedPayloadError('Invalid JSON payload', {
      reason: error instanceof Error ? error.message : 'Unknown parse error',
    });
  }

  if (Array.isArray(payload)) {
    return { events: payload, isBatch: true };
  }
  if (typeof payload === 'object' && payload !== null) {
    return { events: [payload], isBatch: false };
  }
  throw new MalformedPayloadError('Payload must be a JSON object or an array of objects');
}

function validate(classified: Exclude<ClassifiedEvent, { kind: 'unrecognized' }>): ParseResult<Validated> {
  if (classified.kind === 'speeding') {
    const parsed = parseSpeedingEvent(classified.raw);
    return parsed.ok ? { ok: true, value: { kind: 'speeding', raw: classified.raw, event: parsed.value } } : parsed;
  }
  const parsed = parseSafetyEvent(classified.raw);
  return parsed.ok ? { ok: true, value: { kind: 'safety', raw: classified.raw, event: parsed.value } } : parsed;
}

export class IngestionPipeline {
  private readonly clock: () => Date;

  constructor(private readonly deps: IngestionPipelineDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async process(delivery: InboundDelivery): Promise<IngestionResult> {
    try {
      verifySignature(delivery.rawBody, delivery.signature, this.deps.secret);
    } catch (error) {
      logHelpers.security('webhook signature rejected', 'medium', {
        bodyLength: delivery.rawBody.length,
        signed: Boolean(delivery.signature),
      });
      throw error;
    }

    const { events, isBatch } = parseDelivery(delivery.rawBody);
    const receivedAt = this.clock();

    if (!isBatch) {
      this.rejectInvalidSingleEvent(events[0]);
    }

    const results = await this.deps.store.withBatch(async (writer) => {
      const batchResults: EventResult[] = [];
      for (const [index, raw] of events.entries()) {
        batchResults.push(await this.processEvent(writer, index, raw, receivedAt));
      }
      return batchResults;
    });

    return this.buildResult(results);
  }

  /**
   * A lone object with a recognized action must be structurally valid;
   * the provider gets a 400 rather than a silent skip.
   */
  private rejectInvalidSingleEvent(raw: unknown): void {
    const classified = classify(raw);
    if (classified.kind === 'unrecognized') return;

    const validated = validate(classified);
    if (!validated.ok) {
      logger.warn('Rejected invalid single-event delivery', { kind: classified.kind, issues: validated.issues });
      throw new ValidationError(`Invalid ${classified.kind} event payload`, validated.issues);
    }
  }

  private async processEvent(
    writer: EventBatchWriter,
    index: number,
    raw: unknown,
    receivedAt: Date
  ): Promise<EventResult> {
    const classified = classify(raw);

    if (classified.kind === 'unrecognized') {
      logger.debug('Ignoring unrecognized action', { index, action: classified.action });
      return { index, outcome: 'ignored', reason: `Action '${classified.action ?? 'none'}' not processed` };
    }

    const validated = validate(classified);
    if (!validated.ok) {
      logger.warn('Skipping invalid event', { index, kind: classified.kind, issues: validated.issues });
      return { index, outcome: 'invalid', reason: `Invalid ${classified.kind} event: ${validated.issues.join('; ')}` };
    }

    const draft = await this.enrich(validated.value, receivedAt);

    try {
      const persisted = await writer.append({
        eventType: draft.eventType,
        providerEventId: draft.event.id,
        vehicleUnit: draft.vehicleUnit,
        timestamp: draft.timestamp,
        lat: draft.location.lat,
        lon: draft.location.lon,
        speed: draft.kind === 'speeding' ? draft.event.maxVehicleSpeedKph : null,
        limit: draft.kind === 'speeding' ? draft.event.maxPostedSpeedLimitKph : null,
        mapLink: draft.mapLink,
      });

      logHelpers.business('webhook event accepted', {
        index,
        recordId: persisted.id,
        eventId: draft.event.id,
        eventType: persisted.eventType,
      });

      return {
        outcome: 'accepted',
        accepted: { index, eventId: draft.event.id, recordId: persisted.id, eventType: persisted.eventType },
        enriched: { ...draft, recordId: persisted.id },
        persisted,
      };
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      logger.error('Failed to persist event', { index, eventType: draft.eventType, error: error.message });
      return { index, outcome: 'failed', reason: error.message };
    }
  }

  private async enrich(validated: Validated, receivedAt: Date): Promise<EnrichmentDraft> {
    const location = extractLocation(validated.raw);
    const vehicleId = validated.event.vehicleId;
    const base = {
      vehicleId,
      vehicleUnit: await this.deps.unitResolver.resolve(vehicleId),
      location,
      mapLink: buildMapLink(location.lat, location.lon),
      timestamp: extractTimestamp(validated.raw) ?? receivedAt,
    };

    if (validated.kind === 'speeding') {
      return { ...base, kind: 'speeding', eventType: 'speeding', event: validated.event };
    }
    return { ...base, kind: 'safety', eventType: normalizeSafetySubtype(validated.raw), event: validated.event };
  }

  private buildResult(results: EventResult[]): IngestionResult {
    const accepted: AcceptedEvent[] = [];
    const rejected: RejectedEvent[] = [];
    const notifications: EnrichedEvent[] = [];
    const persisted: PersistedEvent[] = [];

    for (const result of results) {
      if (result.outcome === 'accepted') {
        accepted.push(result.accepted);
        notifications.push(result.enriched);
        persisted.push(result.persisted);
      } else {
        rejected.push(result);
      }
    }

    const count = (outcome: RejectedEvent['outcome']) => rejected.filter((r) => r.outcome === outcome).length;

    const outcome: IngestionOutcome = {
      status: accepted.length > 0 ? 'accepted' : 'ignored',
      eventIds: accepted.map((a) => a.eventId),
      accepted,
      rejected,
      summary: {
        total: results.length,
        accepted: accepted.length,
        ignored: count('ignored'),
        invalid: count('invalid'),
        failed: count('failed'),
      },
    };

    if (accepted.length === 0) {
      outcome.reason =
        results.length === 0
          ? 'Empty batch'
          : rejected.length === 1
            ? rejected[0].reason
            : 'No events in the delivery qualified for processing';
    }

    logger.info('Webhook delivery processed', { ...outcome.summary });

    return { outcome, notifications, persisted };
  }
}
