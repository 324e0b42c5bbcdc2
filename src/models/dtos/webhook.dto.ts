/**
 * Webhook DTOs
 *
 * Zod schemas for the provider's webhook payloads, plus the enriched and
 * outcome shapes produced by the ingestion pipeline.
 */

import { z } from 'zod';
import type { EventType, PersistedEvent, SafetyEventType } from './event.dto';
import type { NormalizedLocation } from '../../utils/geo';

export const SPEEDING_ACTION = 'speeding_event_created';
export const SAFETY_ACTION = 'safety_event_created';

// ============================================================================
// Raw payloads
// ============================================================================

export type RawEvent = Record<string, unknown>;

// Numeric strings ("42", "70.5") are accepted; "", null and other strings are not
const NUMERIC_STRING = /^-?\d+(\.\d+)?$/;

function fromNumericString(value: unknown): unknown {
  return typeof value === 'string' && NUMERIC_STRING.test(value.trim()) ? Number(value) : value;
}

const numeric = z.preprocess(fromNumericString, z.number().finite());
const integer = z.preprocess(fromNumericString, z.number().int());

const optionalInt = integer.nullable().optional();

export const SpeedingEventSchema = z
  .object({
    action: z.literal(SPEEDING_ACTION),
    id: integer,
    driver_id: integer,
    vehicle_id: integer,
    max_vehicle_speed: numeric,
    max_posted_speed_limit_in_kph: numeric,
    max_over_speed_in_kph: numeric.nullable().optional(),
    status: z.string().nullable().optional(),
  })
  .transform((raw) => ({
    id: raw.id,
    driverId: raw.driver_id,
    vehicleId: raw.vehicle_id,
    maxVehicleSpeedKph: raw.max_vehicle_speed,
    maxPostedSpeedLimitKph: raw.max_posted_speed_limit_in_kph,
    maxOverSpeedKph:
      raw.max_over_speed_in_kph ?? Math.max(0, raw.max_vehicle_speed - raw.max_posted_speed_limit_in_kph),
    status: raw.status ?? null,
  }));

export type SpeedingEvent = z.output<typeof SpeedingEventSchema>;

export const SafetyEventSchema = z
  .object({
    action: z.literal(SAFETY_ACTION),
    vehicle_id: integer,
    id: optionalInt,
    driver_id: optionalInt,
  })
  .passthrough()
  .transform(({ action: _action, vehicle_id, id, driver_id, ...extra }) => ({
    vehicleId: vehicle_id,
    id: id ?? null,
    driverId: driver_id ?? null,
    extra,
  }));

export type SafetyEvent = z.output<typeof SafetyEventSchema>;

// ============================================================================
// Classification
// ============================================================================

export type ClassifiedEvent =
  | { kind: 'speeding'; raw: RawEvent }
  | { kind: 'safety'; raw: RawEvent }
  | { kind: 'unrecognized'; action: string | null };

export type ParseResult<T> = { ok: true; value: T } | { ok: false; issues: string[] };

// ============================================================================
// Enriched events (input to the alert dispatcher)
// ============================================================================

interface EnrichedBase {
  recordId: number;
  vehicleId: number;
  vehicleUnit: string;
  location: NormalizedLocation;
  mapLink: string | null;
  timestamp: Date;
}

export interface EnrichedSpeedingEvent extends EnrichedBase {
  kind: 'speeding';
  eventType: 'speeding';
  event: SpeedingEvent;
}

export interface EnrichedSafetyEvent extends EnrichedBase {
  kind: 'safety';
  eventType: SafetyEventType;
  event: SafetyEvent;
}

export type EnrichedEvent = EnrichedSpeedingEvent | EnrichedSafetyEvent;

// ============================================================================
// Pipeline outcome (response body)
// ============================================================================

export interface AcceptedEvent {
  index: number;
  /** Provider event id; null when the provider omitted it */
  eventId: number | null;
  recordId: number;
  eventType: EventType;
}

export type RejectionOutcome = 'ignored' | 'invalid' | 'failed';

export interface RejectedEvent {
  index: number;
  outcome: RejectionOutcome;
  reason: string;
}

export interface IngestionSummary {
  total: number;
  accepted: number;
  ignored: number;
  invalid: number;
  failed: number;
}

export interface IngestionOutcome {
  status: 'accepted' | 'ignored';
  eventIds: Array<number | null>;
  accepted: AcceptedEvent[];
  rejected: RejectedEvent[];
  summary: IngestionSummary;
  reason?: string;
}

export interface IngestionResult {
  outcome: IngestionOutcome;
  notifications: EnrichedEvent[];
  persisted: PersistedEvent[];
}
