/**
 * Payload Normalizer
 *
 * Turns heterogeneous provider JSON into typed views. Classification and
 * validation return tagged results; the extract* helpers are total and
 * degrade to null on unexpected shapes.
 */

import type { ZodTypeAny, output } from 'zod';
import {
  SPEEDING_ACTION,
  SAFETY_ACTION,
  SpeedingEventSchema,
  SafetyEventSchema,
  type ClassifiedEvent,
  type ParseResult,
  type RawEvent,
  type SafetyEvent,
  type SpeedingEvent,
} from '../models/dtos/webhook.dto';
import type { SafetyEventType } from '../models/dtos/event.dto';
import { toCoordinate, type NormalizedLocation } from '../utils/geo';
import { parseIsoTimestamp } from '../utils/date';

export { buildMapLink } from '../utils/geo';

const NESTED_LOCATION_KEYS = ['start_location', 'location'] as const;
const LATITUDE_KEYS = ['lat', 'latitude'] as const;
const LONGITUDE_KEYS = ['lon', 'longitude'] as const;
const TIMESTAMP_KEYS = ['timestamp', 'occurred_at', 'created_at'] as const;
const SUBTYPE_KEYS = ['safety_event_type', 'event_type', 'type', 'subtype'] as const;

export function isRawEvent(value: unknown): value is RawEvent {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Classification & validation
// ============================================================================

export function classify(raw: unknown): ClassifiedEvent {
  if (!isRawEvent(raw)) {
    return { kind: 'unrecognized', action: null };
  }

  const action = typeof raw.action === 'string' ? raw.action : null;

  switch (action) {
    case SPEEDING_ACTION:
      return { kind: 'speeding', raw };
    case SAFETY_ACTION:
      return { kind: 'safety', raw };
    default:
      return { kind: 'unrecognized', action };
  }
}

function parseWith<S extends ZodTypeAny>(schema: S, raw: RawEvent): ParseResult<output<S>> {
  const result = schema.safeParse(raw);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return {
    ok: false,
    issues: result.error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message)),
  };
}

export function parseSpeedingEvent(raw: RawEvent): ParseResult<SpeedingEvent> {
  return parseWith(SpeedingEventSchema, raw);
}

export function parseSafetyEvent(raw: RawEvent): ParseResult<SafetyEvent> {
  return parseWith(SafetyEventSchema, raw);
}

// ============================================================================
// Extraction
// ============================================================================

function firstPresent(source: RawEvent, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (source[key] !== undefined && source[key] !== null) {
      return source[key];
    }
  }
  return undefined;
}

/**
 * Nested start_location/location objects are searched before top-level keys.
 * Each axis is resolved on its own, so partial coordinates are possible.
 */
export function extractLocation(raw: RawEvent): NormalizedLocation {
  const candidates: RawEvent[] = [];
  for (const key of NESTED_LOCATION_KEYS) {
    const nested = raw[key];
    if (isRawEvent(nested)) {
      candidates.push(nested);
    }
  }
  candidates.push(raw);

  const axis = (keys: readonly string[]): number | null => {
    for (const candidate of candidates) {
      const value = firstPresent(candidate, keys);
      if (value !== undefined) {
        return toCoordinate(value);
      }
    }
    return null;
  };

  return { lat: axis(LATITUDE_KEYS), lon: axis(LONGITUDE_KEYS) };
}

export function extractTimestamp(raw: RawEvent): Date | null {
  for (const key of TIMESTAMP_KEYS) {
    const value = raw[key];
    if (typeof value === 'string') {
      const parsed = parseIsoTimestamp(value);
      if (parsed) {
        return parsed;
      }
    }
  }
  return null;
}

export function normalizeSafetySubtype(raw: RawEvent): SafetyEventType {
  let label = '';
  for (const key of SUBTYPE_KEYS) {
    const value = raw[key];
    if (typeof value === 'string' && value.trim() !== '') {
      label = value.toLowerCase().replace(/[\s_-]+/g, '');
      break;
    }
  }

  if (label.includes('brake') || label.includes('braking')) return 'hard_brake';
  if (label.includes('accel')) return 'acceleration';
  if (label.includes('corner')) return 'cornering';
  return 'safety';
}
