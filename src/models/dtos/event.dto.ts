/**
 * Event DTOs
 *
 * Stored event records and the reporting query contract.
 */

import { z } from 'zod';

export const SAFETY_EVENT_TYPES = ['hard_brake', 'acceleration', 'cornering', 'safety'] as const;

export type SafetyEventType = (typeof SAFETY_EVENT_TYPES)[number];

export type EventType = 'speeding' | SafetyEventType;

export const UNIT_UNKNOWN = 'Unit Unknown';

/**
 * Durable event record, source of truth for the reporting dashboard
 */
export interface PersistedEvent {
  id: number;
  eventType: EventType;
  providerEventId: number | null;
  vehicleUnit: string;
  timestamp: Date;
  lat: number | null;
  lon: number | null;
  /** Vehicle speed in kph, speeding events only */
  speed: number | null;
  /** Posted limit in kph, speeding events only */
  limit: number | null;
  mapLink: string | null;
  receivedAt: Date;
}

export type NewEventRecord = Omit<PersistedEvent, 'id' | 'receivedAt'>;

// ============================================================================
// GET /api/events
// ============================================================================

export const MAX_RECENT_EVENTS = 50;

export const ListEventsQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .positive()
    .default(MAX_RECENT_EVENTS)
    .transform((limit) => Math.min(limit, MAX_RECENT_EVENTS)),
});

export interface EventView {
  id: number;
  eventType: EventType;
  providerEventId: number | null;
  vehicleUnit: string;
  timestamp: string;
  lat: number | null;
  lon: number | null;
  speed: number | null;
  limit: number | null;
  mapLink: string | null;
  receivedAt: string;
}

export function toEventView(event: PersistedEvent): EventView {
  return {
    ...event,
    timestamp: event.timestamp.toISOString(),
    receivedAt: event.receivedAt.toISOString(),
  };
}
