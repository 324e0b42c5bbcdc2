/**
 * Webhook payload builders and signing
 */

import { createHmac } from 'crypto';

export const TEST_SECRET = 'test-secret';
export const SIGNATURE_HEADER = 'x-kt-webhook-signature';

export function sign(body: string, secret: string = TEST_SECRET): string {
  return createHmac('sha1', secret).update(body).digest('hex');
}

export function speedingPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    action: 'speeding_event_created',
    id: 101,
    driver_id: 7,
    vehicle_id: 42,
    max_vehicle_speed: 70,
    max_posted_speed_limit_in_kph: 50,
    max_over_speed_in_kph: 20,
    start_location: { lat: 37.7749, lon: -122.4194 },
    ...overrides,
  };
}

export function safetyPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    action: 'safety_event_created',
    id: 202,
    driver_id: 7,
    vehicle_id: 42,
    type: 'Hard Braking Event',
    location: { lat: 40.0, lon: -105.25 },
    ...overrides,
  };
}
