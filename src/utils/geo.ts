export interface NormalizedLocation {
  lat: number | null;
  lon: number | null;
}

const MAPS_BASE_URL = 'https://www.google.com/maps';

/**
 * Builds a map link for a coordinate pair. Both axes must be known; 0 is a valid coordinate.
 */
export function buildMapLink(lat: number | null, lon: number | null): string | null {
  if (lat === null || lon === null) {
    return null;
  }
  return `${MAPS_BASE_URL}?q=${lat},${lon}`;
}

/**
 * Coerces a coordinate value to a finite number, or null.
 * Numeric strings are accepted since some payloads serialize coordinates as text.
 */
export function toCoordinate(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
