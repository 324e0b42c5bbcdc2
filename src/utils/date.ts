import { z } from 'zod';

const IsoDateTimeSchema = z.string().datetime({ offset: true, local: true });
const IsoDateSchema = z.string().date();

const OFFSET_SUFFIX = /(Z|[+-]\d{2}(:?\d{2})?)$/;

/**
 * Rewrites an accepted date-time into the form Date parses everywhere:
 * millisecond precision and a ±HH:MM or Z suffix (UTC when none was given).
 */
function toDateInput(value: string): string {
  const withMillis = value.replace(/\.(\d+)/, (_match, digits: string) => `.${digits.padEnd(3, '0').slice(0, 3)}`);
  if (!OFFSET_SUFFIX.test(withMillis)) {
    return `${withMillis}Z`;
  }
  return withMillis.replace(/([+-]\d{2}):?(\d{2})?$/, (_match, hours: string, minutes?: string) => {
    return `${hours}:${minutes ?? '00'}`;
  });
}

/**
 * Parses an ISO-8601 date or date-time string. A timestamp without an offset is read as UTC.
 * Returns null for anything that is not a valid calendar instant.
 */
export function parseIsoTimestamp(value: string): Date | null {
  const trimmed = value.trim();

  if (IsoDateSchema.safeParse(trimmed).success) {
    return new Date(`${trimmed}T00:00:00Z`);
  }

  if (!IsoDateTimeSchema.safeParse(trimmed).success) {
    return null;
  }

  const parsed = new Date(toDateInput(trimmed));
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
