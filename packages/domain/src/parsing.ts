const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2})?$/i;
const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parses an ISO-8601 timestamp, epoch milliseconds or a Date. Timestamps without
 * a zone designator are read as UTC, never as local time.
 */
export function parseTemporal(input: string | number | Date | null | undefined): Date | null {
  if (input == null) {
    return null;
  }
  if (input instanceof Date) {
    return Number.isNaN(input.getTime()) ? null : new Date(input.getTime());
  }
  if (typeof input === "number") {
    return Number.isFinite(input) ? new Date(input) : null;
  }
  const trimmed = input.trim();
  if (!ISO_TIMESTAMP.test(trimmed)) {
    return null;
  }
  const zoned = ZONE_SUFFIX.test(trimmed) ? trimmed : `${trimmed}Z`;
  const parsed = new Date(zoned);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Calendar month of a timestamp in UTC, formatted `YYYY-MM`. */
export function monthKey(timestampMs: number): string {
  return new Date(timestampMs).toISOString().slice(0, 7);
}

/** Start of the UTC hour containing the timestamp, formatted as an ISO string. */
export function hourKey(timestampMs: number): string {
  return `${new Date(timestampMs).toISOString().slice(0, 13)}:00:00Z`;
}
