/**
 * UTC time helpers.
 *
 * Every timestamp that crosses the store boundary is an ISO-8601 string in UTC.
 * Values written by other tools may lack a zone, carry a space before the offset
 * or more fractional digits than JavaScript keeps; all of those are read as UTC.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const EXTRA_FRACTION = /(\.\d{3})\d+/;
const SPACED_OFFSET = /(\d)\s+([+-]\d{2}:?\d{2})$/;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

export function parseUtcTimestamp(value: string | null | undefined): Date | null {
  if (value === null || value === undefined || value === "") return null;

  let normalized = value.trim().replace(EXTRA_FRACTION, "$1").replace(SPACED_OFFSET, "$1$2");
  // "2026-02-18 04:02:12" -> "2026-02-18T04:02:12"
  normalized = normalized.replace(/^(\d{4}-\d{2}-\d{2}) (\d)/, "$1T$2");
  if (!HAS_ZONE.test(normalized)) {
    normalized += "Z";
  }

  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Cannot parse timestamp: ${value}`);
  }
  return date;
}

export function toUtcTimestamp(date: Date): string {
  return date.toISOString();
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
