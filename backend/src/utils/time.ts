export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;

export const addMinutes = (date: Date, minutes: number) => new Date(date.getTime() + minutes * MINUTE_MS);

export const addSeconds = (date: Date, seconds: number) => new Date(date.getTime() + seconds * 1000);

export const floorHour = (date: Date) => new Date(Math.floor(date.getTime() / HOUR_MS) * HOUR_MS);

export const ceilHour = (date: Date) => new Date(Math.ceil(date.getTime() / HOUR_MS) * HOUR_MS);

export const parseTimestamp = (value: string | null | undefined): number | null => {
  if (!value) return null;
  const parsed = Date.parse(value);
  return Number.isFinite(parsed) ? parsed : null;
};

const HAS_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/i;

export const hasUtcOffset = (value: string) => HAS_OFFSET.test(value);

/**
 * Parses an ISO-8601 timestamp; values without an offset are read in
 * `fallbackOffset` (e.g. "-08:00").
 */
export const parseIsoWithOffset = (value: string, fallbackOffset: string): Date | null => {
  const trimmed = value.trim();
  if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/.test(trimmed)) return null;
  const normalized = hasUtcOffset(trimmed) ? trimmed : `${trimmed}${fallbackOffset}`;
  const parsed = Date.parse(normalized);
  return Number.isFinite(parsed) ? new Date(parsed) : null;
};

/** Local wall-clock string without offset ("2026-02-21T06:00") read at a fixed UTC offset. */
export const parseLocalTimestamp = (value: string, utcOffsetSeconds: number): number | null => {
  const parsed = Date.parse(hasUtcOffset(value) ? value : `${value}Z`);
  if (!Number.isFinite(parsed)) return null;
  return hasUtcOffset(value) ? parsed : parsed - utcOffsetSeconds * 1000;
};

/** Calendar date ("YYYY-MM-DD") of an instant at a fixed UTC offset. */
export const localDateKey = (date: Date, utcOffsetSeconds: number) =>
  new Date(date.getTime() + utcOffsetSeconds * 1000).toISOString().slice(0, 10);
