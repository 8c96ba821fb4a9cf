import { DateTime } from 'luxon';

/** Local ISO-8601 timestamp with offset, second precision: `2026-10-19T14:03:05+02:00`. */
export function localIsoNow(): string {
  return formatLocalIso(DateTime.now());
}

export function formatLocalIso(dt: DateTime): string {
  const iso = dt.startOf('second').toISO({ suppressMilliseconds: true, includeOffset: true });
  return iso ?? dt.toJSDate().toISOString();
}

export function formatUtcIso(dt: DateTime): string {
  return formatLocalIso(dt.toUTC());
}

export function fromMillis(ms: number): DateTime {
  return DateTime.fromMillis(ms);
}
