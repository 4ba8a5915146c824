import { DateTime } from 'luxon';

export type Clock = () => DateTime;

export const systemClock: Clock = () => DateTime.utc();

/**
 * ISO string in UTC with millisecond precision.
 */
export function toUtcISO(dateTime: DateTime): string {
  const utc = dateTime.toUTC();
  return utc.toISO() || utc.toJSDate().toISOString();
}

export function nowISO(clock: Clock = systemClock): string {
  return toUtcISO(clock());
}

/**
 * Calendar day (yyyy-MM-dd) of a timestamp in the given zone; `undefined` for
 * an unparsable timestamp.
 */
export function dayKey(timestamp: string, zone: string): string | undefined {
  const parsed = DateTime.fromISO(timestamp, { setZone: true });
  if (!parsed.isValid) return undefined;
  return parsed.setZone(zone).toISODate() || undefined;
}

/**
 * The `days` calendar days ending with the day of `now` in `zone`, oldest first.
 */
export function dayRange(now: DateTime, days: number, zone: string): string[] {
  const today = now.setZone(zone).startOf('day');
  const range: string[] = [];
  for (let offset = days - 1; offset >= 0; offset--) {
    const date = today.minus({ days: offset }).toISODate();
    if (date) range.push(date);
  }
  return range;
}

export function toMillis(timestamp: string): number {
  return DateTime.fromISO(timestamp, { setZone: true }).toMillis();
}

/**
 * Compact sortable stamp for run log file names, e.g. 20261019_143000.
 */
export function runStamp(dateTime: DateTime): string {
  return dateTime.toUTC().toFormat('yyyyMMdd_HHmmss');
}
