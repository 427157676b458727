import { addHours, differenceInMilliseconds } from 'date-fns';

const HOUR_MS = 60 * 60 * 1000;

/** Offset of `timeZone` from UTC at the given instant, in milliseconds. */
function zoneOffset(at: Date, timeZone: string): number {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(at);

  const values: Record<string, number> = {};
  for (const part of parts) {
    if (part.type !== 'literal') values[part.type] = Number(part.value);
  }
  const asUtc = Date.UTC(
    values['year'] ?? 0,
    (values['month'] ?? 1) - 1,
    values['day'] ?? 1,
    values['hour'] ?? 0,
    values['minute'] ?? 0,
    values['second'] ?? 0,
  );
  return asUtc - at.getTime();
}

/**
 * Converts a provider's local "YYYY-MM-DD" + "HH:MM" pair in the given zone
 * into a UTC instant. Returns null when either part is malformed.
 */
export function zonedKickoff(day: string, time: string, timeZone: string): Date | null {
  const d = /^(\d{4})-(\d{2})-(\d{2})$/.exec(day.trim());
  const t = /^(\d{1,2}):(\d{2})$/.exec(time.trim());
  if (!d || !t) return null;

  const wallClock = new Date(
    Date.UTC(Number(d[1]), Number(d[2]) - 1, Number(d[3]), Number(t[1]), Number(t[2])),
  );
  return new Date(wallClock.getTime() - zoneOffset(wallClock, timeZone));
}

/** Absolute distance between two instants, in hours. */
export function hoursApart(a: Date, b: Date): number {
  return Math.abs(differenceInMilliseconds(a, b)) / HOUR_MS;
}

export function windowAround(at: Date, hours: number): { from: Date; to: Date } {
  return { from: addHours(at, -hours), to: addHours(at, hours) };
}

/** Unix seconds, as used by chat timestamp markup. */
export function unixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
