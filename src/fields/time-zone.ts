import { CalendarDate } from './calendar-date.js';
import { SearchConfigurationError } from '../errors.js';

/**
 * Calendar/zone context consulted while typecasting date and time terms.
 * Passed explicitly; nothing here reads ambient global state.
 */
export interface TimeZoneContext {
  readonly name: string;
  /** Minutes east of UTC in effect at the given instant. */
  offsetAt(instant: Date): number;
}

export interface WallTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

const MINUTE_MS = 60_000;

/** Date.UTC without the 0-99 => 1900-1999 year mapping. */
export function utcMillis(wall: WallTime): number {
  const d = new Date(Date.UTC(2000, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second, wall.millisecond));
  d.setUTCFullYear(wall.year, wall.month - 1, wall.day);
  return d.getTime();
}

export const utcZone: TimeZoneContext = {
  name: 'UTC',
  offsetAt: () => 0,
};

/** The zone of the running process. Used when no context is supplied. */
export const localZone: TimeZoneContext = {
  name: 'local',
  offsetAt: (instant) => -instant.getTimezoneOffset(),
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(zone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(zone);
  if (fmt === undefined) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone: zone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(zone, fmt);
  }
  return fmt;
}

function wallTimeIn(zone: string, instant: Date): WallTime {
  const parts: Record<string, number> = {};
  for (const part of formatterFor(zone).formatToParts(instant)) {
    if (part.type !== 'literal') parts[part.type] = Number(part.value);
  }
  return {
    year: parts['year'] ?? 0,
    month: parts['month'] ?? 1,
    day: parts['day'] ?? 1,
    hour: parts['hour'] ?? 0,
    minute: parts['minute'] ?? 0,
    second: parts['second'] ?? 0,
    millisecond: 0,
  };
}

/**
 * Returns a context for an IANA zone name such as "Europe/Berlin".
 * Throws SearchConfigurationError for names the runtime does not know.
 */
export function timeZone(name: string): TimeZoneContext {
  try {
    formatterFor(name);
  } catch (err) {
    throw new SearchConfigurationError(`Unknown time zone: "${name}"`, err);
  }
  return {
    name,
    offsetAt(instant: Date): number {
      const seconds = Math.floor(instant.getTime() / 1000) * 1000;
      return (utcMillis(wallTimeIn(name, instant)) - seconds) / MINUTE_MS;
    },
  };
}

/**
 * Resolves a wall-clock reading in `zone` to an instant. Readings inside a
 * DST transition resolve to one of the two neighbouring offsets.
 */
export function wallTimeToInstant(wall: WallTime, zone: TimeZoneContext): Date {
  const guess = utcMillis(wall);
  const first = zone.offsetAt(new Date(guess));
  const candidate = guess - first * MINUTE_MS;
  const second = zone.offsetAt(new Date(candidate));
  return new Date(second === first ? candidate : guess - second * MINUTE_MS);
}

export function calendarDateIn(instant: Date, zone: TimeZoneContext): CalendarDate {
  const shifted = new Date(instant.getTime() + zone.offsetAt(instant) * MINUTE_MS);
  return new CalendarDate(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
}
