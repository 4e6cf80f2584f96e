import { CalendarDate } from './calendar-date.js';
import {
  calendarDateIn,
  localZone,
  utcMillis,
  wallTimeToInstant,
  type TimeZoneContext,
  type WallTime,
} from './time-zone.js';
import type { FieldType, TermValue } from '../types.js';

export type SearchValue =
  | { kind: 'text'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'date'; value: CalendarDate }
  | { kind: 'datetime'; value: Date };

export type CoerceResult =
  | { ok: true; value: SearchValue }
  | { ok: false; reason: string; cause?: unknown };

interface ParsedTime {
  wall: WallTime;
  offsetMinutes?: number;
}

const DATE_TIME =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

function parseOffset(text: string): number {
  if (text.toUpperCase() === 'Z') return 0;
  const sign = text.startsWith('-') ? -1 : 1;
  const digits = text.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  return sign * (hours * 60 + minutes);
}

function validWall(wall: WallTime): boolean {
  if (wall.hour > 23 || wall.minute > 59 || wall.second > 59) return false;
  try {
    new CalendarDate(wall.year, wall.month, wall.day);
    return true;
  } catch {
    return false;
  }
}

function parseTime(text: string): ParsedTime | string {
  const trimmed = text.trim();
  const m = DATE_TIME.exec(trimmed);
  if (m !== null) {
    const wall: WallTime = {
      year: Number(m[1]),
      month: Number(m[2]),
      day: Number(m[3]),
      hour: Number(m[4] ?? 0),
      minute: Number(m[5] ?? 0),
      second: Number(m[6] ?? 0),
      millisecond: Number((m[7] ?? '0').padEnd(3, '0').slice(0, 3)),
    };
    if (!validWall(wall)) return `"${text}" is not a valid date`;
    const offset = m[8];
    return offset === undefined ? { wall } : { wall, offsetMinutes: parseOffset(offset) };
  }
  // The JavaScript parser reads other formats in the process zone; keep only
  // the wall-clock fields it found so the configured zone decides the instant.
  const millis = Date.parse(trimmed);
  if (Number.isNaN(millis)) return `"${text}" could not be parsed as a date`;
  const local = new Date(millis);
  return {
    wall: {
      year: local.getFullYear(),
      month: local.getMonth() + 1,
      day: local.getDate(),
      hour: local.getHours(),
      minute: local.getMinutes(),
      second: local.getSeconds(),
      millisecond: local.getMilliseconds(),
    },
  };
}

function toInstant(parsed: ParsedTime, zone: TimeZoneContext | undefined): Date {
  if (parsed.offsetMinutes !== undefined) {
    return new Date(utcMillis(parsed.wall) - parsed.offsetMinutes * 60_000);
  }
  return wallTimeToInstant(parsed.wall, zone ?? localZone);
}

function toCalendarDate(parsed: ParsedTime, zone: TimeZoneContext | undefined): CalendarDate {
  if (parsed.offsetMinutes === undefined || zone === undefined) {
    return new CalendarDate(parsed.wall.year, parsed.wall.month, parsed.wall.day);
  }
  return calendarDateIn(toInstant(parsed, zone), zone);
}

function passThrough(value: Exclude<TermValue, string>): SearchValue {
  if (value instanceof CalendarDate) return { kind: 'date', value };
  if (value instanceof Date) return { kind: 'datetime', value };
  return { kind: 'number', value };
}

/**
 * Coerces a raw term into the value type of a field. Text is parsed for
 * date and time fields; other values are taken as already typed.
 */
export function coerce(value: TermValue, type: FieldType, zone?: TimeZoneContext): CoerceResult {
  if (value instanceof Date && Number.isNaN(value.getTime())) {
    return { ok: false, reason: 'invalid Date value' };
  }
  switch (type) {
    case 'date':
    case 'time':
    case 'datetime': {
      if (typeof value !== 'string') return { ok: true, value: passThrough(value) };
      const parsed = parseTime(value);
      if (typeof parsed === 'string') return { ok: false, reason: parsed };
      return type === 'date'
        ? { ok: true, value: { kind: 'date', value: toCalendarDate(parsed, zone) } }
        : { ok: true, value: { kind: 'datetime', value: toInstant(parsed, zone) } };
    }
    case 'string':
      return { ok: true, value: { kind: 'text', value: textOf(value).trim() } };
    default: {
      const unreachable: never = type;
      return { ok: false, reason: `Unknown field type: ${String(unreachable)}` };
    }
  }
}

/** Text form used when a value is spliced into a bind pattern. */
export function textOf(value: TermValue | boolean): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}
