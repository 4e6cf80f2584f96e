import { CalendarDate } from '../fields/calendar-date.js';

/**
 * True for values that carry no search input: null, undefined, false,
 * whitespace-only strings, empty arrays and empty plain objects.
 */
export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Date || value instanceof CalendarDate) return false;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}
