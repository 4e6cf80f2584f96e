import { describe, it, expect } from 'vitest';
import { CalendarDate } from '../../src/fields/calendar-date.js';

describe('CalendarDate', () => {
  it('formats as an ISO date', () => {
    expect(new CalendarDate(2020, 1, 5).toString()).toBe('2020-01-05');
  });

  it('pads years below 1000', () => {
    expect(new CalendarDate(1, 1, 1).toString()).toBe('0001-01-01');
  });

  it('accepts leap days', () => {
    expect(new CalendarDate(2020, 2, 29).toString()).toBe('2020-02-29');
  });

  it('rejects days that do not exist', () => {
    expect(() => new CalendarDate(2021, 2, 29)).toThrow(RangeError);
    expect(() => new CalendarDate(2020, 13, 1)).toThrow(RangeError);
    expect(() => new CalendarDate(2020, 4, 31)).toThrow(RangeError);
  });

  it('parse() reads YYYY-MM-DD', () => {
    const d = CalendarDate.parse(' 2019-12-31 ');
    expect(d.year).toBe(2019);
    expect(d.month).toBe(12);
    expect(d.day).toBe(31);
  });

  it('parse() rejects other formats', () => {
    expect(() => CalendarDate.parse('12/31/2019')).toThrow(/Not an ISO calendar date/);
  });

  it('equals() compares by value', () => {
    expect(new CalendarDate(2020, 1, 15).equals(CalendarDate.parse('2020-01-15'))).toBe(true);
    expect(new CalendarDate(2020, 1, 15).equals(new CalendarDate(2020, 1, 16))).toBe(false);
  });

  it('serializes to JSON and pg as the ISO date', () => {
    const d = new CalendarDate(2020, 7, 4);
    expect(JSON.stringify({ d })).toBe('{"d":"2020-07-04"}');
    expect(d.toPostgres()).toBe('2020-07-04');
  });
});
