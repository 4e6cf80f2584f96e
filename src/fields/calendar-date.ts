const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0');
}

/**
 * A date without time of day or zone. Bound for `date` fields so the
 * calendar day survives independent of the server's zone.
 */
export class CalendarDate {
  constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number,
  ) {
    const utc = new Date(Date.UTC(year, month - 1, day));
    utc.setUTCFullYear(year);
    if (
      !Number.isInteger(year) ||
      utc.getUTCFullYear() !== year ||
      utc.getUTCMonth() !== month - 1 ||
      utc.getUTCDate() !== day
    ) {
      throw new RangeError(`Invalid calendar date: ${year}-${month}-${day}`);
    }
  }

  static parse(text: string): CalendarDate {
    const m = ISO_DATE.exec(text.trim());
    if (m === null) throw new RangeError(`Not an ISO calendar date: ${text}`);
    return new CalendarDate(Number(m[1]), Number(m[2]), Number(m[3]));
  }

  equals(other: CalendarDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }

  /** Picked up by pg's value preparation when bound as a query parameter. */
  toPostgres(): string {
    return this.toString();
  }
}
