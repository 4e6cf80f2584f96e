import type { CalendarDate } from './fields/calendar-date.js';
import type { TimeZoneContext } from './fields/time-zone.js';

export type FieldType = 'string' | 'date' | 'time' | 'datetime';

/** A raw runtime search term, before typecasting. */
export type TermValue = string | number | Date | CalendarDate;

export type BindValue = string | number | boolean | Date | CalendarDate;

export interface CompiledSearch {
  sql: string;
  binds: BindValue[];
}

export interface FieldTerm {
  value?: TermValue | null;
}

/** Per-field terms keyed by field name, as submitted by a labeled search form. */
export type FieldTerms = Record<string, FieldTerm | undefined>;

export type SearchMode = 'simple' | 'field';

export type SearchParams = TermValue | FieldTerms | null | undefined;

export type WarningHandler = (message: string, detail?: unknown) => void;

export interface SearchContext {
  timeZone?: TimeZoneContext;
}
