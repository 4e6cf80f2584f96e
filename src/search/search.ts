import {
  resolveSearchConfig,
  type ResolvedSearchConfig,
  type SearchConfig,
} from '../config/schema.js';
import { BadSearchValueError, SearchConfigurationError } from '../errors.js';
import { CalendarDate } from '../fields/calendar-date.js';
import { FieldSet, type ReadonlyFieldSet } from '../fields/field-set.js';
import type { Field } from '../fields/field.js';
import type { TimeZoneContext } from '../fields/time-zone.js';
import type {
  BindValue,
  CompiledSearch,
  FieldTerms,
  SearchContext,
  SearchMode,
  SearchParams,
  TermValue,
} from '../types.js';
import { isBlank } from './blank.js';

function isTermValue(value: unknown): value is TermValue {
  return (
    typeof value === 'string' ||
    (typeof value === 'number' && Number.isFinite(value)) ||
    value instanceof Date ||
    value instanceof CalendarDate
  );
}

function isFieldTerms(value: unknown): value is FieldTerms {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isTermValue(value);
}

function compose(
  fields: readonly Field[],
  joiner: 'OR' | 'AND',
  termFor: (field: Field) => TermValue,
  zone: TimeZoneContext | undefined,
): CompiledSearch {
  const sql = fields.map((f) => f.fragment()).join(` ${joiner} `);
  const binds: BindValue[] = [];
  for (const field of fields) {
    const bind = field.bind(termFor(field), zone);
    if (bind !== undefined) binds.push(bind);
  }
  return { sql, binds };
}

/**
 * A configured search. Fields are fixed at construction; `toSql` can then be
 * called any number of times, concurrently, without touching that state.
 *
 * @example
 * const people = new Search({
 *   fields: { first_name: 'equals', last_name: 'begins_with', email: 'not_null' },
 * });
 * people.toSql('Bob');
 * // { sql: 'first_name = ? OR last_name LIKE ? OR email IS NOT NULL', binds: ['Bob', 'Bob%'] }
 */
export class Search {
  private readonly fieldSet: FieldSet;
  private readonly timeZone: TimeZoneContext | undefined;

  constructor(config: SearchConfig | ResolvedSearchConfig) {
    const resolved = 'fieldOptions' in config ? config : resolveSearchConfig(config);
    if (resolved.fieldOptions.length === 0) {
      throw new SearchConfigurationError('Search requires at least one field');
    }
    this.fieldSet = FieldSet.from(resolved.fieldOptions);
    this.timeZone = resolved.timeZone;
  }

  get fields(): ReadonlyFieldSet {
    return this.fieldSet;
  }

  /**
   * Builds the filter for `params`, or returns undefined when there is nothing
   * to filter on. Undefined means "omit the filter", not "match nothing".
   */
  toSql(params: TermValue | null | undefined, mode?: 'simple', context?: SearchContext): CompiledSearch | undefined;
  toSql(params: FieldTerms | null | undefined, mode: 'field', context?: SearchContext): CompiledSearch | undefined;
  toSql(params: SearchParams, mode?: SearchMode, context?: SearchContext): CompiledSearch | undefined;
  toSql(params: SearchParams, mode: SearchMode = 'simple', context: SearchContext = {}): CompiledSearch | undefined {
    if (isBlank(params)) return undefined;
    switch (mode) {
      case 'simple':
        if (!isTermValue(params)) {
          throw new BadSearchValueError('*', params, 'Simple search expects a single term');
        }
        return this.toSimpleSql(params, context);
      case 'field':
        if (!isFieldTerms(params)) {
          throw new BadSearchValueError('*', params, 'Field search expects a map of field terms');
        }
        return this.toFieldSql(params, context);
      default: {
        const unreachable: never = mode;
        throw new SearchConfigurationError(`Unknown search mode: ${String(unreachable)}`);
      }
    }
  }

  /**
   * One term matched against every field; any may match. Typically behind a
   * single "smart" search box.
   */
  toSimpleSql(term: TermValue, context: SearchContext = {}): CompiledSearch | undefined {
    if (isBlank(term)) return undefined;
    return compose([...this.fieldSet], 'OR', () => term, context.timeZone ?? this.timeZone);
  }

  /**
   * Per-field terms; every entered term must match. Typically behind a set of
   * labeled search boxes. Fields without a non-blank value are left out.
   */
  toFieldSql(fieldTerms: FieldTerms, context: SearchContext = {}): CompiledSearch | undefined {
    const values = new Map<string, TermValue>();
    const searched = this.fieldSet.filter((f) => {
      if (!Object.prototype.hasOwnProperty.call(fieldTerms, f.name)) return false;
      const value = fieldTerms[f.name]?.value;
      if (value === undefined || value === null || isBlank(value)) return false;
      values.set(f.name, value);
      return true;
    });
    if (searched.length === 0) return undefined;
    return compose(
      searched,
      'AND',
      (f) => values.get(f.name) ?? '',
      context.timeZone ?? this.timeZone,
    );
  }
}
