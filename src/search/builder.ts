import type { FieldEntry, FieldOptionsInput, SearchConfig } from '../config/schema.js';
import type { FieldOptions } from '../fields/field.js';
import type { Pattern } from '../fields/patterns.js';
import type { FieldType } from '../types.js';
import { Search } from './search.js';

/**
 * Applies a change to the last field in the list, returning a new builder.
 */
function _applyToLast(
  fields: readonly FieldOptions[],
  change: (last: FieldOptions) => FieldOptions,
): SearchBuilder {
  const last = fields[fields.length - 1];
  if (last === undefined) {
    throw new Error('_applyToLast called with empty fields array');
  }
  return new SearchBuilder([...fields.slice(0, -1), change(last)]);
}

function toEntry(field: FieldOptions): FieldEntry {
  const { name, ...rest } = field;
  const options: FieldOptionsInput = rest;
  return { [String(name)]: options };
}

/**
 * Fluent immutable search builder. Every call returns a new SearchBuilder;
 * configuration methods apply to the most recently added field.
 */
export class SearchBuilder {
  constructor(readonly _fields: readonly FieldOptions[]) {}

  /** Append another field. */
  field(name: string): SearchBuilder {
    return new SearchBuilder([...this._fields, { name }]);
  }

  /** Column reference to compare against, when it differs from the name. */
  sql(column: string): SearchBuilder {
    return _applyToLast(this._fields, (f) => ({ ...f, sql: column }));
  }

  type(type: FieldType): SearchBuilder {
    return _applyToLast(this._fields, (f) => ({ ...f, type }));
  }

  /** Sets the operator explicitly. Overrides the operator of any pattern set before. */
  operator(operator: string): SearchBuilder {
    return _applyToLast(this._fields, (f) => ({ ...f, operator }));
  }

  bindPattern(bindPattern: string | boolean): SearchBuilder {
    return _applyToLast(this._fields, (f) => ({ ...f, bindPattern }));
  }

  /** Sets operator and bind pattern together, discarding earlier explicit values. */
  pattern(pattern: Pattern): SearchBuilder {
    return _applyToLast(this._fields, ({ operator: _op, bindPattern: _bp, ...f }) => ({ ...f, pattern }));
  }

  equals(): SearchBuilder {
    return this.pattern('equals');
  }

  beginsWith(): SearchBuilder {
    return this.pattern('begins_with');
  }

  endsWith(): SearchBuilder {
    return this.pattern('ends_with');
  }

  contains(): SearchBuilder {
    return this.pattern('contains');
  }

  isNull(): SearchBuilder {
    return this.pattern('null');
  }

  notNull(): SearchBuilder {
    return this.pattern('not_null');
  }

  isTrue(): SearchBuilder {
    return this.pattern('true');
  }

  isFalse(): SearchBuilder {
    return this.pattern('false');
  }

  lessThan(): SearchBuilder {
    return this.pattern('less_than');
  }

  lessThanOrEqualTo(): SearchBuilder {
    return this.pattern('less_than_or_equal_to');
  }

  greaterThan(): SearchBuilder {
    return this.pattern('greater_than');
  }

  greaterThanOrEqualTo(): SearchBuilder {
    return this.pattern('greater_than_or_equal_to');
  }

  /** Field entries in configuration form, e.g. for serialization. */
  toFieldEntries(): FieldEntry[] {
    return this._fields.map(toEntry);
  }

  build(options: Omit<SearchConfig, 'fields'> = {}): Search {
    return new Search({ ...options, fields: this.toFieldEntries() });
  }
}
