import { BadSearchValueError } from '../errors.js';
import type { BindValue, FieldType, TermValue } from '../types.js';
import {
  DEFAULT_BIND_PATTERN,
  DEFAULT_OPERATOR,
  PLACEHOLDER,
  expandPattern,
  type Pattern,
} from './patterns.js';
import type { TimeZoneContext } from './time-zone.js';
import { coerce, textOf } from './typecast.js';

export interface FieldOptions {
  /** Key the field is looked up by in submitted terms. */
  name: string | number;
  /** Column reference used in the fragment. Defaults to the name. Not quoted. */
  sql?: string;
  pattern?: Pattern;
  /** Comparison such as '= ?', 'LIKE ?' or 'IN (?)'. Overrides the pattern's operator. */
  operator?: string;
  /** Template applied to the term before binding, e.g. '?%'. A boolean is bound as-is. */
  bindPattern?: string | boolean;
  type?: FieldType;
}

/**
 * One searchable attribute. Built once from its options and read-only after.
 */
export class Field {
  readonly name: string;
  readonly sql: string;
  readonly operator: string;
  readonly bindPattern: string | boolean;
  readonly type: FieldType;

  constructor(options: FieldOptions) {
    const expanded = options.pattern !== undefined ? expandPattern(options.pattern) : undefined;
    this.name = String(options.name);
    this.sql = options.sql ?? this.name;
    this.operator = options.operator ?? expanded?.operator ?? DEFAULT_OPERATOR;
    this.bindPattern = options.bindPattern ?? expanded?.bindPattern ?? DEFAULT_BIND_PATTERN;
    this.type = options.type ?? 'string';
  }

  /** Whether the operator carries a placeholder, i.e. whether this field binds anything. */
  get bindsValue(): boolean {
    return this.operator.includes(PLACEHOLDER);
  }

  fragment(): string {
    return `${this.sql} ${this.operator}`;
  }

  /**
   * Prepares the bind value for a search term. Returns undefined when the
   * operator takes no value (IS NULL and friends).
   */
  bind(term: TermValue, zone?: TimeZoneContext): BindValue | undefined {
    if (!this.bindsValue) return undefined;
    if (typeof this.bindPattern !== 'string') return this.bindPattern;
    const value = this.typecast(term, zone);
    if (this.bindPattern === PLACEHOLDER) return value;
    const text = textOf(value);
    return this.bindPattern.replace(PLACEHOLDER, () => text);
  }

  /** Converts a raw term to this field's type. Throws BadSearchValueError when it cannot. */
  typecast(term: TermValue, zone?: TimeZoneContext): Exclude<BindValue, boolean> {
    const result = coerce(term, this.type, zone);
    if (!result.ok) {
      throw new BadSearchValueError(this.name, term, `Bad search value for "${this.name}": ${result.reason}`, result.cause);
    }
    return result.value.value;
  }
}
