import { normalizeFieldEntry, type FieldEntry, type NormalizeOptions } from '../config/schema.js';
import { Field, type FieldOptions } from './field.js';

/** Read-only view of a FieldSet, as exposed by a configured Search. */
export interface ReadonlyFieldSet extends Iterable<Field> {
  readonly length: number;
  at(index: number): Field | undefined;
  names(): string[];
  filter(predicate: (field: Field) => boolean): Field[];
}

/**
 * Ordered collection of fields. Order decides fragment and bind order;
 * duplicate names are kept.
 */
export class FieldSet implements ReadonlyFieldSet {
  private readonly fields: Field[] = [];

  static from(options: readonly FieldOptions[]): FieldSet {
    const set = new FieldSet();
    for (const opts of options) set.fields.push(new Field(opts));
    return set;
  }

  get length(): number {
    return this.fields.length;
  }

  /** Normalizes a configured entry in any accepted shape and appends it. */
  append(entry: FieldEntry, options?: NormalizeOptions): this {
    this.fields.push(new Field(normalizeFieldEntry(entry, options)));
    return this;
  }

  at(index: number): Field | undefined {
    return this.fields[index];
  }

  names(): string[] {
    return this.fields.map((f) => f.name);
  }

  filter(predicate: (field: Field) => boolean): Field[] {
    return this.fields.filter(predicate);
  }

  [Symbol.iterator](): Iterator<Field> {
    return this.fields[Symbol.iterator]();
  }
}
