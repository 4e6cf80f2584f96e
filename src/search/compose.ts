import type { BindValue, CompiledSearch } from '../types.js';

/**
 * Joins several compiled filters, e.g. a simple search and a field search
 * over the same table. Undefined parts are skipped; returns undefined when
 * nothing remains.
 */
export function combineSearches(
  parts: ReadonlyArray<CompiledSearch | undefined>,
  joiner: 'AND' | 'OR' = 'AND',
): CompiledSearch | undefined {
  const present = parts.filter((p): p is CompiledSearch => p !== undefined);
  const [first] = present;
  if (first === undefined) return undefined;
  if (present.length === 1) return { sql: first.sql, binds: [...first.binds] };
  return {
    sql: present.map((p) => `(${p.sql})`).join(` ${joiner} `),
    binds: present.flatMap((p) => p.binds),
  };
}

/** The flat `[sql, ...binds]` conditions form. */
export function toConditions(compiled: CompiledSearch): [string, ...BindValue[]] {
  return [compiled.sql, ...compiled.binds];
}
