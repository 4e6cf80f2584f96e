import type pg from 'pg';
import { SearchConfigurationError } from '../errors.js';
import { PLACEHOLDER } from '../fields/patterns.js';
import type { BindValue, CompiledSearch } from '../types.js';

export interface PgSearchQuery extends pg.QueryConfig<BindValue[]> {
  text: string;
  values: BindValue[];
}

/**
 * Rewrites the `?` markers of a compiled search as numbered `$n` parameters.
 *
 * @param paramOffset - number of parameters that precede this fragment in the caller's param list.
 *   When 0 (default), params are numbered $1, $2, etc.
 *   When 2, params start at $3, $4, etc. (for embedding in a larger query).
 */
export function toPgQuery(compiled: CompiledSearch, paramOffset: number = 0): PgSearchQuery {
  const counter = { n: paramOffset };
  const text = compiled.sql.split(PLACEHOLDER).reduce((acc, part) => {
    counter.n += 1;
    return `${acc}$${counter.n}${part}`;
  });
  const markers = counter.n - paramOffset;
  if (markers !== compiled.binds.length) {
    throw new SearchConfigurationError(
      `Fragment has ${markers} placeholders but ${compiled.binds.length} bind values: ${compiled.sql}`,
    );
  }
  return { text, values: [...compiled.binds] };
}

/**
 * Same as toPgQuery, wrapped as a WHERE clause ready to append to a SELECT.
 */
export function toWhereClause(compiled: CompiledSearch, paramOffset: number = 0): PgSearchQuery {
  const { text, values } = toPgQuery(compiled, paramOffset);
  return { text: `WHERE (${text})`, values };
}
