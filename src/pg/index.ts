// Public API barrel for the field-search/pg subpath.

export { toPgQuery, toWhereClause } from './placeholders.js';
export type { PgSearchQuery } from './placeholders.js';
