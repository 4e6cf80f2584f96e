export { Search } from './search/search.js';
export { search } from './search/search-object.js';
export type { SearchBuilder } from './search/builder.js';
export { combineSearches, toConditions } from './search/compose.js';
export { isBlank } from './search/blank.js';
export { Field } from './fields/field.js';
export type { FieldOptions } from './fields/field.js';
export { FieldSet } from './fields/field-set.js';
export type { ReadonlyFieldSet } from './fields/field-set.js';
export { PATTERNS, expandPattern } from './fields/patterns.js';
export type { Pattern, PatternExpansion } from './fields/patterns.js';
export { CalendarDate } from './fields/calendar-date.js';
export { timeZone, utcZone, localZone } from './fields/time-zone.js';
export type { TimeZoneContext } from './fields/time-zone.js';
export { coerce } from './fields/typecast.js';
export type { SearchValue, CoerceResult } from './fields/typecast.js';
export { parseSearchDocument, normalizeFields } from './config/schema.js';
export type {
  SearchConfig,
  ResolvedSearchConfig,
  FieldEntry,
  FieldsInput,
  FieldOptionsInput,
} from './config/schema.js';
export type {
  BindValue,
  CompiledSearch,
  FieldTerm,
  FieldTerms,
  FieldType,
  SearchContext,
  SearchMode,
  SearchParams,
  TermValue,
  WarningHandler,
} from './types.js';
export { SearchConfigurationError, BadSearchValueError } from './errors.js';
