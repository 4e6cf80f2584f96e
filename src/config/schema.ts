import { z } from 'zod';
import { SearchConfigurationError } from '../errors.js';
import type { FieldOptions } from '../fields/field.js';
import { isPattern, type Pattern } from '../fields/patterns.js';
import { timeZone as namedTimeZone, type TimeZoneContext } from '../fields/time-zone.js';
import type { FieldType, WarningHandler } from '../types.js';

export const FieldTypeSchema = z.enum(['string', 'date', 'time', 'datetime']);

export const FieldOptionsSchema = z.object({
  sql: z.string().min(1).optional(),
  // checked separately so lenient configurations can skip unknown symbols
  pattern: z.string().optional(),
  operator: z.string().min(1).optional(),
  bindPattern: z.union([z.string(), z.boolean()]).optional(),
  type: FieldTypeSchema.optional(),
}).strict();

/** JSON form of a search definition. */
export const SearchDocumentSchema = z.object({
  fields: z.unknown(),
  strictPatterns: z.boolean().optional(),
  timeZone: z.string().min(1).optional(),
}).strict();

export interface FieldOptionsInput {
  sql?: string;
  pattern?: Pattern;
  operator?: string;
  bindPattern?: string | boolean;
  type?: FieldType;
}

/**
 * One configured field, in any of three shapes:
 *
 *   'email'                                          // defaults only
 *   { last_name: 'begins_with' }                     // name -> pattern
 *   { lname: { sql: 'last_name', pattern: 'begins_with' } }  // name -> options
 */
export type FieldEntry = string | number | { readonly [name: string]: Pattern | FieldOptionsInput };

export type FieldsInput = readonly FieldEntry[] | { readonly [name: string]: Pattern | FieldOptionsInput };

export interface SearchConfig {
  fields: FieldsInput;
  /** Reject unknown pattern symbols. By default they are ignored with a warning and the field keeps its defaults. */
  strictPatterns?: boolean;
  /** Zone used to read date and time terms. An IANA name or a context. */
  timeZone?: TimeZoneContext | string;
  onWarning?: WarningHandler;
}

export interface NormalizeOptions {
  strictPatterns: boolean;
  onWarning: WarningHandler;
}

export interface ResolvedSearchConfig extends NormalizeOptions {
  fieldOptions: FieldOptions[];
  timeZone?: TimeZoneContext;
}

export const defaultWarningHandler: WarningHandler = (message, detail) => {
  if (detail === undefined) console.warn(`[search] ${message}`);
  else console.warn(`[search] ${message}`, detail);
};

const defaultNormalizeOptions: NormalizeOptions = {
  strictPatterns: false,
  onWarning: defaultWarningHandler,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeValue(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function resolvePattern(name: string, raw: string, options: NormalizeOptions): Pattern | undefined {
  if (isPattern(raw)) return raw;
  if (options.strictPatterns) {
    throw new SearchConfigurationError(`Field "${name}": unknown pattern "${raw}"`);
  }
  options.onWarning(`Field "${name}": unknown pattern "${raw}" ignored`, { field: name, pattern: raw });
  return undefined;
}

function normalizeMapped(name: string, value: unknown, options: NormalizeOptions): FieldOptions {
  if (typeof value === 'string') {
    const pattern = resolvePattern(name, value, options);
    return pattern !== undefined ? { name, pattern } : { name };
  }
  const parsed = FieldOptionsSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(options)'}: ${i.message}`).join('; ');
    throw new SearchConfigurationError(`Field "${name}": invalid options (${issues})`, parsed.error);
  }
  const opts = parsed.data;
  const pattern = opts.pattern !== undefined ? resolvePattern(name, opts.pattern, options) : undefined;
  return {
    name,
    ...(opts.sql !== undefined ? { sql: opts.sql } : {}),
    ...(pattern !== undefined ? { pattern } : {}),
    ...(opts.operator !== undefined ? { operator: opts.operator } : {}),
    ...(opts.bindPattern !== undefined ? { bindPattern: opts.bindPattern } : {}),
    ...(opts.type !== undefined ? { type: opts.type } : {}),
  };
}

/**
 * Normalizes a single list entry. Bare names become default fields;
 * single-key objects map a name to a pattern or an options record.
 */
export function normalizeFieldEntry(
  entry: unknown,
  options: NormalizeOptions = defaultNormalizeOptions,
): FieldOptions {
  if (typeof entry === 'string') {
    if (entry.trim() === '') throw new SearchConfigurationError('Field name must be a non-empty string');
    return { name: entry };
  }
  if (typeof entry === 'number' && Number.isFinite(entry)) {
    return { name: String(entry) };
  }
  if (isRecord(entry)) {
    const keys = Object.keys(entry);
    const key = keys[0];
    if (keys.length === 1 && key !== undefined && key.trim() !== '') {
      return normalizeMapped(key, entry[key], options);
    }
  }
  throw new SearchConfigurationError(`Invalid field entry: ${describeValue(entry)}`);
}

/**
 * Normalizes a configured field list or map into field options, preserving
 * the caller's order. Throws SearchConfigurationError on the first entry
 * that fits none of the accepted shapes.
 */
export function normalizeFields(
  input: unknown,
  options: NormalizeOptions = defaultNormalizeOptions,
): FieldOptions[] {
  if (Array.isArray(input)) {
    return input.map((entry: unknown) => normalizeFieldEntry(entry, options));
  }
  if (isRecord(input)) {
    return Object.entries(input).map(([name, value]) => {
      if (name.trim() === '') throw new SearchConfigurationError('Field name must be a non-empty string');
      return normalizeMapped(name, value, options);
    });
  }
  throw new SearchConfigurationError(`Invalid fields configuration: ${describeValue(input)}`);
}

function resolve(
  fields: unknown,
  zone: TimeZoneContext | string | undefined,
  normalize: NormalizeOptions,
): ResolvedSearchConfig {
  const fieldOptions = normalizeFields(fields, normalize);

  const seen = new Set<string>();
  for (const field of fieldOptions) {
    const name = String(field.name);
    if (seen.has(name)) normalize.onWarning(`Field "${name}" is configured more than once`, { field: name });
    seen.add(name);
  }

  const context = typeof zone === 'string' ? namedTimeZone(zone) : zone;
  return {
    ...normalize,
    fieldOptions,
    ...(context !== undefined ? { timeZone: context } : {}),
  };
}

export function resolveSearchConfig(config: SearchConfig): ResolvedSearchConfig {
  return resolve(config.fields, config.timeZone, {
    strictPatterns: config.strictPatterns ?? false,
    onWarning: config.onWarning ?? defaultWarningHandler,
  });
}

/**
 * Validates a search definition read from JSON (or any untyped source) and
 * resolves it. The result can be passed straight to `new Search()`.
 */
export function parseSearchDocument(input: unknown, onWarning?: WarningHandler): ResolvedSearchConfig {
  const parsed = SearchDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(document)'}: ${i.message}`).join('; ');
    throw new SearchConfigurationError(`Invalid search definition (${issues})`, parsed.error);
  }
  const doc = parsed.data;
  return resolve(doc.fields, doc.timeZone, {
    strictPatterns: doc.strictPatterns ?? false,
    onWarning: onWarning ?? defaultWarningHandler,
  });
}
