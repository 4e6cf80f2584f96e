export const PLACEHOLDER = '?';

export const DEFAULT_OPERATOR = '= ?';
export const DEFAULT_BIND_PATTERN = '?';

export const PATTERNS = [
  'equals',
  'begins_with',
  'ends_with',
  'contains',
  'null',
  'not_null',
  'true',
  'false',
  'less_than',
  'less_than_or_equal_to',
  'not_greater_than',
  'greater_than',
  'greater_than_or_equal_to',
  'not_less_than',
] as const;

export type Pattern = (typeof PATTERNS)[number];

export interface PatternExpansion {
  operator: string;
  /** Omitted when the pattern binds nothing; the field keeps its default. */
  bindPattern?: string | boolean;
}

const KNOWN_PATTERNS: ReadonlySet<string> = new Set(PATTERNS);

export function isPattern(value: unknown): value is Pattern {
  return typeof value === 'string' && KNOWN_PATTERNS.has(value);
}

/**
 * Expands a pattern shorthand into its operator and bind pattern.
 * The switch is exhaustive over `Pattern`.
 */
export function expandPattern(pattern: Pattern): PatternExpansion {
  switch (pattern) {
    case 'equals':
      return { operator: '= ?', bindPattern: '?' };
    case 'begins_with':
      return { operator: 'LIKE ?', bindPattern: '?%' };
    case 'ends_with':
      return { operator: 'LIKE ?', bindPattern: '%?' };
    case 'contains':
      return { operator: 'LIKE ?', bindPattern: '%?%' };
    case 'null':
      return { operator: 'IS NULL' };
    case 'not_null':
      return { operator: 'IS NOT NULL' };
    case 'true':
      return { operator: '= ?', bindPattern: true };
    case 'false':
      return { operator: '= ?', bindPattern: false };
    case 'less_than':
      return { operator: '< ?' };
    case 'less_than_or_equal_to':
    case 'not_greater_than':
      return { operator: '<= ?' };
    case 'greater_than':
      return { operator: '> ?' };
    case 'greater_than_or_equal_to':
    case 'not_less_than':
      return { operator: '>= ?' };
    default: {
      const unreachable: never = pattern;
      throw new Error(`Unhandled pattern: ${String(unreachable)}`);
    }
  }
}
