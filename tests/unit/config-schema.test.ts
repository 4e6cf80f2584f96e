import { describe, it, expect, vi } from 'vitest';
import {
  normalizeFieldEntry,
  normalizeFields,
  parseSearchDocument,
  resolveSearchConfig,
} from '../../src/config/schema.js';
import { SearchConfigurationError } from '../../src/errors.js';
import { utcZone } from '../../src/fields/time-zone.js';

describe('normalizeFields()', () => {
  it('normalizes a list of mixed shapes in order', () => {
    expect(normalizeFields(['a', { b: 'contains' }, { c: { sql: 't.c', type: 'date' } }])).toEqual([
      { name: 'a' },
      { name: 'b', pattern: 'contains' },
      { name: 'c', sql: 't.c', type: 'date' },
    ]);
  });

  it('normalizes a name map in key order', () => {
    expect(normalizeFields({
      fname: { sql: 'first_name', pattern: 'equals' },
      lname: { sql: 'last_name', pattern: 'begins_with' },
      email: 'not_null',
    })).toEqual([
      { name: 'fname', sql: 'first_name', pattern: 'equals' },
      { name: 'lname', sql: 'last_name', pattern: 'begins_with' },
      { name: 'email', pattern: 'not_null' },
    ]);
  });

  it('keeps explicit operator and bind pattern', () => {
    expect(normalizeFields({ flag: { operator: '<> ?', bindPattern: false } })).toEqual([
      { name: 'flag', operator: '<> ?', bindPattern: false },
    ]);
  });

  it('accepts an empty options record', () => {
    expect(normalizeFields({ a: {} })).toEqual([{ name: 'a' }]);
  });

  it('rejects entries that fit no shape', () => {
    expect(() => normalizeFields([null])).toThrow('Invalid field entry: null');
    expect(() => normalizeFields([['a']])).toThrow('Invalid field entry: ["a"]');
    expect(() => normalizeFields([{ a: 'equals', b: 'equals' }]))
      .toThrow('Invalid field entry: {"a":"equals","b":"equals"}');
    expect(() => normalizeFields([true])).toThrow('Invalid field entry: true');
  });

  it('rejects blank names', () => {
    expect(() => normalizeFields([''])).toThrow('Field name must be a non-empty string');
    expect(() => normalizeFields({ ' ': 'equals' })).toThrow('Field name must be a non-empty string');
  });

  it('rejects a fields value that is neither list nor map', () => {
    expect(() => normalizeFields('a')).toThrow('Invalid fields configuration: "a"');
    expect(() => normalizeFields(undefined)).toThrow('Invalid fields configuration: undefined');
  });

  it('rejects malformed options records', () => {
    expect(() => normalizeFields({ a: 5 })).toThrow(/^Field "a": invalid options/);
    expect(() => normalizeFields({ a: { patern: 'equals' } })).toThrow(/^Field "a": invalid options/);
    expect(() => normalizeFields({ a: { type: 'money' } })).toThrow(/^Field "a": invalid options/);
    expect(() => normalizeFields({ a: { sql: '' } })).toThrow(/^Field "a": invalid options/);
  });

  it('attaches the validation error as cause', () => {
    try {
      normalizeFields({ a: { type: 'money' } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SearchConfigurationError);
      expect(err instanceof SearchConfigurationError && err.cause).toBeInstanceOf(Error);
    }
  });

  it('keeps defaults for unknown patterns and warns, by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    try {
      expect(normalizeFields({ email: 'begins' })).toEqual([{ name: 'email' }]);
      expect(warn).toHaveBeenCalledWith('[search] Field "email": unknown pattern "begins" ignored', {
        field: 'email',
        pattern: 'begins',
      });
    } finally {
      warn.mockRestore();
    }
  });

  it('rejects unknown patterns in strict mode', () => {
    const strict = { strictPatterns: true, onWarning: vi.fn() };
    expect(() => normalizeFields({ email: 'not_nul' }, strict)).toThrow('Field "email": unknown pattern "not_nul"');
    expect(() => normalizeFields({ email: { pattern: 'startswith' } }, strict))
      .toThrow('Field "email": unknown pattern "startswith"');
    expect(strict.onWarning).not.toHaveBeenCalled();
  });

  it('ignores unknown patterns with a warning when lenient', () => {
    const onWarning = vi.fn();
    const fields = normalizeFields(
      { email: 'not_nul', name: { sql: 'n', pattern: 'startswith' } },
      { strictPatterns: false, onWarning },
    );
    expect(fields).toEqual([{ name: 'email' }, { name: 'name', sql: 'n' }]);
    expect(onWarning).toHaveBeenCalledWith('Field "email": unknown pattern "not_nul" ignored', {
      field: 'email',
      pattern: 'not_nul',
    });
    expect(onWarning).toHaveBeenCalledTimes(2);
  });
});

describe('normalizeFieldEntry()', () => {
  it('gives identical results for pattern and options shapes', () => {
    expect(normalizeFieldEntry({ email: 'not_null' })).toEqual(normalizeFieldEntry({ email: { pattern: 'not_null' } }));
  });
});

describe('resolveSearchConfig()', () => {
  it('applies defaults', () => {
    const resolved = resolveSearchConfig({ fields: ['a'] });
    expect(resolved.fieldOptions).toEqual([{ name: 'a' }]);
    expect(resolved.strictPatterns).toBe(false);
    expect(resolved.timeZone).toBeUndefined();
  });

  it('resolves a named time zone', () => {
    expect(resolveSearchConfig({ fields: ['a'], timeZone: 'Europe/Berlin' }).timeZone?.name).toBe('Europe/Berlin');
  });

  it('keeps a time zone context as given', () => {
    expect(resolveSearchConfig({ fields: ['a'], timeZone: utcZone }).timeZone).toBe(utcZone);
  });

  it('warns about duplicate names', () => {
    const onWarning = vi.fn();
    resolveSearchConfig({ fields: ['email', { email: 'contains' }, 'name'], onWarning });
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning).toHaveBeenCalledWith('Field "email" is configured more than once', { field: 'email' });
  });

  it('warns through console.warn by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    try {
      resolveSearchConfig({ fields: ['a', 'a'] });
      expect(warn).toHaveBeenCalledWith('[search] Field "a" is configured more than once', { field: 'a' });
    } finally {
      warn.mockRestore();
    }
  });
});

describe('parseSearchDocument()', () => {
  it('resolves a JSON definition', () => {
    const resolved = parseSearchDocument(JSON.parse(
      '{"fields":{"name":"contains","born":{"type":"date"}},"timeZone":"UTC"}',
    ));
    expect(resolved.fieldOptions).toEqual([
      { name: 'name', pattern: 'contains' },
      { name: 'born', type: 'date' },
    ]);
    expect(resolved.timeZone?.name).toBe('UTC');
  });

  it('ignores unknown patterns in a document by default', () => {
    const onWarning = vi.fn();
    const resolved = parseSearchDocument({ fields: { a: 'nope' } }, onWarning);
    expect(resolved.fieldOptions).toEqual([{ name: 'a' }]);
    expect(onWarning).toHaveBeenCalledTimes(1);
  });

  it('honours strictPatterns from the document', () => {
    expect(() => parseSearchDocument({ fields: { a: 'nope' }, strictPatterns: true }))
      .toThrow('Field "a": unknown pattern "nope"');
  });

  it('rejects unknown top-level keys', () => {
    expect(() => parseSearchDocument({ fields: ['a'], mode: 'simple' })).toThrow(/^Invalid search definition/);
  });

  it('rejects non-object documents', () => {
    expect(() => parseSearchDocument('fields')).toThrow(SearchConfigurationError);
  });

  it('rejects unknown time zones', () => {
    expect(() => parseSearchDocument({ fields: ['a'], timeZone: 'Mars/Base' }))
      .toThrow('Unknown time zone: "Mars/Base"');
  });

  it('rejects bad field shapes where the document is loaded', () => {
    expect(() => parseSearchDocument({ fields: [1.5, null] })).toThrow('Invalid field entry: null');
  });
});
