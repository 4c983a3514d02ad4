import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { parseRecords, dumpRecord, dumpRecords } from '../services/recordParser';
import { fileSource } from '../models/origin';
import { recordToObject } from '../models/record';
import { RecordSyntaxError } from '../services/errors';

function syntaxError(fn: () => unknown): RecordSyntaxError {
  try { fn(); } catch(e){
    if(e instanceof RecordSyntaxError) return e;
    throw e;
  }
  throw new Error('expected a RecordSyntaxError');
}

describe('parseRecords', () => {
  it('parses a single record', () => {
    const records = parseRecords('key: value\nother:  spaced out  \n');
    expect(records).toHaveLength(1);
    expect(recordToObject(records[0])).toEqual({ key: 'value', other: 'spaced out' });
    expect(records[0].origin.toString()).toBe('???:1-2');
  });

  it('keeps records in input order and collapses blank lines', () => {
    const records = parseRecords('key1:value1\n\nkey2:value2\n\n\n\nkey3:value3\n');
    expect(records.map(recordToObject)).toEqual([{ key1: 'value1' }, { key2: 'value2' }, { key3: 'value3' }]);
    expect(records.map(r => r.origin.lineStart)).toEqual([1, 3, 7]);
  });

  it('returns nothing for empty or blank input', () => {
    expect(parseRecords('')).toEqual([]);
    expect(parseRecords('\n\n   \n')).toEqual([]);
  });

  it('joins continuation lines', () => {
    const [r] = parseRecords('key: first\n second\n third\n');
    expect(r.data.get('key')).toBe('first\nsecond\nthird');
    expect(r.origin.lineEnd).toBe(3);
  });

  it('folds a single period into an empty line', () => {
    const [r] = parseRecords('key:\n longer\n .\n value\n');
    expect(recordToObject(r)).toEqual({ key: 'longer\n\nvalue' });
  });

  it('drops one period from a line of several', () => {
    const [r] = parseRecords('key:\n longer\n ..\n value\n');
    expect(recordToObject(r)).toEqual({ key: 'longer\n.\nvalue' });
  });

  it('keeps only the first leading space of a continuation', () => {
    const [r] = parseRecords('key:\n   indented\n');
    expect(r.data.get('key')).toBe('  indented');
  });

  it('skips comment lines', () => {
    const [r] = parseRecords('# header\nkey: value\n# trailing\n');
    expect(recordToObject(r)).toEqual({ key: 'value' });
    expect(r.origin.toString()).toBe('???:2');
  });

  it('accepts CRLF line endings', () => {
    const [r] = parseRecords('a: 1\r\nb: 2\r\n');
    expect(recordToObject(r)).toEqual({ a: '1', b: '2' });
  });

  it('records the line offset of each field', () => {
    const [r] = parseRecords('\na: 1\nb:\n x\nc: 3\n');
    expect(Object.fromEntries(r.fieldOffsets)).toEqual({ a: 0, b: 1, c: 3 });
    expect(r.origin.toString()).toBe('???:2-5');
  });

  it('attributes records to the given file', () => {
    const [r] = parseRecords('a: 1\n', fileSource('/p/units/a.pxu'));
    expect(r.origin.toString()).toBe('/p/units/a.pxu:1');
  });

  it('rejects a duplicate key naming both values', () => {
    const err = syntaxError(() => parseRecords('key1: value1\nkey1: value2\n'));
    expect(err.line).toBe(2);
    expect(err.msg).toBe("Job has a duplicate key 'key1' with old value 'value1' and new value 'value2'");
    expect(err.message).toBe("???:2: Job has a duplicate key 'key1' with old value 'value1' and new value 'value2'");
  });

  it('allows the same key in different records', () => {
    expect(parseRecords('key: a\n\nkey: b\n')).toHaveLength(2);
  });

  it('rejects a continuation without an open field', () => {
    const err = syntaxError(() => parseRecords(' extra value'));
    expect(err.line).toBe(1);
    expect(err.msg).toBe('Unexpected multi-line value');
  });

  it('rejects a continuation right after a record ended', () => {
    const err = syntaxError(() => parseRecords('a: 1\n\n more'));
    expect(err.line).toBe(3);
    expect(err.msg).toBe('Unexpected multi-line value');
  });

  it('rejects lines using = instead of :', () => {
    const err = syntaxError(() => parseRecords('key = value'));
    expect(err.msg).toBe('Unexpected non-empty line');
  });

  it('reports the file and line of the first error', () => {
    const err = syntaxError(() => parseRecords('a: 1\n b\nc = 2\nd = 4\n', fileSource('f.pxu')));
    expect(err.message).toBe('f.pxu:3: Unexpected non-empty line');
  });
});

describe('dumpRecord', () => {
  it('writes single-line fields', () => {
    expect(dumpRecord({ a: '1', b: 'two words' })).toBe('a: 1\nb: two words\n\n');
  });

  it('writes an empty value as a bare key', () => {
    expect(dumpRecord({ a: '' })).toBe('a:\n\n');
  });

  it('escapes empty and period-only continuation lines', () => {
    expect(dumpRecord({ k: 'longer\n\nvalue' })).toBe('k:\n longer\n .\n value\n\n');
    expect(dumpRecord({ k: 'x\n.\n..' })).toBe('k:\n x\n ..\n ...\n\n');
  });

  it('keeps surrounding whitespace of single-line values', () => {
    expect(dumpRecord({ k: ' a ' })).toBe('k:\n  a \n\n');
    expect(recordToObject(parseRecords(dumpRecord({ k: ' a', j: 'b  ' }))[0])).toEqual({ k: ' a', j: 'b  ' });
  });

  it('accepts a map', () => {
    expect(dumpRecord(new Map([['a', '1'], ['b', '2']]))).toBe('a: 1\nb: 2\n\n');
  });

  it('writes consecutive records that parse back', () => {
    const text = 'a: 1\n\nb:\n x\n .\n y\n';
    const out = dumpRecords(parseRecords(text));
    expect(out).toBe('a: 1\n\nb:\n x\n .\n y\n\n');
  });
});

describe('round trip', () => {
  const PERIODS = /^\.+$/;
  const chars = fc.constantFrom('a', 'b', 'z', ' ', '.', '#', ':', '-');
  // lines the grammar cannot carry: whitespace-only, or periods padded with whitespace
  const line = fc.stringOf(chars, { maxLength: 8 })
    .filter(l => !(l.length > 0 && !l.trim()) && !(PERIODS.test(l.trim()) && l !== l.trim()));
  const multiLine = fc.array(line, { minLength: 2, maxLength: 4 }).map(ls => ls.join('\n'));
  const key = fc.stringMatching(/^[a-z][a-z0-9_]{0,6}$/);

  it('parse(dump(r)) yields exactly r', () => {
    fc.assert(fc.property(fc.dictionary(key, fc.oneof(line, multiLine), { minKeys: 1, maxKeys: 5 }), r => {
      const parsed = parseRecords(dumpRecord(r));
      expect(parsed).toHaveLength(1);
      expect(recordToObject(parsed[0])).toEqual(r);
    }), { numRuns: 200 });
  });
});
