import { describe, it, expect } from 'vitest';
import { SelectionList } from '../services/selectionList';
import { Origin, fileSource } from '../models/origin';

describe('SelectionList', () => {
  it('ignores blank lines and comments', () => {
    const list = SelectionList.fromText('# header\n\nsmoke.*\n  audio/playback  \n');
    expect(list.patterns).toEqual(['smoke.*', 'audio/playback']);
  });

  it('anchors every pattern', () => {
    const list = new SelectionList(['smoke']);
    expect(list.designates('smoke')).toBe(true);
    expect(list.designates('smoke-extra')).toBe(false);
    expect(list.designates('pre-smoke')).toBe(false);
  });

  it('qualifies bare patterns with the implicit namespace', () => {
    const list = SelectionList.fromText('smoke.*\nother::.*', { implicitNamespace: '2013.com.example' });
    expect(list.qualifiedPatterns).toEqual(['^2013\\.com\\.example::smoke.*$', '^other::.*$']);
    expect(list.designates('2013.com.example::smoke-1')).toBe(true);
    expect(list.designates('2013Xcom.example::smoke-1')).toBe(false);
    expect(list.designates('smoke-1')).toBe(false);
    expect(list.designates('other::anything')).toBe(true);
  });

  it('takes its name from the file when none is given', () => {
    expect(SelectionList.fromText('', { filename: '/p/whitelists/default.whitelist' }).name).toBe('default');
    expect(SelectionList.fromText('', { name: 'explicit', filename: '/p/x.whitelist' }).name).toBe('explicit');
    expect(new SelectionList([]).name).toBeUndefined();
  });

  it('keeps the origin it was given', () => {
    const origin = new Origin(fileSource('/p/whitelists/default.whitelist'), 1, 3);
    expect(SelectionList.fromText('a', { origin }).origin).toBe(origin);
  });

  it('throws on a pattern that does not compile', () => {
    expect(() => SelectionList.fromText('ok\n(broken')).toThrow(SyntaxError);
  });
});
