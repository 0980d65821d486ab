// packages/solver-core/src/__tests__/prefixIndex.test.ts
//
// Unit tests for PrefixIndex and the dictionary normalisation in front of it.
//
// Covered cases:
//   • childFor walks one letter at a time and returns the same node handles
//   • terminal flags only on complete words, never on bare prefixes
//   • inserting a word twice behaves like inserting it once
//   • length filter (3–16), trimming and upper-casing of raw entries

import {
  PrefixIndex,
  buildPrefixIndex,
  normalizeEntry,
  parseWordList,
} from '../index.js';

describe('PrefixIndex', () => {
  it('descends through childFor and marks only complete words terminal', () => {
    const index = new PrefixIndex();
    index.insert('SEA');
    index.insert('SEAL');

    const s = index.childFor(index.root, 'S');
    expect(s).toBeDefined();
    if (!s) return;
    const e = index.childFor(s, 'E');
    expect(e).toBeDefined();
    if (!e) return;
    const a = index.childFor(e, 'A');
    expect(a).toBeDefined();
    if (!a) return;

    expect(index.isTerminal(s)).toBe(false);
    expect(index.isTerminal(e)).toBe(false);
    expect(index.isTerminal(a)).toBe(true);
    expect(index.childFor(e, 'A')).toBe(a);
    expect(index.childFor(e, 'X')).toBeUndefined();

    const l = index.childFor(a, 'L');
    expect(l && index.isTerminal(l)).toBe(true);
  });

  it('answers membership for words, not prefixes', () => {
    const index = new PrefixIndex();
    index.insert('SPUR');

    expect(index.has('SPUR')).toBe(true);
    expect(index.has('SPU')).toBe(false);
    expect(index.has('SPURS')).toBe(false);
    expect(index.has('')).toBe(false);
    expect(index.isTerminal(index.root)).toBe(false);
  });

  it('treats repeated insertion as a no-op', () => {
    const once = new PrefixIndex();
    once.insert('RUSE');

    const twice = new PrefixIndex();
    twice.insert('RUSE');
    twice.insert('RUSE');

    expect(twice.size).toBe(1);
    expect(twice.root).toEqual(once.root);
    expect(twice.has('RUSE')).toBe(true);
  });

  it('counts distinct words that share prefixes', () => {
    const index = new PrefixIndex();
    for (const w of ['PUR', 'PURE', 'PUREE', 'PURSE', 'PURE']) index.insert(w);
    expect(index.size).toBe(4);
  });
});

describe('dictionary normalisation', () => {
  it('keeps entries of 3 to 16 characters, trimmed and upper-cased', () => {
    expect(normalizeEntry('  sea ')).toBe('SEA');
    expect(normalizeEntry('at')).toBeNull();
    expect(normalizeEntry('abcdefghijklmnop')).toBe('ABCDEFGHIJKLMNOP');
    expect(normalizeEntry('abcdefghijklmnopq')).toBeNull();
    expect(normalizeEntry('   ')).toBeNull();
  });

  it('splits LF and CRLF text into trimmed lines', () => {
    expect(parseWordList('sea\r\n spur \n\nat')).toEqual([
      'sea',
      'spur',
      '',
      'at',
    ]);
  });

  it('builds an index from acceptable entries only', () => {
    const index = buildPrefixIndex(['sea', 'at', 'Spur', 'abcdefghijklmnopq', 'SEA']);
    expect(index.size).toBe(2);
    expect(index.has('SEA')).toBe(true);
    expect(index.has('SPUR')).toBe(true);
    expect(index.has('AT')).toBe(false);
    expect(index.has('ABCDEFGHIJKLMNOPQ')).toBe(false);
  });
});
