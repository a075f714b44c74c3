import { describe, it, expect } from 'vitest';
import { tokenize, shingle, shingleText, jaccard, sharedShingles } from '../src/text/shingles.js';
import { computeContentHash } from '../src/text/content-hash.js';

describe('tokenize', () => {
  it('lowercases and splits on anything outside [a-z0-9]', () => {
    expect(tokenize("Hello, World! It's 2024.")).toEqual(['hello', 'world', 'it', 's', '2024']);
  });

  it('keeps single-character tokens', () => {
    expect(tokenize('I saw a cat')).toEqual(['i', 'saw', 'a', 'cat']);
  });

  it('folds ASCII only; other letters separate tokens', () => {
    expect(tokenize('Café Ünïcode')).toEqual(['caf', 'n', 'code']);
  });

  it('returns an empty list for punctuation or whitespace only', () => {
    expect(tokenize('  ...  !!! ')).toEqual([]);
    expect(tokenize('')).toEqual([]);
  });
});

describe('shingle', () => {
  it('builds overlapping k-token windows', () => {
    const result = shingle(['a', 'b', 'c', 'd', 'e', 'f'], 5);
    expect([...result]).toEqual(['a b c d e', 'b c d e f']);
  });

  it('yields one shingle when there are k tokens or fewer', () => {
    expect([...shingle(['a', 'b', 'c'], 5)]).toEqual(['a b c']);
    expect([...shingle(['a', 'b', 'c', 'd', 'e'], 5)]).toEqual(['a b c d e']);
  });

  it('yields nothing for no tokens', () => {
    expect(shingle([], 5).size).toBe(0);
  });

  it('deduplicates repeated windows', () => {
    expect(shingle(['x', 'y', 'x', 'y', 'x'], 2).size).toBe(2);
  });

  it('rejects a non-positive shingle size', () => {
    expect(() => shingle(['a'], 0)).toThrow(RangeError);
    expect(() => shingle(['a'], 1.5)).toThrow(RangeError);
  });

  it('shingleText tokenizes first', () => {
    expect([...shingleText('One TWO three', 2)]).toEqual(['one two', 'two three']);
  });
});

describe('jaccard', () => {
  it('computes |A∩B| / |A∪B|', () => {
    expect(jaccard(new Set(['a', 'b', 'c']), new Set(['b', 'c', 'd']))).toBe(0.5);
  });

  it('treats two empty sets as identical and one empty set as disjoint', () => {
    expect(jaccard(new Set<string>(), new Set<string>())).toBe(1);
    expect(jaccard(new Set(['a']), new Set<string>())).toBe(0);
  });

  it('is symmetric', () => {
    const a = new Set(['p', 'q', 'r', 's']);
    const b = new Set(['r', 's']);
    expect(jaccard(a, b)).toBe(jaccard(b, a));
    expect(jaccard(a, b)).toBe(0.5);
  });
});

describe('sharedShingles', () => {
  it('lists query members present in the other set, in query order', () => {
    expect(sharedShingles(new Set(['a', 'b', 'c']), new Set(['c', 'a', 'z']))).toEqual(['a', 'c']);
  });
});

describe('computeContentHash', () => {
  it('returns the SHA-256 hex digest', () => {
    expect(computeContentHash('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(computeContentHash('a')).toHaveLength(64);
  });
});
