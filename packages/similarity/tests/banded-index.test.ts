import { describe, it, expect } from 'vitest';
import {
  BandedIndex,
  approximateThreshold,
  bandsForThreshold,
} from '../src/index/banded-index.js';
import { SeedTable } from '../src/sketch/seed-table.js';
import { SketchBuilder } from '../src/sketch/minhash.js';

function words(from: number, to: number): string[] {
  const out: string[] = [];
  for (let i = from; i < to; i++) out.push(`shingle ${i}`);
  return out;
}

const builder = new SketchBuilder(SeedTable.generate(128, 2024));

describe('bandsForThreshold', () => {
  it('returns the preset for 128 permutations', () => {
    expect(bandsForThreshold(0.5)).toEqual({ bands: 25, rows: 5 });
    expect(bandsForThreshold(0.3)).toEqual({ bands: 42, rows: 3 });
    expect(bandsForThreshold(0.8)).toEqual({ bands: 12, rows: 10 });
  });

  it('snaps to the nearest preset', () => {
    expect(bandsForThreshold(0.72)).toEqual({ bands: 16, rows: 8 });
    expect(bandsForThreshold(0.05)).toEqual({ bands: 42, rows: 3 });
  });

  it('keeps rows and refits bands for other sketch lengths', () => {
    expect(bandsForThreshold(0.5, 64)).toEqual({ bands: 12, rows: 5 });
  });

  it('presets sit near their threshold', () => {
    expect(approximateThreshold({ bands: 25, rows: 5 })).toBeCloseTo(0.525, 2);
  });
});

describe('BandedIndex', () => {
  it('rejects invalid parameters', () => {
    expect(() => new BandedIndex({ bands: 0, rows: 5 })).toThrow(RangeError);
  });

  it('finds a near-duplicate and misses an unrelated document', () => {
    const index = new BandedIndex({ bands: 25, rows: 5 });
    index.insert('near', builder.build(words(5, 105)));
    index.insert('far', builder.build(words(1000, 1100)));

    const hits = index.query(builder.build(words(0, 100)));
    expect(hits.has('near')).toBe(true);
    expect(hits.has('far')).toBe(false);
  });

  it('re-inserting a document replaces its buckets', () => {
    const index = new BandedIndex({ bands: 25, rows: 5 });
    const first = builder.build(words(0, 100));
    const second = builder.build(words(500, 600));

    index.insert('doc', first);
    index.insert('doc', first);
    expect(index.size).toBe(1);
    expect(index.bucketCount('doc')).toBe(25);

    index.insert('doc', second);
    expect(index.size).toBe(1);
    expect(index.bucketCount('doc')).toBe(25);
    expect(index.query(first).has('doc')).toBe(false);
    expect(index.query(second).has('doc')).toBe(true);
  });

  it('stores an empty sketch without buckets and never returns it', () => {
    const index = new BandedIndex({ bands: 25, rows: 5 });
    const empty = builder.build([]);
    index.insert('blank', empty);
    expect(index.has('blank')).toBe(true);
    expect(index.bucketCount('blank')).toBe(0);
    expect(index.query(empty).size).toBe(0);
    expect(index.query(builder.build(words(0, 10))).has('blank')).toBe(false);
  });

  it('excludes the given id from query results', () => {
    const index = new BandedIndex({ bands: 25, rows: 5 });
    const sketch = builder.build(words(0, 50));
    index.insert('a', sketch);
    index.insert('b', sketch);
    expect([...index.query(sketch, 'a')]).toEqual(['b']);
  });

  it('removes documents and empties their buckets', () => {
    const index = new BandedIndex({ bands: 25, rows: 5 });
    const sketch = builder.build(words(0, 50));
    index.insert('a', sketch);
    expect(index.remove('a')).toBe(true);
    expect(index.remove('a')).toBe(false);
    expect(index.size).toBe(0);
    expect(index.query(sketch).size).toBe(0);
  });

  it('clear drops everything', () => {
    const index = new BandedIndex({ bands: 25, rows: 5 });
    index.insert('a', builder.build(words(0, 50)));
    index.insert('b', builder.build(words(50, 100)));
    index.clear();
    expect(index.size).toBe(0);
    expect([...index.ids()]).toEqual([]);
  });

  it('throws when a sketch is shorter than bands × rows', () => {
    const index = new BandedIndex({ bands: 25, rows: 5 });
    expect(() => index.insert('x', new Uint32Array(64))).toThrow(RangeError);
  });

  it('rejects restored key lists of the wrong length', () => {
    const index = new BandedIndex({ bands: 4, rows: 2 });
    expect(() => index.insertKeys('x', ['k1', 'k2'])).toThrow(RangeError);
  });
});
