import { describe, it, expect } from 'vitest';
import { SeedTable } from '../src/sketch/seed-table.js';
import {
  SketchBuilder,
  EMPTY_SLOT,
  isEmptySketch,
  estimateSimilarity,
  encodeSketch,
  decodeSketch,
} from '../src/sketch/minhash.js';
import { jaccard } from '../src/text/shingles.js';

function range(prefix: string, from: number, to: number): Set<string> {
  const out = new Set<string>();
  for (let i = from; i < to; i++) out.add(`${prefix} ${i}`);
  return out;
}

describe('SeedTable', () => {
  it('is deterministic for a generator seed', () => {
    const a = SeedTable.generate(16, 42);
    const b = SeedTable.generate(16, 42);
    expect(a.equals(b)).toBe(true);
    expect(a.numPerm).toBe(16);
  });

  it('differs across generator seeds', () => {
    expect(SeedTable.generate(16, 1).equals(SeedTable.generate(16, 2))).toBe(false);
  });

  it('round-trips through fromSeeds', () => {
    const table = SeedTable.generate(8, 7);
    expect(SeedTable.fromSeeds(table.seeds).equals(table)).toBe(true);
  });

  it('rejects empty tables', () => {
    expect(() => SeedTable.generate(0)).toThrow(RangeError);
    expect(() => SeedTable.fromSeeds([])).toThrow(RangeError);
  });
});

describe('SketchBuilder', () => {
  const builder = new SketchBuilder(SeedTable.generate(64, 99));

  it('produces one slot per permutation', () => {
    expect(builder.build(['a b c d e']).length).toBe(64);
  });

  it('fills every slot with EMPTY_SLOT for an empty set', () => {
    const sketch = builder.build([]);
    expect(sketch.every((v) => v === EMPTY_SLOT)).toBe(true);
    expect(isEmptySketch(sketch)).toBe(true);
  });

  it('gives identical sets identical sketches regardless of order', () => {
    const a = builder.build(['x', 'y', 'z']);
    const b = builder.build(['z', 'x', 'y', 'x']);
    expect(estimateSimilarity(a, b)).toBe(1);
    expect(isEmptySketch(a)).toBe(false);
  });

  it('gives different seed tables incomparable sketches', () => {
    const other = new SketchBuilder(SeedTable.generate(64, 100));
    const shingles = range('w', 0, 50);
    expect(estimateSimilarity(builder.build(shingles), other.build(shingles))).toBeLessThan(0.2);
  });

  it('converges on the true Jaccard as the sketch grows', () => {
    const a = range('s', 0, 100);
    const b = range('s', 50, 150);
    const truth = jaccard(a, b);
    expect(truth).toBeCloseTo(1 / 3, 10);

    const trials = 400;
    const meanError = (numPerm: number): number => {
      let total = 0;
      for (let t = 0; t < trials; t++) {
        const builderN = new SketchBuilder(SeedTable.generate(numPerm, 1000 + t));
        total += Math.abs(estimateSimilarity(builderN.build(a), builderN.build(b)) - truth);
      }
      return total / trials;
    };

    const errors = [16, 32, 64, 128].map((n) => ({ n, error: meanError(n) }));
    for (const { n, error } of errors) {
      const sigma = Math.sqrt((truth * (1 - truth)) / n);
      expect(error).toBeLessThan(1.5 * sigma);
    }
    // Each doubling of the sketch lowers the mean error
    for (let i = 1; i < errors.length; i++) {
      expect(errors[i]?.error).toBeLessThan(errors[i - 1]?.error ?? 0);
    }
  });
});

describe('estimateSimilarity', () => {
  it('rejects sketches of different lengths', () => {
    expect(() => estimateSimilarity(new Uint32Array(4), new Uint32Array(8))).toThrow(RangeError);
  });

  it('counts equal positions', () => {
    expect(estimateSimilarity(Uint32Array.from([1, 2, 3, 4]), Uint32Array.from([1, 9, 3, 9]))).toBe(0.5);
  });
});

describe('sketch bytes', () => {
  it('encodes little-endian and decodes back', () => {
    const sketch = Uint32Array.from([1, 0xffffffff]);
    const bytes = encodeSketch(sketch);
    expect([...bytes]).toEqual([1, 0, 0, 0, 255, 255, 255, 255]);
    expect([...decodeSketch(bytes)]).toEqual([1, 0xffffffff]);
  });

  it('rejects byte lengths that are not a multiple of 4', () => {
    expect(() => decodeSketch(new Uint8Array(6))).toThrow(RangeError);
  });
});
