/**
 * FILE PURPOSE: MinHash sketch builder
 *
 * HOW: Each shingle is hashed once (first 32 bits of SHA-1). Position i of
 *      the sketch is the minimum, over all shingles, of a bijective 32-bit
 *      mix of `base XOR seed[i]`. An empty set leaves every position at
 *      EMPTY_SLOT, so it matches no band of a non-empty sketch.
 */

import { createHash } from 'node:crypto';
import type { SeedTable } from './seed-table.js';

/** One unsigned 32-bit minimum per permutation. */
export type Sketch = Uint32Array;

export const EMPTY_SLOT = 0xffffffff;

/** murmur3 finalizer. Bijective on 32-bit integers. */
function fmix32(h: number): number {
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

export function baseHash(shingle: string): number {
  return createHash('sha1').update(shingle, 'utf8').digest().readUInt32LE(0);
}

export class SketchBuilder {
  private readonly seeds: Uint32Array;

  constructor(seedTable: SeedTable) {
    this.seeds = seedTable.seeds;
  }

  get numPerm(): number {
    return this.seeds.length;
  }

  build(shingles: Iterable<string>): Sketch {
    const numPerm = this.seeds.length;
    const sketch = new Uint32Array(numPerm).fill(EMPTY_SLOT);
    for (const s of shingles) {
      const base = baseHash(s);
      for (let i = 0; i < numPerm; i++) {
        const h = fmix32((base ^ this.seeds[i]!) >>> 0);
        if (h < sketch[i]!) sketch[i] = h;
      }
    }
    return sketch;
  }
}

export function isEmptySketch(sketch: Sketch): boolean {
  for (let i = 0; i < sketch.length; i++) {
    if (sketch[i] !== EMPTY_SLOT) return false;
  }
  return true;
}

/** Fraction of equal positions. Diagnostics only; reported scores use exact Jaccard. */
export function estimateSimilarity(a: Sketch, b: Sketch): number {
  if (a.length !== b.length) {
    throw new RangeError(`Sketch lengths differ: ${a.length} vs ${b.length}`);
  }
  if (a.length === 0) return 0;
  let equal = 0;
  for (let i = 0; i < a.length; i++) {
    if (a[i] === b[i]) equal++;
  }
  return equal / a.length;
}

/** Little-endian bytes, for bytea columns and snapshots. */
export function encodeSketch(sketch: Sketch): Buffer {
  const buf = Buffer.alloc(sketch.length * 4);
  for (let i = 0; i < sketch.length; i++) buf.writeUInt32LE(sketch[i]!, i * 4);
  return buf;
}

export function decodeSketch(bytes: Uint8Array): Sketch {
  if (bytes.length % 4 !== 0) {
    throw new RangeError(`Sketch byte length ${bytes.length} is not a multiple of 4`);
  }
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const sketch = new Uint32Array(bytes.length / 4);
  for (let i = 0; i < sketch.length; i++) sketch[i] = buf.readUInt32LE(i * 4);
  return sketch;
}
