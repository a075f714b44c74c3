/**
 * FILE PURPOSE: Permutation seed table shared by every sketch in one index
 *
 * WHY: Sketches are only comparable when built from the same seeds. The
 *      table is generated once, persisted inside the index snapshot and
 *      reloaded on restart; the engine owns the single instance.
 * HOW: splitmix32 expands a 32-bit generator seed into `numPerm` seeds.
 */

import { randomBytes } from 'node:crypto';

export const DEFAULT_NUM_PERM = 128;

function splitmix32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x9e3779b9) >>> 0;
    let z = state;
    z = Math.imul(z ^ (z >>> 16), 0x21f0aaad);
    z = Math.imul(z ^ (z >>> 15), 0x735a2d97);
    return (z ^ (z >>> 15)) >>> 0;
  };
}

export class SeedTable {
  readonly seeds: Uint32Array;

  private constructor(seeds: Uint32Array) {
    this.seeds = seeds;
  }

  get numPerm(): number {
    return this.seeds.length;
  }

  /** New table. Without `generatorSeed` the table is random. */
  static generate(numPerm = DEFAULT_NUM_PERM, generatorSeed?: number): SeedTable {
    if (!Number.isInteger(numPerm) || numPerm < 1) {
      throw new RangeError(`numPerm must be a positive integer, got ${numPerm}`);
    }
    const next = splitmix32(generatorSeed ?? randomBytes(4).readUInt32LE(0));
    const seeds = new Uint32Array(numPerm);
    for (let i = 0; i < numPerm; i++) seeds[i] = next();
    return new SeedTable(seeds);
  }

  /** Rebuild a table from persisted seeds. The array is copied. */
  static fromSeeds(seeds: ArrayLike<number>): SeedTable {
    if (seeds.length === 0) throw new RangeError('Seed table cannot be empty');
    return new SeedTable(Uint32Array.from(seeds));
  }

  equals(other: SeedTable): boolean {
    if (other.seeds.length !== this.seeds.length) return false;
    for (let i = 0; i < this.seeds.length; i++) {
      if (other.seeds[i] !== this.seeds[i]) return false;
    }
    return true;
  }
}
