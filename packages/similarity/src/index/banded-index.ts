/**
 * FILE PURPOSE: Banded LSH index over MinHash sketches
 *
 * WHY: Candidate lookup without comparing the query against every stored
 *      page. Two sketches that agree on all rows of any one band land in the
 *      same bucket; the candidate set is the union of those buckets.
 * HOW: One bucket table per band, keyed by the MD5 of the band's rows.
 *      A reverse map (docId → band keys) makes remove and re-insert exact.
 *      Not synchronized: callers hold the engine's read/write lock.
 */

import { createHash } from 'node:crypto';
import type { Sketch } from '../sketch/minhash.js';
import { isEmptySketch } from '../sketch/minhash.js';

export interface BandParams {
  bands: number;
  rows: number;
}

/**
 * Threshold → (bands, rows) for 128-permutation sketches, chosen offline so
 * that (1/b)^(1/r) sits at or just above the threshold.
 */
export const BAND_PRESETS: ReadonlyArray<{ threshold: number } & BandParams> = [
  { threshold: 0.3, bands: 42, rows: 3 },
  { threshold: 0.4, bands: 32, rows: 4 },
  { threshold: 0.5, bands: 25, rows: 5 },
  { threshold: 0.6, bands: 21, rows: 6 },
  { threshold: 0.7, bands: 16, rows: 8 },
  { threshold: 0.8, bands: 12, rows: 10 },
];

export const DEFAULT_LSH_THRESHOLD = 0.5;

/** Similarity at which a pair collides in at least one band with probability ~1/2. */
export function approximateThreshold({ bands, rows }: BandParams): number {
  return Math.pow(1 / bands, 1 / rows);
}

/**
 * Band parameters for a threshold. Picks the nearest preset; for sketch
 * lengths other than 128 the preset's row count is kept and the band count
 * shrinks or grows to fill the sketch.
 */
export function bandsForThreshold(threshold: number, numPerm = 128): BandParams {
  let best = BAND_PRESETS[0]!;
  for (const preset of BAND_PRESETS) {
    if (Math.abs(preset.threshold - threshold) < Math.abs(best.threshold - threshold)) best = preset;
  }
  if (numPerm === 128) return { bands: best.bands, rows: best.rows };
  const rows = Math.min(best.rows, numPerm);
  return { bands: Math.max(1, Math.floor(numPerm / rows)), rows };
}

export class BandedIndex {
  readonly bands: number;
  readonly rows: number;
  private readonly buckets: Array<Map<string, Set<string>>>;
  private readonly docBands = new Map<string, string[]>();

  constructor(params: BandParams) {
    if (!Number.isInteger(params.bands) || params.bands < 1 || !Number.isInteger(params.rows) || params.rows < 1) {
      throw new RangeError(`Invalid band parameters: bands=${params.bands} rows=${params.rows}`);
    }
    this.bands = params.bands;
    this.rows = params.rows;
    this.buckets = Array.from({ length: params.bands }, () => new Map<string, Set<string>>());
  }

  get params(): BandParams {
    return { bands: this.bands, rows: this.rows };
  }

  get size(): number {
    return this.docBands.size;
  }

  has(docId: string): boolean {
    return this.docBands.has(docId);
  }

  ids(): IterableIterator<string> {
    return this.docBands.keys();
  }

  /** Band keys per document, in band order. Empty array for an empty sketch. */
  entries(): IterableIterator<[string, readonly string[]]> {
    return this.docBands.entries();
  }

  /** Band keys for a sketch; empty when the sketch carries no shingles. */
  bandKeys(sketch: Sketch): string[] {
    const needed = this.bands * this.rows;
    if (sketch.length < needed) {
      throw new RangeError(`Sketch of length ${sketch.length} is too short for ${this.bands}x${this.rows} bands`);
    }
    if (isEmptySketch(sketch)) return [];
    const keys: string[] = [];
    for (let b = 0; b < this.bands; b++) {
      const start = b * this.rows;
      const band = sketch.subarray(start, start + this.rows);
      const bytes = Buffer.alloc(this.rows * 4);
      for (let r = 0; r < this.rows; r++) bytes.writeUInt32LE(band[r]!, r * 4);
      keys.push(createHash('md5').update(bytes).digest('base64'));
    }
    return keys;
  }

  /** Add or replace a document. Re-inserting a docId drops its old buckets first. */
  insert(docId: string, sketch: Sketch): void {
    this.insertKeys(docId, this.bandKeys(sketch));
  }

  /** Restore a document from persisted band keys. */
  insertKeys(docId: string, keys: readonly string[]): void {
    if (keys.length !== 0 && keys.length !== this.bands) {
      throw new RangeError(`Expected ${this.bands} band keys for ${docId}, got ${keys.length}`);
    }
    this.remove(docId);
    keys.forEach((key, b) => {
      const table = this.buckets[b]!;
      let bucket = table.get(key);
      if (!bucket) {
        bucket = new Set<string>();
        table.set(key, bucket);
      }
      bucket.add(docId);
    });
    this.docBands.set(docId, [...keys]);
  }

  /** Every stored docId sharing at least one bucket with the sketch. */
  query(sketch: Sketch, excludeId?: string): Set<string> {
    const found = new Set<string>();
    const keys = this.bandKeys(sketch);
    keys.forEach((key, b) => {
      const bucket = this.buckets[b]!.get(key);
      if (!bucket) return;
      for (const id of bucket) found.add(id);
    });
    if (excludeId !== undefined) found.delete(excludeId);
    return found;
  }

  remove(docId: string): boolean {
    const keys = this.docBands.get(docId);
    if (!keys) return false;
    keys.forEach((key, b) => {
      const table = this.buckets[b]!;
      const bucket = table.get(key);
      if (!bucket) return;
      bucket.delete(docId);
      if (bucket.size === 0) table.delete(key);
    });
    this.docBands.delete(docId);
    return true;
  }

  clear(): void {
    for (const table of this.buckets) table.clear();
    this.docBands.clear();
  }

  /** Number of (band, bucket) slots a docId occupies. */
  bucketCount(docId: string): number {
    let count = 0;
    this.buckets.forEach((table) => {
      for (const bucket of table.values()) {
        if (bucket.has(docId)) count++;
      }
    });
    return count;
  }
}
