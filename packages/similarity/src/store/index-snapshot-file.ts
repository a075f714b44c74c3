/**
 * FILE PURPOSE: Durable index snapshot on local disk
 *
 * HOW: save() writes a temp file beside the target and renames it over the
 *      old snapshot, so a crash leaves either the old or the new file.
 *      load() returns null only when no snapshot exists yet; anything
 *      unreadable is an IndexSnapshotError.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { decodeSnapshot, encodeSnapshot } from '../index/snapshot-codec.js';
import type { IndexSnapshot, SnapshotExpectations } from '../index/snapshot-codec.js';
import type { BandedIndex } from '../index/banded-index.js';
import type { SeedTable } from '../sketch/seed-table.js';
import { IndexSnapshotError } from '../errors.js';

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export class IndexSnapshotFile {
  private writes = 0;

  constructor(readonly path: string) {}

  async load(expected?: SnapshotExpectations): Promise<IndexSnapshot | null> {
    let bytes: Buffer;
    try {
      bytes = await readFile(this.path);
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return null;
      throw new IndexSnapshotError(`cannot read ${this.path}: ${err}`);
    }
    return decodeSnapshot(bytes, expected);
  }

  async save(index: BandedIndex, seedTable: SeedTable): Promise<void> {
    const bytes = encodeSnapshot(index, seedTable);
    const tmp = `${this.path}.${process.pid}.${++this.writes}.tmp`;
    await mkdir(dirname(this.path), { recursive: true });
    try {
      await writeFile(tmp, bytes);
      await rename(tmp, this.path);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
  }
}
