/**
 * FILE PURPOSE: Versioned binary format for the banded index + seed table
 *
 * LAYOUT (little-endian):
 *   "TGIX"  magic
 *   u16     format version
 *   u16     reserved (0)
 *   u32     bands, u32 rows, u32 numPerm
 *   u32 × numPerm          permutation seeds
 *   u32     document count
 *   per document: u16 id length, id (utf-8), u16 key count (0 or bands),
 *                 16 bytes × key count (MD5 band digests)
 *   32 bytes SHA-256 of everything above
 *
 * Any deviation (magic, version, checksum, truncation, parameter mismatch)
 * raises IndexSnapshotError; there is no silent reset.
 */

import { createHash } from 'node:crypto';
import { BandedIndex } from './banded-index.js';
import type { BandParams } from './banded-index.js';
import { SeedTable } from '../sketch/seed-table.js';
import { IndexSnapshotError } from '../errors.js';

const MAGIC = Buffer.from('TGIX', 'ascii');
export const SNAPSHOT_VERSION = 1;
const DIGEST_BYTES = 16;
const CHECKSUM_BYTES = 32;

export interface IndexSnapshot {
  index: BandedIndex;
  seedTable: SeedTable;
}

export interface SnapshotExpectations extends BandParams {
  numPerm: number;
}

export function encodeSnapshot(index: BandedIndex, seedTable: SeedTable): Buffer {
  const parts: Buffer[] = [];

  const header = Buffer.alloc(4 + 2 + 2 + 12);
  MAGIC.copy(header, 0);
  header.writeUInt16LE(SNAPSHOT_VERSION, 4);
  header.writeUInt16LE(0, 6);
  header.writeUInt32LE(index.bands, 8);
  header.writeUInt32LE(index.rows, 12);
  header.writeUInt32LE(seedTable.numPerm, 16);
  parts.push(header);

  const seeds = Buffer.alloc(seedTable.numPerm * 4);
  seedTable.seeds.forEach((seed, i) => seeds.writeUInt32LE(seed, i * 4));
  parts.push(seeds);

  const count = Buffer.alloc(4);
  count.writeUInt32LE(index.size, 0);
  parts.push(count);

  for (const [docId, keys] of index.entries()) {
    const id = Buffer.from(docId, 'utf8');
    if (id.length > 0xffff) throw new RangeError(`Document id too long to persist: ${docId.slice(0, 40)}…`);
    const head = Buffer.alloc(2 + id.length + 2);
    head.writeUInt16LE(id.length, 0);
    id.copy(head, 2);
    head.writeUInt16LE(keys.length, 2 + id.length);
    parts.push(head);
    for (const key of keys) parts.push(Buffer.from(key, 'base64'));
  }

  const body = Buffer.concat(parts);
  const checksum = createHash('sha256').update(body).digest();
  return Buffer.concat([body, checksum]);
}

class Cursor {
  private offset = 0;

  constructor(private readonly buf: Buffer) {}

  private need(n: number): void {
    if (this.offset + n > this.buf.length) {
      throw new IndexSnapshotError(`truncated at byte ${this.offset} (needed ${n} more)`);
    }
  }

  u16(): number {
    this.need(2);
    const v = this.buf.readUInt16LE(this.offset);
    this.offset += 2;
    return v;
  }

  u32(): number {
    this.need(4);
    const v = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return v;
  }

  bytes(n: number): Buffer {
    this.need(n);
    const v = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return v;
  }

  get remaining(): number {
    return this.buf.length - this.offset;
  }
}

export function decodeSnapshot(data: Uint8Array, expected?: SnapshotExpectations): IndexSnapshot {
  const buf = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (buf.length < MAGIC.length + CHECKSUM_BYTES || !buf.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new IndexSnapshotError('not an index snapshot (bad magic)');
  }

  const body = buf.subarray(0, buf.length - CHECKSUM_BYTES);
  const checksum = buf.subarray(buf.length - CHECKSUM_BYTES);
  if (!createHash('sha256').update(body).digest().equals(checksum)) {
    throw new IndexSnapshotError('checksum mismatch');
  }

  const cur = new Cursor(body);
  cur.bytes(MAGIC.length);
  const version = cur.u16();
  if (version !== SNAPSHOT_VERSION) {
    throw new IndexSnapshotError(`unsupported format version ${version} (expected ${SNAPSHOT_VERSION})`);
  }
  cur.u16();
  const bands = cur.u32();
  const rows = cur.u32();
  const numPerm = cur.u32();
  if (bands < 1 || rows < 1 || numPerm < 1 || bands * rows > numPerm) {
    throw new IndexSnapshotError(`invalid parameters bands=${bands} rows=${rows} numPerm=${numPerm}`);
  }
  if (expected && (expected.bands !== bands || expected.rows !== rows || expected.numPerm !== numPerm)) {
    throw new IndexSnapshotError(
      `built with bands=${bands} rows=${rows} numPerm=${numPerm}, configured bands=${expected.bands} rows=${expected.rows} numPerm=${expected.numPerm}`,
    );
  }

  const seeds = new Uint32Array(numPerm);
  for (let i = 0; i < numPerm; i++) seeds[i] = cur.u32();

  const index = new BandedIndex({ bands, rows });
  const docCount = cur.u32();
  for (let d = 0; d < docCount; d++) {
    const docId = cur.bytes(cur.u16()).toString('utf8');
    const keyCount = cur.u16();
    if (keyCount !== 0 && keyCount !== bands) {
      throw new IndexSnapshotError(`document ${docId} has ${keyCount} band keys, expected ${bands}`);
    }
    const keys: string[] = [];
    for (let k = 0; k < keyCount; k++) keys.push(cur.bytes(DIGEST_BYTES).toString('base64'));
    if (index.has(docId)) throw new IndexSnapshotError(`duplicate document ${docId}`);
    index.insertKeys(docId, keys);
  }
  if (cur.remaining !== 0) {
    throw new IndexSnapshotError(`${cur.remaining} trailing bytes after ${docCount} documents`);
  }

  return { index, seedTable: SeedTable.fromSeeds(seeds) };
}
