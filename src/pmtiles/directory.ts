import { DirectoryDecodeError } from './errors';
import { Entry, TileLocation, isLeaf, toTileLocation } from './types';
import {
  BufferPosition,
  ByteBuffer,
  ByteSink,
  readUint32Varint,
  readVarint,
  writeUint32Varint,
  writeVarint,
} from './varint';

/**
 * Fixed-width footprint of one entry: u64 tile id, u64 offset, u32 length, u32 run length.
 */
export const DIR_ENTRY_SIZE_BYTES = 24;

export interface DeserializeOptions {
  /** Check ordering and run overlap, and reject bytes left over after the offsets. */
  strict?: boolean;
}

function checkedAdd(a: number, b: number, what: string): number {
  const sum = a + b;
  if (!Number.isSafeInteger(sum)) {
    throw new DirectoryDecodeError('overflow', `${what} exceeds the safe integer range`);
  }
  return sum;
}

/**
 * PMTiles v3 directory: entries sorted strictly ascending by tile id.
 *
 * The serialized form is columnar: entry count, then tile id deltas, run lengths, lengths and offsets,
 * each column written as a run of varints.
 */
export class Directory {
  private readonly _entries: Entry[];
  private capacity: number;

  /** Entries are copied, so later changes to the caller's objects do not reach the directory. */
  constructor(entries: readonly Entry[] = [], capacity = 0) {
    this._entries = entries.map((entry) => ({ ...entry }));
    this.capacity = capacity;
  }

  static withCapacity(capacity: number): Directory {
    return new Directory([], capacity);
  }

  static fromEntries(entries: readonly Entry[]): Directory {
    return new Directory(entries);
  }

  static deserialize(data: Uint8Array | ArrayBuffer, options: DeserializeOptions = {}): Directory {
    const p: BufferPosition = { buf: data instanceof Uint8Array ? data : new Uint8Array(data), pos: 0 };
    const numEntries = readVarint(p);

    const tileIds: number[] = [];
    let lastId = 0;
    for (let i = 0; i < numEntries; i++) {
      lastId = checkedAdd(lastId, readVarint(p), 'Tile id');
      tileIds.push(lastId);
    }

    const runLengths: number[] = [];
    for (let i = 0; i < numEntries; i++) {
      runLengths.push(readUint32Varint(p));
    }

    const lengths: number[] = [];
    for (let i = 0; i < numEntries; i++) {
      lengths.push(readUint32Varint(p));
    }

    const directory = Directory.withCapacity(numEntries);
    const entries = directory._entries;
    for (let i = 0; i < numEntries; i++) {
      const v = readVarint(p);
      let offset: number;
      if (v === 0) {
        if (i === 0) {
          throw new DirectoryDecodeError('invalid-entry', 'First directory entry cannot reference a previous entry');
        }
        offset = checkedAdd(entries[i - 1].offset, entries[i - 1].length, 'Offset');
      } else {
        offset = v - 1;
      }
      entries.push({ tileId: tileIds[i], offset, length: lengths[i], runLength: runLengths[i] });
    }

    if (options.strict) {
      if (p.pos !== p.buf.length) {
        throw new DirectoryDecodeError(
          'trailing-data',
          `Directory data has ${p.buf.length - p.pos} bytes after the last entry`,
        );
      }
      directory.validate();
    }
    return directory;
  }

  get entries(): readonly Entry[] {
    return this._entries;
  }

  get length(): number {
    return this._entries.length;
  }

  push(entry: Entry): void {
    this._entries.push({ ...entry });
  }

  /**
   * Encode the directory and hand the bytes to `sink`.
   * Entries are trusted to be sorted; an unsorted directory fails on its first negative delta.
   */
  serialize(sink: ByteSink): void {
    const buffer = new ByteBuffer(this._entries.length * 4 + 1);
    writeVarint(buffer, this._entries.length);

    let lastId = 0;
    for (const entry of this._entries) {
      writeVarint(buffer, entry.tileId - lastId);
      lastId = entry.tileId;
    }

    for (const entry of this._entries) {
      writeUint32Varint(buffer, entry.runLength);
    }

    for (const entry of this._entries) {
      writeUint32Varint(buffer, entry.length);
    }

    for (let i = 0; i < this._entries.length; i++) {
      const entry = this._entries[i];
      const previous = i > 0 ? this._entries[i - 1] : undefined;
      if (previous && entry.offset === previous.offset + previous.length) {
        writeVarint(buffer, 0);
      } else {
        writeVarint(buffer, entry.offset + 1);
      }
    }

    sink.write(buffer.toUint8Array());
  }

  toBytes(): Uint8Array {
    const buffer = new ByteBuffer();
    this.serialize(buffer);
    return buffer.toUint8Array();
  }

  /**
   * Low-level lookup of a tile id or the leaf directory that may hold it.
   * Tile ids that are not non-negative safe integers match nothing.
   */
  findTile(tileId: number): Entry | undefined {
    if (!Number.isSafeInteger(tileId) || tileId < 0) {
      return;
    }
    const entries = this._entries;
    let m = 0;
    let n = entries.length - 1;
    while (m <= n) {
      const k = (n + m) >> 1;
      const cmp = tileId - entries[k].tileId;
      if (cmp > 0) {
        m = k + 1;
      } else if (cmp < 0) {
        n = k - 1;
      } else {
        return entries[k];
      }
    }

    // at this point, m > n
    if (n >= 0) {
      if (isLeaf(entries[n])) {
        return entries[n];
      }
      if (tileId - entries[n].tileId < entries[n].runLength) {
        return entries[n];
      }
    }
    return;
  }

  resolveTile(tileId: number): TileLocation | undefined {
    const entry = this.findTile(tileId);
    return entry ? toTileLocation(entry) : undefined;
  }

  /**
   * Estimated in-memory size, for cache eviction. Counts reserved capacity, not just live entries.
   */
  getApproxByteSize(): number {
    return Math.max(this.capacity, this._entries.length) * DIR_ENTRY_SIZE_BYTES;
  }

  validate(): void {
    for (let i = 1; i < this._entries.length; i++) {
      const previous = this._entries[i - 1];
      const entry = this._entries[i];
      if (entry.tileId <= previous.tileId) {
        throw new DirectoryDecodeError(
          'unsorted',
          `Entry ${i} has tile id ${entry.tileId}, not after tile id ${previous.tileId}`,
        );
      }
      if (!isLeaf(previous) && previous.tileId + previous.runLength > entry.tileId) {
        throw new DirectoryDecodeError(
          'overlapping',
          `Run of tile id ${previous.tileId} overlaps entry with tile id ${entry.tileId}`,
        );
      }
    }
  }

  toString(): string {
    return `Directory [entries: ${this._entries.length}]`;
  }
}
