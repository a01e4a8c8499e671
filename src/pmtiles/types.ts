/**
 * PMTiles v3 directory entry.
 *
 * A `runLength` of 0 marks a leaf pointer: `offset`/`length` then address a child directory
 * instead of tile data. A positive `runLength` covers `tileId .. tileId + runLength - 1`.
 */
export interface Entry {
  readonly tileId: number;
  readonly offset: number;
  readonly length: number;
  readonly runLength: number;
}

export type TileEntry = { type: 'tile'; tileId: number; offset: number; length: number; runLength: number };
export type LeafEntry = { type: 'leaf'; tileId: number; offset: number; length: number };

/**
 * Result of a directory lookup, tagged by what the byte range points at.
 */
export type TileLocation = TileEntry | LeafEntry;

/**
 * Enum representing a compression algorithm used.
 * 0 = unknown compression, for if you must use a different or unspecified algorithm.
 * 1 = no compression.
 */
export enum Compression {
  Unknown = 0,
  None = 1,
  Gzip = 2,
  Brotli = 3,
  Zstd = 4,
}

/**
 * The parts of an archive header needed to walk its directories. Parsing the header itself is left to the caller.
 */
export interface ArchiveLayout {
  rootDirectoryOffset: number;
  rootDirectoryLength: number;
  leafDirectoryOffset: number;
  tileDataOffset: number;
  internalCompression: Compression;
}

export interface ByteRange {
  offset: number;
  length: number;
}

export function isLeaf(entry: Entry): boolean {
  return entry.runLength === 0;
}

export function toTileLocation(entry: Entry): TileLocation {
  const { tileId, offset, length, runLength } = entry;
  if (isLeaf(entry)) {
    return { type: 'leaf', tileId, offset, length };
  }
  return { type: 'tile', tileId, offset, length, runLength };
}
