import { Directory } from './directory';
import { Compression, Entry } from './types';
import { writeDirectory } from './utils';
import { ByteBuffer } from './varint';

/** Root directory budget: the first 16 KiB of an archive, minus the fixed-size header. */
export const MAX_ROOT_DIRECTORY_BYTES = 16384 - 127;
export const DEFAULT_LEAF_SIZE = 4096;

export interface BuildOptions {
  compression?: Compression;
  maxRootBytes?: number;
  initialLeafSize?: number;
}

export interface BuiltDirectories {
  root: Uint8Array;
  /** Concatenated leaf directories. Root entry offsets are relative to the start of this section. */
  leaves: Uint8Array;
  numLeaves: number;
}

function buildRootAndLeaves(entries: readonly Entry[], leafSize: number, compression: Compression): BuiltDirectories {
  const root = Directory.withCapacity(Math.ceil(entries.length / leafSize));
  const leafSection = new ByteBuffer();
  for (let i = 0; i < entries.length; i += leafSize) {
    const leaf = Directory.fromEntries(entries.slice(i, i + leafSize));
    const leafBytes = writeDirectory(leaf, compression);
    root.push({ tileId: entries[i].tileId, offset: leafSection.length, length: leafBytes.length, runLength: 0 });
    leafSection.write(leafBytes);
  }
  return { root: writeDirectory(root, compression), leaves: leafSection.toUint8Array(), numLeaves: root.length };
}

/**
 * Lay out sorted tile entries as a root directory, splitting them into leaf directories when a single root
 * would not fit in `maxRootBytes`. The leaf size grows by a fifth until the root of leaf pointers fits.
 */
export function buildDirectories(entries: readonly Entry[], options: BuildOptions = {}): BuiltDirectories {
  const {
    compression = Compression.Gzip,
    maxRootBytes = MAX_ROOT_DIRECTORY_BYTES,
    initialLeafSize = DEFAULT_LEAF_SIZE,
  } = options;

  const root = writeDirectory(Directory.fromEntries(entries), compression);
  if (root.length <= maxRootBytes) {
    return { root, leaves: new Uint8Array(0), numLeaves: 0 };
  }

  let leafSize = Math.max(1, initialLeafSize);
  for (;;) {
    const built = buildRootAndLeaves(entries, leafSize, compression);
    if (built.root.length <= maxRootBytes) {
      return built;
    }
    if (built.numLeaves <= 1) {
      throw new Error(`Root directory cannot fit in ${maxRootBytes} bytes`);
    }
    leafSize = Math.ceil(leafSize * 1.2);
  }
}
