import { buildDirectories } from '../src/pmtiles/builder';
import { Directory } from '../src/pmtiles/directory';
import { Compression, Entry } from '../src/pmtiles/types';
import { compress, decompress, getDirectoryCacheKey, readDirectory, writeDirectory } from '../src/pmtiles/utils';

const tileEntries = (count: number): Entry[] =>
  Array.from({ length: count }, (_, i) => ({ tileId: i, offset: i * 10, length: 10, runLength: 1 }));

describe('compression', () => {
  it('round trips a directory through gzip', () => {
    const directory = Directory.fromEntries(tileEntries(50));
    const bytes = writeDirectory(directory, Compression.Gzip);
    expect(bytes[0]).toBe(0x1f);
    expect(bytes[1]).toBe(0x8b);
    expect(readDirectory(bytes, Compression.Gzip).entries).toEqual(directory.entries);
  });

  it.each([Compression.None, Compression.Unknown])('passes bytes through for compression %s', (compression) => {
    const bytes = new Uint8Array([1, 2, 3]);
    expect(decompress(bytes, compression)).toBe(bytes);
    expect(compress(bytes, compression)).toBe(bytes);
  });

  it.each([Compression.Brotli, Compression.Zstd])('rejects compression %s', (compression) => {
    expect(() => decompress(new Uint8Array([1]), compression)).toThrow('Compression method not supported');
    expect(() => compress(new Uint8Array([1]), compression)).toThrow('Compression method not supported');
  });

  it('builds cache keys from the archive key and range', () => {
    expect(getDirectoryCacheKey('planet', { offset: 127, length: 512 })).toBe('planet|127|512');
  });
});

describe('buildDirectories', () => {
  const entries = tileEntries(100);

  it('keeps a small directory in the root', () => {
    const built = buildDirectories(entries, { compression: Compression.None, maxRootBytes: 401 });
    expect(built.numLeaves).toBe(0);
    expect(built.root).toHaveLength(401);
    expect(built.leaves).toHaveLength(0);
    expect(readDirectory(built.root, Compression.None).entries).toEqual(entries);
  });

  it('splits into leaf directories when the root is too large', () => {
    const built = buildDirectories(entries, { compression: Compression.None, maxRootBytes: 100, initialLeafSize: 10 });
    expect(built.numLeaves).toBe(10);
    expect(built.root).toHaveLength(41);
    expect(built.leaves).toHaveLength(418);

    const root = readDirectory(built.root, Compression.None);
    expect(root.entries[2]).toEqual({ tileId: 20, offset: 82, length: 42, runLength: 0 });

    const leaf = readDirectory(built.leaves.subarray(82, 82 + 42), Compression.None);
    expect(leaf.entries).toEqual(entries.slice(20, 30));
  });

  it('grows the leaf size until the root fits', () => {
    const built = buildDirectories(entries, { compression: Compression.None, maxRootBytes: 30, initialLeafSize: 10 });
    expect(built.numLeaves).toBe(7);
    expect(readDirectory(built.root, Compression.None).entries.map((e) => e.tileId)).toEqual([
      0, 15, 30, 45, 60, 75, 90,
    ]);
  });

  it('fails when even a single leaf pointer does not fit', () => {
    expect(() =>
      buildDirectories(entries, { compression: Compression.None, maxRootBytes: 3, initialLeafSize: 10 }),
    ).toThrow('Root directory cannot fit in 3 bytes');
  });
});
