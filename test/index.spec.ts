import { Compression, Directory, DirectoryDecodeError, readDirectory, writeDirectory } from '../src';

describe('public api', () => {
  it('writes and reads a gzipped directory', () => {
    const directory = Directory.withCapacity(2);
    directory.push({ tileId: 3, offset: 0, length: 12, runLength: 2 });
    directory.push({ tileId: 9, offset: 12, length: 40, runLength: 0 });

    const decoded = readDirectory(writeDirectory(directory, Compression.Gzip), Compression.Gzip, { strict: true });

    expect(decoded.entries).toEqual(directory.entries);
    expect(decoded.resolveTile(4)).toEqual({ type: 'tile', tileId: 3, offset: 0, length: 12, runLength: 2 });
    expect(decoded.resolveTile(5)).toBeUndefined();
    expect(decoded.resolveTile(500)).toEqual({ type: 'leaf', tileId: 9, offset: 12, length: 40 });
  });

  it('exposes decode failures by reason', () => {
    expect(() => readDirectory(new Uint8Array([1, 0, 1, 5, 0]), Compression.None)).toThrow(DirectoryDecodeError);
  });
});
