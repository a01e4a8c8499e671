import { gunzipSync, gzipSync } from 'fflate';
import { DeserializeOptions, Directory } from './directory';
import { ByteRange, Compression } from './types';

export function decompress(buf: Uint8Array, compression: Compression): Uint8Array {
  if (compression === Compression.None || compression === Compression.Unknown) {
    return buf;
  }
  if (compression === Compression.Gzip) {
    return gunzipSync(buf);
  }
  throw new Error('Compression method not supported');
}

export function compress(buf: Uint8Array, compression: Compression): Uint8Array {
  if (compression === Compression.None || compression === Compression.Unknown) {
    return buf;
  }
  if (compression === Compression.Gzip) {
    return gzipSync(buf);
  }
  throw new Error('Compression method not supported');
}

export function readDirectory(
  data: Uint8Array | ArrayBuffer,
  compression: Compression,
  options?: DeserializeOptions,
): Directory {
  const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
  return Directory.deserialize(decompress(bytes, compression), options);
}

export function writeDirectory(directory: Directory, compression: Compression): Uint8Array {
  return compress(directory.toBytes(), compression);
}

export function getDirectoryCacheKey(archiveKey: string, range: ByteRange): string {
  return `${archiveKey}|${range.offset}|${range.length}`;
}
