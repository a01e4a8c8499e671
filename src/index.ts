export { defaultConfig, loadConfig } from './config';
export type { DirectoryConfig } from './config';
export { createDirectoryService, DirectoryService } from './directory.service';
export type {
  AsyncFn,
  IDirectoryCacheRepository,
  IMetricsProviderRepository,
  IMetricsRepository,
  IStorageRepository,
  Operation,
  Options,
} from './interface';
export { monitorAsyncFunction } from './monitor';
export { buildDirectories, DEFAULT_LEAF_SIZE, MAX_ROOT_DIRECTORY_BYTES } from './pmtiles/builder';
export type { BuildOptions, BuiltDirectories } from './pmtiles/builder';
export { DIR_ENTRY_SIZE_BYTES, Directory } from './pmtiles/directory';
export type { DeserializeOptions } from './pmtiles/directory';
export { DirectoryDecodeError, DirectoryError } from './pmtiles/errors';
export type { DecodeFailureReason } from './pmtiles/errors';
export { Compression, isLeaf, toTileLocation } from './pmtiles/types';
export type { ArchiveLayout, ByteRange, Entry, LeafEntry, TileEntry, TileLocation } from './pmtiles/types';
export { compress, decompress, getDirectoryCacheKey, readDirectory, writeDirectory } from './pmtiles/utils';
export { ByteBuffer, readVarint, writeVarint } from './pmtiles/varint';
export type { BufferPosition, ByteSink } from './pmtiles/varint';
export {
  ConsoleMetricsProvider,
  DirectoryCacheRepository,
  FileStorageRepository,
  MemoryStorageRepository,
  Metric,
  MetricsRepository,
} from './repository';
