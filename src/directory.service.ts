import { DirectoryConfig, loadConfig } from './config';
import type { IDirectoryCacheRepository, IMetricsRepository, IStorageRepository } from './interface';
import type { Directory } from './pmtiles/directory';
import type { ArchiveLayout, ByteRange, Compression } from './pmtiles/types';
import { getDirectoryCacheKey, readDirectory } from './pmtiles/utils';
import { ConsoleMetricsProvider, DirectoryCacheRepository, MetricsRepository } from './repository';

interface CacheStats {
  hits: number;
  misses: number;
}

/**
 * Walks an archive's root and leaf directories to find where a tile's bytes live.
 *
 * Each `findTile` records a `find_tile` metric with its cache hits and misses, then flushes the metrics providers.
 * Fetches and decodes are recorded as `fetch_directory` (with `bytes`) and `decode_directory` (with `entries`).
 */
export class DirectoryService {
  private inflight = new Map<string, Promise<Directory>>();

  constructor(
    private source: IStorageRepository,
    private cache: IDirectoryCacheRepository,
    private metrics: IMetricsRepository,
    private config: Pick<DirectoryConfig, 'maxDirectoryDepth' | 'strictDecode'>,
  ) {}

  async getDirectory(range: ByteRange, compression: Compression): Promise<Directory> {
    return this.lookupDirectory(range, compression, { hits: 0, misses: 0 });
  }

  /**
   * Resolve a tile id to its absolute byte range in the archive, or undefined if no tile is stored for it.
   */
  async findTile(tileId: number, layout: ArchiveLayout): Promise<ByteRange | undefined> {
    const metric = this.metrics.createMetric('find_tile');
    const stats: CacheStats = { hits: 0, misses: 0 };
    const getDirectory = (range: ByteRange) => this.lookupDirectory(range, layout.internalCompression, stats);

    try {
      return await this.descend(tileId, layout, getDirectory);
    } finally {
      metric.intField('cache_hits', stats.hits).intField('cache_misses', stats.misses).durationField('duration');
      this.metrics.push(metric);
      this.metrics.flush();
    }
  }

  private async descend(
    tileId: number,
    layout: ArchiveLayout,
    getDirectory: (range: ByteRange) => Promise<Directory>,
  ): Promise<ByteRange | undefined> {
    const { maxDirectoryDepth } = this.config;
    let directory = await getDirectory({ offset: layout.rootDirectoryOffset, length: layout.rootDirectoryLength });

    for (let depth = 1; depth <= maxDirectoryDepth; depth++) {
      const location = directory.resolveTile(tileId);
      if (!location) {
        return;
      }
      if (location.type === 'tile') {
        return { offset: layout.tileDataOffset + location.offset, length: location.length };
      }
      if (depth === maxDirectoryDepth) {
        break;
      }
      directory = await getDirectory({ offset: layout.leafDirectoryOffset + location.offset, length: location.length });
    }

    throw new Error(`Tile ${tileId} not resolved within ${maxDirectoryDepth} directory levels`);
  }

  /** Concurrent misses on one range share a single fetch and decode. */
  private async lookupDirectory(range: ByteRange, compression: Compression, stats: CacheStats): Promise<Directory> {
    const cacheKey = getDirectoryCacheKey(this.source.getArchiveKey(), range);
    const cached = this.cache.get(cacheKey);
    if (cached) {
      stats.hits++;
      return cached;
    }
    stats.misses++;

    let pending = this.inflight.get(cacheKey);
    if (!pending) {
      pending = this.loadDirectory(cacheKey, range, compression).finally(() => this.inflight.delete(cacheKey));
      this.inflight.set(cacheKey, pending);
    }
    return pending;
  }

  private async loadDirectory(cacheKey: string, range: ByteRange, compression: Compression): Promise<Directory> {
    const data = await this.metrics.monitorAsyncFunction(
      { name: 'fetch_directory' },
      (range: ByteRange) => this.source.getRange(range),
      { resultFields: (data) => ({ bytes: data.length }) },
    )(range);
    const directory = await this.metrics.monitorAsyncFunction(
      { name: 'decode_directory' },
      async (data: Uint8Array) => readDirectory(data, compression, { strict: this.config.strictDecode }),
      { resultFields: (directory) => ({ entries: directory.length }) },
    )(data);
    this.cache.set(cacheKey, directory);
    return directory;
  }
}

export function createDirectoryService(
  source: IStorageRepository,
  config: DirectoryConfig = loadConfig(),
): DirectoryService {
  const cache = new DirectoryCacheRepository(config.cacheMaxBytes);
  const metrics = new MetricsRepository(config.metricsPrefix, [new ConsoleMetricsProvider()], {
    archive: source.getArchiveKey(),
  });
  return new DirectoryService(source, cache, metrics, config);
}
