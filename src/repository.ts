import { open } from 'node:fs/promises';
import type {
  AsyncFn,
  IDirectoryCacheRepository,
  IMetricsProviderRepository,
  IMetricsRepository,
  IStorageRepository,
  Operation,
  Options,
} from './interface';
import { monitorAsyncFunction } from './monitor';
import type { Directory } from './pmtiles/directory';
import type { ByteRange } from './pmtiles/types';

/**
 * LRU cache of decoded directories, bounded by their approximate in-memory size.
 * Each directory is charged the size it had when stored, so the total stays exact if it grows later.
 */
export class DirectoryCacheRepository implements IDirectoryCacheRepository {
  private directories = new Map<string, { directory: Directory; size: number }>();
  private _sizeBytes = 0;

  constructor(private maxBytes: number) {}

  get sizeBytes() {
    return this._sizeBytes;
  }

  get size() {
    return this.directories.size;
  }

  set(key: string, directory: Directory): void {
    this.delete(key);
    const size = directory.getApproxByteSize();
    if (size > this.maxBytes) {
      console.log('Directory too large to cache', key, size);
      return;
    }
    this.directories.set(key, { directory, size });
    this._sizeBytes += size;

    // Map iteration order is insertion order, so the first key is the least recently used
    for (const [oldestKey] of this.directories) {
      if (this._sizeBytes <= this.maxBytes) {
        break;
      }
      this.delete(oldestKey);
    }
  }

  get(key: string): Directory | undefined {
    const cached = this.directories.get(key);
    if (!cached) {
      return;
    }
    this.directories.delete(key);
    this.directories.set(key, cached);
    return cached.directory;
  }

  private delete(key: string) {
    const existing = this.directories.get(key);
    if (existing) {
      this._sizeBytes -= existing.size;
      this.directories.delete(key);
    }
  }
}

export class MemoryStorageRepository implements IStorageRepository {
  constructor(
    private data: Uint8Array,
    private archiveKey: string,
  ) {}

  async getRange(range: ByteRange): Promise<Uint8Array> {
    if (range.offset < 0 || range.length < 0 || range.offset + range.length > this.data.length) {
      throw new Error('Range out of bounds ' + JSON.stringify(range));
    }
    return this.data.subarray(range.offset, range.offset + range.length);
  }

  getArchiveKey(): string {
    return this.archiveKey;
  }
}

export class FileStorageRepository implements IStorageRepository {
  constructor(
    private filePath: string,
    private archiveKey: string = filePath,
  ) {}

  async getRange(range: ByteRange): Promise<Uint8Array> {
    const handle = await open(this.filePath, 'r');
    try {
      const buffer = new Uint8Array(range.length);
      const { bytesRead } = await handle.read(buffer, 0, range.length, range.offset);
      if (bytesRead !== range.length) {
        throw new Error('Data not found for range ' + JSON.stringify(range));
      }
      return buffer;
    } finally {
      await handle.close();
    }
  }

  getArchiveKey(): string {
    return this.archiveKey;
  }
}

export class ConsoleMetricsProvider implements IMetricsProviderRepository {
  private _metrics: string[] = [];

  pushMetric(metric: Metric) {
    for (const [label, { value, type }] of metric.fields) {
      if (type === 'duration') {
        const suffix = label === 'duration' ? '' : `_${label.replace('_duration', '')}`;
        this._metrics.push(`${metric.name}${suffix};dur=${value}`);
      } else {
        this._metrics.push(`${metric.name}_${label}=${value}`);
      }
    }
  }

  get lines(): readonly string[] {
    return this._metrics;
  }

  flush() {
    if (this._metrics.length === 0) {
      return;
    }
    console.log(this._metrics.join(', '));
    this._metrics = [];
  }
}

/**
 * One measurement: int fields such as counts and byte sizes, and duration fields in milliseconds.
 */
export class Metric {
  private _tags = new Map<string, string>();
  private readonly startedAt = performance.now();
  private _fields = new Map<string, { value: number; type: 'duration' | 'int' }>();
  private constructor(private readonly _name: string) {}

  static create(name: string) {
    return new Metric(name);
  }

  get tags(): ReadonlyMap<string, string> {
    return this._tags;
  }

  get fields(): ReadonlyMap<string, { value: number; type: 'duration' | 'int' }> {
    return this._fields;
  }

  get name() {
    return this._name;
  }

  addTags(tags: { [key: string]: string }) {
    for (const [key, value] of Object.entries(tags)) {
      this._tags.set(key, value);
    }
    return this;
  }

  /** Without an explicit value, records the time since the metric was created. */
  durationField(key: string, duration = performance.now() - this.startedAt) {
    this._fields.set(key, { value: duration, type: 'duration' });
    return this;
  }

  intField(key: string, value: number) {
    this._fields.set(key, { value, type: 'int' });
    return this;
  }
}

/**
 * Names metrics under a common prefix with the default tags, and fans them out to every provider.
 */
export class MetricsRepository implements IMetricsRepository {
  constructor(
    private operationPrefix: string,
    private metricsProviders: IMetricsProviderRepository[],
    private readonly defaultTags: { [key: string]: string } = {},
  ) {}

  createMetric(name: string): Metric {
    return Metric.create(`${this.operationPrefix}_${name}`).addTags(this.defaultTags);
  }

  monitorAsyncFunction<T extends AsyncFn>(
    operation: Operation,
    call: T,
    options: Options<Awaited<ReturnType<T>>> = {},
  ): (...args: Parameters<T>) => Promise<Awaited<ReturnType<T>>> {
    return monitorAsyncFunction(
      operation,
      call,
      (name) => this.createMetric(name),
      (metric) => this.push(metric),
      options,
    );
  }

  push(metric: Metric) {
    for (const provider of this.metricsProviders) {
      provider.pushMetric(metric);
    }
  }

  flush() {
    for (const provider of this.metricsProviders) {
      provider.flush();
    }
  }
}
