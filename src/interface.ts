import type { Directory } from './pmtiles/directory';
import type { ByteRange } from './pmtiles/types';
import type { Metric } from './repository';

export interface IStorageRepository {
  getRange(range: ByteRange): Promise<Uint8Array>;
  getArchiveKey(): string;
}

export interface IDirectoryCacheRepository {
  set(key: string, directory: Directory): void;
  get(key: string): Directory | undefined;
}

export type AsyncFn = (...args: any[]) => Promise<any>;
export type Class = { new (...args: any[]): any };
export type Operation = { name: string; tags?: { [key: string]: string } };
export type Options<R = unknown> = {
  monitorInvocations?: boolean;
  acceptedErrors?: Class[];
  /** Int fields taken from a successful result, such as the size of a fetched range. */
  resultFields?: (result: R) => { [key: string]: number };
};

export interface IMetricsRepository {
  createMetric(name: string): Metric;
  monitorAsyncFunction<T extends AsyncFn>(
    operation: Operation,
    call: T,
    options?: Options<Awaited<ReturnType<T>>>,
  ): (...args: Parameters<T>) => Promise<Awaited<ReturnType<T>>>;
  push(metric: Metric): void;
  flush(): void;
}

export interface IMetricsProviderRepository {
  pushMetric(metric: Metric): void;
  flush(): void;
}
