export interface DirectoryConfig {
  cacheMaxBytes: number;
  maxDirectoryDepth: number;
  strictDecode: boolean;
  metricsPrefix: string;
}

export const defaultConfig: DirectoryConfig = {
  cacheMaxBytes: 64 * 1024 * 1024,
  maxDirectoryDepth: 3,
  strictDecode: false,
  metricsPrefix: 'directory',
};

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid value for ${name}: ${value}`);
  }
  return parsed;
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  throw new Error(`Invalid value for ${name}: ${value}`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DirectoryConfig {
  const { DIRECTORY_CACHE_MAX_BYTES, DIRECTORY_MAX_DEPTH, DIRECTORY_STRICT_DECODE, METRICS_PREFIX } = env;
  return {
    cacheMaxBytes: parsePositiveInt('DIRECTORY_CACHE_MAX_BYTES', DIRECTORY_CACHE_MAX_BYTES, defaultConfig.cacheMaxBytes),
    maxDirectoryDepth: parsePositiveInt('DIRECTORY_MAX_DEPTH', DIRECTORY_MAX_DEPTH, defaultConfig.maxDirectoryDepth),
    strictDecode: parseBoolean('DIRECTORY_STRICT_DECODE', DIRECTORY_STRICT_DECODE, defaultConfig.strictDecode),
    metricsPrefix: METRICS_PREFIX || defaultConfig.metricsPrefix,
  };
}
