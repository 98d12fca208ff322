/**
 * Service configuration.
 *
 * All file paths, the source URL and the pipeline tuning knobs live here
 * and are passed into each component at construction. Values come from
 * the environment via loadConfig(), or from resolveConfig() overrides in
 * programmatic use and tests.
 */

import path from 'path';
import { LogLevel, parseLogLevel } from './logger';
import { TypedError, configError } from './domain/errors';

export const MRMS_REFLECTIVITY_URL =
  'https://mrms.ncep.noaa.gov/2D/ReflectivityAtLowestAltitude/MRMS_ReflectivityAtLowestAltitude.latest.grib2.gz';

export const MIN_FETCH_TIMEOUT_MS = 60_000;
export const MAX_FETCH_TIMEOUT_MS = 120_000;

export interface RadarConfig {
  port: number;
  /** Remote source of the compressed grid; also reported as metadata.source. */
  sourceUrl: string;
  /** Compressed artifact as downloaded. */
  rawFile: string;
  /** Decompressed grid; its mtime is the cache-freshness signal. */
  gridFile: string;
  /** JSON side-cache of the last payload. */
  payloadFile: string;
  maxAgeSeconds: number;
  /** Downsampling step along both grid axes. */
  stride: number;
  fetchAttempts: number;
  retryDelayMs: number;
  fetchTimeoutMs: number;
  /** Executable used by the default grid decoder. */
  wgrib2Path: string;
  logLevel: LogLevel;
}

/** Error raised when a configuration value cannot be used. */
export class ConfigError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'ConfigError';
  }
}

/** Defaults with every artifact placed under `dataDir`. */
export function defaultConfig(dataDir: string = process.cwd()): RadarConfig {
  return {
    port: 8000,
    sourceUrl: MRMS_REFLECTIVITY_URL,
    rawFile: path.join(dataDir, 'reflectivity.grib2.gz'),
    gridFile: path.join(dataDir, 'reflectivity.grib2'),
    payloadFile: path.join(dataDir, 'reflectivity.json'),
    maxAgeSeconds: 900,
    stride: 20,
    fetchAttempts: 3,
    retryDelayMs: 3_000,
    fetchTimeoutMs: MIN_FETCH_TIMEOUT_MS,
    wgrib2Path: 'wgrib2',
    logLevel: LogLevel.Info,
  };
}

/** Merge overrides with the defaults and validate the result. */
export function resolveConfig(overrides: Partial<RadarConfig> = {}, dataDir?: string): RadarConfig {
  const config = { ...defaultConfig(dataDir), ...overrides };
  validateConfig(config);
  return config;
}

function validateConfig(config: RadarConfig): void {
  requireInteger('stride', config.stride, 1);
  requireInteger('fetchAttempts', config.fetchAttempts, 1);
  requireInteger('retryDelayMs', config.retryDelayMs, 0);
  requireInteger('maxAgeSeconds', config.maxAgeSeconds, 0);
  if (config.port < 0 || config.port > 65_535 || !Number.isInteger(config.port)) {
    throw new ConfigError(configError('port', String(config.port), 'an integer between 0 and 65535'));
  }
  try {
    new URL(config.sourceUrl);
  } catch {
    throw new ConfigError(configError('sourceUrl', config.sourceUrl, 'an absolute URL'));
  }
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(configError(name, String(value), `an integer >= ${min}`));
  }
}

function parseInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, max?: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || (max !== undefined && value > max)) {
    const range = max !== undefined ? `an integer between ${min} and ${max}` : `an integer >= ${min}`;
    throw new ConfigError(configError(name, raw, range));
  }
  return value;
}

/** Build the configuration from environment variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RadarConfig {
  const dataDir = env.RADAR_DATA_DIR ? path.resolve(env.RADAR_DATA_DIR) : process.cwd();
  const defaults = defaultConfig(dataDir);

  let logLevel = defaults.logLevel;
  if (env.LOG_LEVEL) {
    const parsed = parseLogLevel(env.LOG_LEVEL);
    if (!parsed) {
      throw new ConfigError(configError('LOG_LEVEL', env.LOG_LEVEL, 'one of debug, info, warn, error'));
    }
    logLevel = parsed;
  }

  const sourceUrl = env.RADAR_SOURCE_URL ?? defaults.sourceUrl;
  try {
    new URL(sourceUrl);
  } catch {
    throw new ConfigError(configError('RADAR_SOURCE_URL', sourceUrl, 'an absolute URL'));
  }

  return {
    ...defaults,
    port: parseInteger(env, 'PORT', defaults.port, 0, 65_535),
    sourceUrl,
    maxAgeSeconds: parseInteger(env, 'RADAR_MAX_AGE_SECONDS', defaults.maxAgeSeconds, 0),
    stride: parseInteger(env, 'RADAR_STRIDE', defaults.stride, 1),
    fetchAttempts: parseInteger(env, 'RADAR_FETCH_ATTEMPTS', defaults.fetchAttempts, 1),
    retryDelayMs: parseInteger(env, 'RADAR_RETRY_DELAY_MS', defaults.retryDelayMs, 0),
    fetchTimeoutMs: parseInteger(
      env,
      'RADAR_FETCH_TIMEOUT_MS',
      defaults.fetchTimeoutMs,
      MIN_FETCH_TIMEOUT_MS,
      MAX_FETCH_TIMEOUT_MS,
    ),
    wgrib2Path: env.WGRIB2_PATH ?? defaults.wgrib2Path,
    logLevel,
  };
}
