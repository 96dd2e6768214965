import path from 'node:path';
import { z } from 'zod';
import {
  booleanVar,
  integerVar,
  loadEnvConfig,
  logLevelVar,
  stringVar,
  urlVar,
  type EnvSource,
  type LogLevel
} from '@dwdbulk/shared';

export const DEFAULT_BASE_URL = 'https://opendata.dwd.de/';
export const DEFAULT_USER_AGENT = 'dwdbulk/0.1.0';
export const DEFAULT_RECENT_WINDOW_DAYS = 500;
export const BUNDLED_STATION_LOOKUP_PATH = path.resolve(__dirname, '..', 'data', 'station_lookup.csv');

const CLIMATE_PATH = 'climate_environment/CDC/observations_germany/climate/';
const MOSMIX_S_PATH = 'weather/local_forecasts/mos/MOSMIX_S/all_stations/kml/';

const envSchema = z.object({
  DWDBULK_BASE_URL: urlVar({ defaultValue: DEFAULT_BASE_URL }),
  DWDBULK_DATA_DIR: stringVar({ defaultValue: 'data' }),
  DWDBULK_LOG_LEVEL: logLevelVar({ defaultValue: 'info' }),
  DWDBULK_FETCH_TIMEOUT_MS: integerVar({ min: 1 }),
  DWDBULK_USER_AGENT: stringVar({ defaultValue: DEFAULT_USER_AGENT }),
  DWDBULK_RECENT_WINDOW_DAYS: integerVar({ defaultValue: DEFAULT_RECENT_WINDOW_DAYS, min: 1 }),
  DWDBULK_PARTITION_BY_DATE: booleanVar({ defaultValue: true }),
  DWDBULK_STATION_LOOKUP_PATH: stringVar()
});

export interface PipelineConfig {
  baseUrl: string;
  climateRootUrl: string;
  mosmixListingUrl: string;
  dataDir: string;
  logLevel: LogLevel;
  fetchTimeoutMs: number | null;
  userAgent: string;
  recentWindowDays: number;
  partitionByDate: boolean;
  stationLookupPath: string;
}

let cachedConfig: PipelineConfig | null = null;

export function buildPipelineConfig(env: EnvSource = process.env): PipelineConfig {
  const parsed = loadEnvConfig(envSchema, { env, context: 'dwdbulk' });
  const baseUrl = parsed.DWDBULK_BASE_URL ?? DEFAULT_BASE_URL;
  return {
    baseUrl,
    climateRootUrl: new URL(CLIMATE_PATH, baseUrl).toString(),
    mosmixListingUrl: new URL(MOSMIX_S_PATH, baseUrl).toString(),
    dataDir: path.resolve(parsed.DWDBULK_DATA_DIR ?? 'data'),
    logLevel: parsed.DWDBULK_LOG_LEVEL,
    fetchTimeoutMs: parsed.DWDBULK_FETCH_TIMEOUT_MS ?? null,
    userAgent: parsed.DWDBULK_USER_AGENT ?? DEFAULT_USER_AGENT,
    recentWindowDays: parsed.DWDBULK_RECENT_WINDOW_DAYS ?? DEFAULT_RECENT_WINDOW_DAYS,
    partitionByDate: parsed.DWDBULK_PARTITION_BY_DATE ?? true,
    stationLookupPath: parsed.DWDBULK_STATION_LOOKUP_PATH
      ? path.resolve(parsed.DWDBULK_STATION_LOOKUP_PATH)
      : BUNDLED_STATION_LOOKUP_PATH
  };
}

export function loadPipelineConfig(): PipelineConfig {
  if (!cachedConfig) {
    cachedConfig = buildPipelineConfig();
  }
  return cachedConfig;
}

export function resetCachedPipelineConfig(): void {
  cachedConfig = null;
}
