/**
 * Process configuration.
 * Built from environment variables by loadConfig (src/main/config.ts).
 */
import type { RequestTimeouts, RetryConfig } from './api';
import type { DiagLogLevel } from './diagnostic';

/** Remote endpoint roots */
export interface Endpoints {
  /** JSON API root (boards, catalogs, threads) */
  readonly apiBaseUrl: string;
  /** Media host root (full images and thumbnails) */
  readonly mediaBaseUrl: string;
}

export interface AppConfig {
  readonly dataDir: string;
  readonly cacheDir: string;
  readonly downloadsDir: string;
  readonly dbPath: string;
  readonly settingsPath: string;
  readonly historyPath: string;
  readonly filtersPath: string;
  readonly host: string;
  readonly port: number;
  /** Thread metadata TTL */
  readonly cacheTtlMinutes: number;
  /** Blob cache size limit */
  readonly maxCacheSizeMb: number;
  /** Age threshold for the blob expiry sweep */
  readonly cacheMaxAgeHours: number;
  readonly cleanupIntervalSeconds: number;
  readonly timeouts: RequestTimeouts;
  readonly retry: RetryConfig;
  readonly rateLimitIntervalMs: number;
  readonly endpoints: Endpoints;
  readonly proxyUrl?: string | undefined;
  readonly historyMaxEntries: number;
  /** Least severe level that is printed and buffered */
  readonly logLevel: DiagLogLevel;
}
