/**
 * Configuration loader.
 * Reads environment variables (after dotenv has loaded .env) and validates them.
 */
import { join, resolve } from 'node:path';
import type { AppConfig } from '@shared/config';
import { EnvSchema } from '@shared/zod-schemas';

export function loadConfig(env: Readonly<Record<string, string | undefined>>): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid configuration: ${keys} (${result.error.message})`);
  }
  const e = result.data;
  const dataDir = resolve(e.DATA_DIR);

  return {
    dataDir,
    cacheDir: join(dataDir, 'cache'),
    downloadsDir: join(dataDir, 'downloads'),
    dbPath: join(dataDir, 'chan.db'),
    settingsPath: join(dataDir, 'settings.json'),
    historyPath: join(dataDir, 'history.json'),
    filtersPath: join(dataDir, 'filters.json'),
    host: e.HOST,
    port: e.PORT,
    cacheTtlMinutes: e.CACHE_TIME,
    maxCacheSizeMb: e.MAX_CACHE_SIZE,
    cacheMaxAgeHours: e.CACHE_MAX_AGE_HOURS,
    cleanupIntervalSeconds: e.CACHE_CLEANUP_INTERVAL,
    timeouts: {
      jsonMs: e.REQUEST_TIMEOUT,
      downloadMs: e.DOWNLOAD_TIMEOUT,
      healthMs: e.HEALTH_TIMEOUT,
    },
    retry: {
      maxAttempts: e.MAX_RETRIES,
      delayMs: e.RETRY_DELAY,
    },
    rateLimitIntervalMs: e.RATE_LIMIT_INTERVAL,
    endpoints: {
      apiBaseUrl: e.API_BASE_URL.replace(/\/+$/, ''),
      mediaBaseUrl: e.MEDIA_BASE_URL.replace(/\/+$/, ''),
    },
    proxyUrl: e.PROXY_URL,
    historyMaxEntries: e.HISTORY_MAX_ENTRIES,
    logLevel: e.LOG_LEVEL,
  };
}
