/**
 * Component wiring.
 * Builds every long-lived component from the configuration and owns their lifecycle.
 */
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { AppConfig } from '@shared/config';
import { createLogger } from './logger';
import { createApiHandlers } from './api/handlers';
import { closeServer, createApiServer, listen } from './api/server';
import { BlobCache } from './services/blob-cache';
import { CacheOrchestrator } from './services/cache-orchestrator';
import { FilterStore } from './services/filter-store';
import { HistoryStore } from './services/history-store';
import type { HttpTransport } from './services/http-client';
import { MaintenanceScheduler } from './services/maintenance';
import { MetadataStore } from './services/metadata-store';
import { createProxyAgent } from './services/proxy-manager';
import { RateLimiter } from './services/rate-limiter';
import { RemoteClient } from './services/remote-client';
import { SettingsStore } from './services/settings-store';

const logger = createLogger('main');

export interface App {
  readonly config: AppConfig;
  readonly store: MetadataStore;
  readonly blobs: BlobCache;
  readonly remote: RemoteClient;
  readonly orchestrator: CacheOrchestrator;
  readonly settings: SettingsStore;
  readonly history: HistoryStore;
  readonly filters: FilterStore;
  readonly maintenance: MaintenanceScheduler;
  readonly server: Server;
  /** Bind the HTTP server to the configured host and port */
  start(): Promise<AddressInfo>;
  /** Stop the sweep, close the server and the database */
  shutdown(): Promise<void>;
}

export interface CreateAppOptions {
  /** Replaces the network transport (tests) */
  readonly transport?: HttpTransport | undefined;
}

/**
 * Construct, load and wire all components. Runs the startup expiry sweep before returning.
 */
export async function createApp(config: AppConfig, options: CreateAppOptions = {}): Promise<App> {
  const remote = new RemoteClient({
    endpoints: config.endpoints,
    retry: config.retry,
    timeouts: config.timeouts,
    limiter: new RateLimiter(config.rateLimitIntervalMs),
    transport: options.transport,
    agent: createProxyAgent(config.proxyUrl),
  });
  const store = new MetadataStore(config.dbPath, {
    threadTtlMs: config.cacheTtlMinutes * 60 * 1000,
  });
  const blobs = new BlobCache({
    rootDir: config.cacheDir,
    maxSizeMb: config.maxCacheSizeMb,
    source: remote,
  });
  const settings = new SettingsStore(config.settingsPath);
  const history = new HistoryStore(config.historyPath, config.historyMaxEntries);
  const filters = new FilterStore(config.filtersPath);

  await blobs.init();
  await settings.load();
  await history.load();
  await filters.load();

  const orchestrator = new CacheOrchestrator({
    store,
    blobs,
    remote,
    history,
    filters,
    settings,
    downloadsDir: config.downloadsDir,
    cacheTtlMinutes: config.cacheTtlMinutes,
    maxCacheSizeMb: config.maxCacheSizeMb,
    cacheMaxAgeHours: config.cacheMaxAgeHours,
  });

  const maintenance = new MaintenanceScheduler(() => orchestrator.runMaintenance());
  await maintenance.runOnce();

  const server = createApiServer(createApiHandlers({ orchestrator, settings, history, filters }));

  let stopped = false;

  return {
    config,
    store,
    blobs,
    remote,
    orchestrator,
    settings,
    history,
    filters,
    maintenance,
    server,
    async start() {
      const address = await listen(server, config.port, config.host);
      maintenance.start(config.cleanupIntervalSeconds);
      return address;
    },
    async shutdown() {
      if (stopped) return;
      stopped = true;
      maintenance.stop();
      if (server.listening) {
        await closeServer(server);
      }
      // Background downloads are detached; they only touch the blob directory
      if (blobs.pendingCount > 0) {
        logger.info(`Leaving ${String(blobs.pendingCount)} background downloads behind`);
      }
      store.close();
      logger.info('Shutdown complete');
    },
  };
}
