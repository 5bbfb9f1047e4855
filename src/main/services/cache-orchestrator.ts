/**
 * Cache orchestrator.
 * Per-resource read policy over the metadata store, blob cache and remote client:
 *   boards   fresh cache, else remote, else stale cache
 *   catalog  always remote, filtered, first thumbnails prefetched
 *   thread   fresh cache, else remote (cached, prefetched); never stale
 *   media    blob cache read-through
 * Every visit to a thread is recorded in the browsing history.
 */
import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { FetchStatus, type FetchResult } from '@shared/api';
import {
  NO_SUBJECT,
  THUMBNAIL_PREFETCH_LIMIT,
  type BoardInput,
  type BoardRecord,
  type CacheStatsReport,
  type CatalogThread,
  type HealthReport,
  type MaintenanceReport,
  type ThreadPayload,
} from '@shared/domain';
import { ErrorKind, fail, ok, type Result } from '@shared/errors';
import { APP_VERSION } from '@shared/file-format';
import type { RemoteBoard } from '@shared/zod-schemas';
import { createLogger, toError } from '../logger';
import type { BlobCache } from './blob-cache';
import { applyFilters, type FilterStore } from './filter-store';
import type { HistoryStore } from './history-store';
import type { MetadataStore } from './metadata-store';
import type { RemoteClient } from './remote-client';
import type { SettingsStore } from './settings-store';

const logger = createLogger('orchestrator');

const MEDIA_FILENAME = /^(\d+)(s?)\.([a-z0-9]{2,5})$/i;

/** A media filename split into the object it names */
export interface MediaRef {
  readonly objectId: string;
  /** Extension including the dot, e.g. ".png" */
  readonly ext: string;
  readonly isThumbnail: boolean;
}

/**
 * Parse "<tim>.<ext>" or "<tim>s.jpg". Returns null for anything else.
 */
export function parseMediaFilename(filename: string): MediaRef | null {
  const match = MEDIA_FILENAME.exec(filename);
  if (match === null) return null;
  const [, objectId = '', suffix = '', ext = ''] = match;
  const isThumbnail = suffix === 's';
  // Thumbnails only exist as JPEG
  if (isThumbnail && ext.toLowerCase() !== 'jpg') return null;
  return { objectId, ext: `.${ext}`, isThumbnail };
}

export function toBoardInput(remote: RemoteBoard): BoardInput {
  return {
    code: remote.board,
    title: remote.title,
    isWorksafe: remote.ws_board === 1,
  };
}

/** History title of a thread: the opening post's subject */
export function threadTitle(payload: ThreadPayload): string {
  return payload.posts[0]?.sub ?? NO_SUBJECT;
}

function remoteFailure<T>(
  result: FetchResult<unknown>,
  notFoundMessage: string,
  failedMessage: string,
): Result<T> {
  if (result.status === FetchStatus.NotFound) {
    return fail(ErrorKind.NotFound, notFoundMessage);
  }
  return fail(ErrorKind.TransientFailure, failedMessage);
}

async function exists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
    throw err;
  }
}

export interface CacheOrchestratorOptions {
  readonly store: MetadataStore;
  readonly blobs: BlobCache;
  readonly remote: RemoteClient;
  readonly history: HistoryStore;
  readonly filters: FilterStore;
  readonly settings: SettingsStore;
  /** User download area, outside the evictable cache */
  readonly downloadsDir: string;
  readonly cacheTtlMinutes: number;
  readonly maxCacheSizeMb: number;
  readonly cacheMaxAgeHours: number;
  readonly now?: (() => number) | undefined;
}

export class CacheOrchestrator {
  private readonly store: MetadataStore;
  private readonly blobs: BlobCache;
  private readonly remote: RemoteClient;
  private readonly history: HistoryStore;
  private readonly filters: FilterStore;
  private readonly settings: SettingsStore;
  private readonly downloadsDir: string;
  private readonly cacheTtlMinutes: number;
  private readonly maxCacheSizeMb: number;
  private readonly cacheMaxAgeHours: number;
  private readonly now: () => number;

  constructor(options: CacheOrchestratorOptions) {
    this.store = options.store;
    this.blobs = options.blobs;
    this.remote = options.remote;
    this.history = options.history;
    this.filters = options.filters;
    this.settings = options.settings;
    this.downloadsDir = options.downloadsDir;
    this.cacheTtlMinutes = options.cacheTtlMinutes;
    this.maxCacheSizeMb = options.maxCacheSizeMb;
    this.cacheMaxAgeHours = options.cacheMaxAgeHours;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run a filesystem operation, mapping a thrown error to a StorageFailure.
   */
  private async guardStorage<T>(operation: string, fn: () => Promise<T>): Promise<Result<T>> {
    try {
      return ok(await fn());
    } catch (err) {
      const error = toError(err);
      logger.error(`${operation} failed`, error);
      return fail(ErrorKind.StorageFailure, error.message, operation);
    }
  }

  private prefetchThumbnail(board: string, tim: number | undefined): void {
    if (tim === undefined) return;
    void this.blobs.getThumbnail(board, String(tim), true).catch((err: unknown) => {
      logger.warn(`Thumbnail prefetch failed for ${board}/${String(tim)}: ${toError(err).message}`);
    });
  }

  private async recordVisit(board: string, threadId: number, payload: ThreadPayload): Promise<void> {
    try {
      await this.history.addEntry(board, threadId, threadTitle(payload));
    } catch (err) {
      logger.warn(`Failed to record history for ${board}/${String(threadId)}: ${toError(err).message}`);
    }
  }

  // -------------------------------------------------------------------------
  // Metadata
  // -------------------------------------------------------------------------

  /**
   * Board list. A failed or empty refresh falls back to stale rows when there are any.
   */
  async getBoards(): Promise<Result<readonly BoardRecord[]>> {
    const cached = this.store.getCachedBoards();
    if (!cached.ok) return cached;
    if (cached.value !== null) {
      logger.info(`Returning ${String(cached.value.length)} cached boards`);
      return ok(cached.value);
    }

    const fetched = await this.remote.fetchBoards();
    if (fetched.status === FetchStatus.Ok && fetched.data.length > 0) {
      const inputs = fetched.data.map(toBoardInput);
      const written = this.store.cacheBoards(inputs);
      if (!written.ok) {
        logger.warn(`Serving ${String(inputs.length)} boards without caching them`);
      }
      const fetchedAt = this.now();
      return ok(inputs.map((b) => ({ ...b, fetchedAt })));
    }

    const stale = this.store.getCachedBoards(true);
    if (!stale.ok) return stale;
    if (stale.value !== null) {
      logger.warn(`Board refresh failed, returning ${String(stale.value.length)} stale boards`);
      return ok(stale.value);
    }
    if (fetched.status === FetchStatus.Ok) {
      return fail(ErrorKind.TransientFailure, 'Failed to fetch boards');
    }
    return remoteFailure(fetched, 'Boards not found', 'Failed to fetch boards');
  }

  /**
   * Live catalog with the board's filters applied. Thumbnails of the first threads are
   * fetched in the background.
   */
  async getCatalog(board: string): Promise<Result<readonly CatalogThread[]>> {
    const fetched = await this.remote.fetchCatalog(board);
    if (fetched.status !== FetchStatus.Ok) {
      return remoteFailure(fetched, 'Board not found', 'Failed to fetch catalog');
    }
    const visible = applyFilters(fetched.data, this.filters.getBoardFilters(board));
    for (const thread of visible.slice(0, THUMBNAIL_PREFETCH_LIMIT)) {
      this.prefetchThumbnail(board, thread.tim);
    }
    return ok(visible);
  }

  /**
   * Thread payload, fresh from cache or from the remote. Stale rows are never served.
   */
  async getThread(board: string, threadId: number): Promise<Result<ThreadPayload>> {
    const cached = this.store.getCachedThread(board, threadId);
    if (!cached.ok) return cached;
    if (cached.value !== null) {
      await this.recordVisit(board, threadId, cached.value);
      return ok(cached.value);
    }

    const fetched = await this.remote.fetchThread(board, threadId);
    if (fetched.status !== FetchStatus.Ok) {
      return remoteFailure(fetched, 'Thread not found', 'Failed to fetch thread');
    }
    const payload = fetched.data;
    for (const post of payload.posts) {
      this.prefetchThumbnail(board, post.tim);
    }
    const written = this.store.cacheThread(board, threadId, payload);
    if (!written.ok) {
      logger.warn(`Serving ${board}/${String(threadId)} without caching it`);
    }
    await this.recordVisit(board, threadId, payload);
    return ok(payload);
  }

  // -------------------------------------------------------------------------
  // Media
  // -------------------------------------------------------------------------

  /**
   * Local path of a thumbnail ("<tim>s.jpg") or full image ("<tim><ext>"), downloading on a miss.
   */
  async getMedia(board: string, filename: string): Promise<Result<string>> {
    const ref = parseMediaFilename(filename);
    if (ref === null) return fail(ErrorKind.NotFound, 'Image not found');
    const path = await this.guardStorage('getMedia', () =>
      ref.isThumbnail
        ? this.blobs.getThumbnail(board, ref.objectId)
        : this.blobs.getImage(board, ref.objectId, ref.ext),
    );
    if (!path.ok) return path;
    if (path.value === null) return fail(ErrorKind.NotFound, 'Image not found');
    return ok(path.value);
  }

  /**
   * Save a full image into the user download area. Requires the enableDownloadButton setting.
   */
  async downloadToUserArea(board: string, filename: string): Promise<Result<string>> {
    if (!this.settings.getSetting('enableDownloadButton')) {
      return fail(ErrorKind.FeatureDisabled, 'Downloads disabled');
    }
    const ref = parseMediaFilename(filename);
    if (ref === null) return fail(ErrorKind.NotFound, 'Image not found');

    const destPath = join(this.downloadsDir, board, filename);
    const present = await this.guardStorage('downloadToUserArea', () => exists(destPath));
    if (!present.ok) return present;
    if (present.value) return ok(destPath);

    const url = ref.isThumbnail
      ? this.remote.thumbnailUrl(board, ref.objectId)
      : this.remote.imageUrl(board, ref.objectId, ref.ext);
    if (!(await this.remote.downloadBinary(url, destPath))) {
      return fail(ErrorKind.TransientFailure, 'Download failed');
    }
    logger.info(`Saved ${board}/${filename} to downloads`);
    return ok(destPath);
  }

  // -------------------------------------------------------------------------
  // Administration
  // -------------------------------------------------------------------------

  async clearCache(): Promise<Result<void>> {
    const blobs = await this.guardStorage('clearCache', () => this.blobs.clearAll());
    if (!blobs.ok) return blobs;
    return this.store.clearAll();
  }

  async stats(): Promise<Result<CacheStatsReport>> {
    const cache = await this.guardStorage('stats', () => this.blobs.stats());
    if (!cache.ok) return cache;
    const database = this.store.stats();
    if (!database.ok) return database;
    return ok({
      cache: cache.value,
      database: database.value,
      cacheSizeMb: this.maxCacheSizeMb,
      cacheTtlMinutes: this.cacheTtlMinutes,
    });
  }

  /**
   * Expiry sweep: old blob files and thread snapshots past their TTL.
   */
  async runMaintenance(): Promise<Result<MaintenanceReport>> {
    const files = await this.guardStorage('runMaintenance', () =>
      this.blobs.cleanupExpired(this.cacheMaxAgeHours),
    );
    if (!files.ok) return files;
    const threads = this.store.cleanupExpired();
    if (!threads.ok) return threads;
    return ok({ expiredFiles: files.value, expiredThreads: threads.value });
  }

  async health(): Promise<HealthReport> {
    return {
      status: 'ok',
      version: APP_VERSION,
      cacheEnabled: true,
      apiReachable: await this.remote.checkHealth(),
    };
  }
}
