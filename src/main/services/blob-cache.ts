/**
 * Blob cache for thumbnails and full images on the local filesystem.
 *
 * Layout under the root:
 *   thumbs/<board>/<objectId>s.jpg
 *   temp/<board>/<objectId><ext>
 *
 * Access times live in memory only; files without a recorded access sort first for eviction.
 * Background fetches are deduplicated by destination path. Eviction, clearAll and the expiry
 * sweep run one at a time.
 */
import { existsSync, type Stats } from 'node:fs';
import { mkdir, readdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { BlobCacheStats } from '@shared/domain';
import {
  BYTES_PER_MB,
  EVICTION_TARGET_RATIO,
  PARTIAL_SUFFIX,
  TEMP_DIR_NAME,
  THUMBNAIL_SUFFIX,
  THUMBS_DIR_NAME,
} from '@shared/file-format';
import { createLogger, toError } from '../logger';

const logger = createLogger('blob-cache');

/** Where blobs come from; the remote client satisfies this */
export interface MediaSource {
  thumbnailUrl(board: string, objectId: string): string;
  imageUrl(board: string, objectId: string, ext: string): string;
  downloadBinary(url: string, destPath: string): Promise<boolean>;
}

export interface BlobCacheOptions {
  readonly rootDir: string;
  readonly maxSizeMb: number;
  readonly source: MediaSource;
  readonly now?: (() => number) | undefined;
}

interface CachedFile {
  readonly path: string;
  readonly size: number;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Every finished file below dir, recursively. In-flight ".part" files are skipped.
 */
async function listFiles(dir: string): Promise<CachedFile[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
  const files: CachedFile[] = [];
  for (const name of names) {
    const path = join(dir, name);
    let info: Stats;
    try {
      info = await stat(path);
    } catch (err) {
      // Removed between readdir and stat
      if (isNotFound(err)) continue;
      throw err;
    }
    if (info.isDirectory()) {
      files.push(...(await listFiles(path)));
    } else if (info.isFile() && !name.endsWith(PARTIAL_SUFFIX)) {
      files.push({ path, size: info.size });
    }
  }
  return files;
}

function roundMb(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MB) * 100) / 100;
}

export class BlobCache {
  readonly rootDir: string;
  readonly thumbsDir: string;
  readonly tempDir: string;
  private readonly maxSizeBytes: number;
  private readonly maxSizeMb: number;
  private readonly source: MediaSource;
  private readonly now: () => number;
  /** Last access per file path, epoch ms */
  private readonly accessTimes = new Map<string, number>();
  /** In-flight downloads keyed by destination path */
  private readonly pending = new Map<string, Promise<string | null>>();
  /** Serializes eviction, clearAll and the expiry sweep */
  private maintenanceTail: Promise<void> = Promise.resolve();

  constructor(options: BlobCacheOptions) {
    this.rootDir = options.rootDir;
    this.thumbsDir = join(options.rootDir, THUMBS_DIR_NAME);
    this.tempDir = join(options.rootDir, TEMP_DIR_NAME);
    this.maxSizeMb = options.maxSizeMb;
    this.maxSizeBytes = options.maxSizeMb * BYTES_PER_MB;
    this.source = options.source;
    this.now = options.now ?? Date.now;
  }

  async init(): Promise<void> {
    await mkdir(this.thumbsDir, { recursive: true });
    await mkdir(this.tempDir, { recursive: true });
  }

  thumbnailPath(board: string, objectId: string): string {
    return join(this.thumbsDir, board, `${objectId}${THUMBNAIL_SUFFIX}`);
  }

  imagePath(board: string, objectId: string, ext: string): string {
    return join(this.tempDir, board, `${objectId}${ext}`);
  }

  /**
   * Local path of a thumbnail, downloading it on a miss.
   * With background set, a miss schedules the download (once per path) and resolves null at once.
   */
  getThumbnail(board: string, objectId: string, background = false): Promise<string | null> {
    return this.fetchBlob(
      this.source.thumbnailUrl(board, objectId),
      this.thumbnailPath(board, objectId),
      background,
    );
  }

  /**
   * Local path of a full image, downloading it on a miss.
   */
  getImage(board: string, objectId: string, ext: string): Promise<string | null> {
    return this.fetchBlob(
      this.source.imageUrl(board, objectId, ext),
      this.imagePath(board, objectId, ext),
      false,
    );
  }

  /**
   * Resolve once no background download is in flight.
   */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending.values()]);
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private touch(path: string): void {
    this.accessTimes.set(path, this.now());
  }

  /**
   * The hit check is synchronous, so a background miss is registered as pending before
   * the caller regains control.
   */
  private fetchBlob(url: string, destPath: string, background: boolean): Promise<string | null> {
    if (existsSync(destPath)) {
      this.touch(destPath);
      return Promise.resolve(destPath);
    }
    const inFlight = this.pending.get(destPath);
    if (background) {
      if (inFlight === undefined) {
        void this.startDownload(url, destPath);
      }
      return Promise.resolve(null);
    }
    return inFlight ?? this.startDownload(url, destPath);
  }

  /**
   * Download into destPath and register the task as pending until it settles.
   */
  private startDownload(url: string, destPath: string): Promise<string | null> {
    const task = this.download(url, destPath).finally(() => {
      this.pending.delete(destPath);
    });
    this.pending.set(destPath, task);
    return task;
  }

  /** Never rejects */
  private async download(url: string, destPath: string): Promise<string | null> {
    try {
      const downloaded = await this.source.downloadBinary(url, destPath);
      if (!downloaded) return null;
      this.touch(destPath);
      await this.enforceSizeLimit();
      // A blob larger than the eviction target is gone again
      if (!existsSync(destPath)) {
        logger.warn(`${destPath} was evicted right after download`);
        return null;
      }
      return destPath;
    } catch (err) {
      logger.error(`Caching ${url} failed`, toError(err));
      return null;
    }
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.maintenanceTail.then(fn);
    this.maintenanceTail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /**
   * When the cache exceeds its limit, delete least recently accessed files until the total
   * is at most 80% of the limit. Resolves the number of files deleted.
   */
  enforceSizeLimit(): Promise<number> {
    return this.exclusive(async () => {
      const files = await listFiles(this.rootDir);
      let total = files.reduce((sum, f) => sum + f.size, 0);
      if (total <= this.maxSizeBytes) return 0;

      const target = this.maxSizeBytes * EVICTION_TARGET_RATIO;
      const ordered = [...files].sort((a, b) => {
        const diff = (this.accessTimes.get(a.path) ?? 0) - (this.accessTimes.get(b.path) ?? 0);
        if (diff !== 0) return diff;
        return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
      });

      let removed = 0;
      for (const file of ordered) {
        if (total <= target) break;
        try {
          await rm(file.path, { force: true });
          this.accessTimes.delete(file.path);
          total -= file.size;
          removed++;
        } catch (err) {
          logger.warn(`Failed to evict ${file.path}: ${toError(err).message}`);
        }
      }
      logger.info(
        `Evicted ${String(removed)} files, cache now ${String(roundMb(total))}MB of ${String(this.maxSizeMb)}MB`,
      );
      return removed;
    });
  }

  /**
   * Delete files whose recorded access is older than maxAgeHours. Files with no recorded
   * access count as accessed at epoch zero. Resolves the number of files deleted.
   */
  cleanupExpired(maxAgeHours = 24): Promise<number> {
    return this.exclusive(async () => {
      const cutoff = this.now() - maxAgeHours * 60 * 60 * 1000;
      const files = await listFiles(this.rootDir);
      let removed = 0;
      for (const file of files) {
        const lastUse = this.accessTimes.get(file.path) ?? 0;
        if (lastUse >= cutoff) continue;
        try {
          await rm(file.path, { force: true });
          this.accessTimes.delete(file.path);
          removed++;
        } catch (err) {
          logger.warn(`Failed to remove expired ${file.path}: ${toError(err).message}`);
        }
      }
      if (removed > 0) {
        logger.info(`Removed ${String(removed)} expired cache files`);
      }
      return removed;
    });
  }

  /**
   * Remove every cached file and recreate the empty layout.
   */
  clearAll(): Promise<void> {
    return this.exclusive(async () => {
      await rm(this.rootDir, { recursive: true, force: true });
      this.accessTimes.clear();
      await this.init();
      logger.info('Blob cache cleared');
    });
  }

  async stats(): Promise<BlobCacheStats> {
    const thumbs = await listFiles(this.thumbsDir);
    const images = await listFiles(this.tempDir);
    const totalBytes = [...thumbs, ...images].reduce((sum, f) => sum + f.size, 0);
    return {
      fileCount: thumbs.length + images.length,
      totalSizeMB: roundMb(totalBytes),
      thumbCount: thumbs.length,
      imageCount: images.length,
      maxSizeMb: this.maxSizeMb,
    };
  }
}
