/**
 * Domain types for the imageboard mirror.
 * Hierarchy: Board > Catalog > Thread > Post (remote payload shapes live in zod-schemas).
 */
import type { CatalogThread, Post, ThreadPayload } from './zod-schemas';

export type { CatalogThread, Post, ThreadPayload };

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** A board as written by a board-list refresh */
export interface BoardInput {
  /** Board code (e.g. "g") */
  readonly code: string;
  readonly title: string;
  readonly isWorksafe: boolean;
}

/** A cached board row */
export interface BoardRecord extends BoardInput {
  /** Epoch ms of the refresh that wrote this row */
  readonly fetchedAt: number;
}

// ---------------------------------------------------------------------------
// Statistics
// ---------------------------------------------------------------------------

export interface MetadataStats {
  readonly boardCount: number;
  readonly threadCount: number;
  readonly totalReplies: number;
}

export interface BlobCacheStats {
  readonly fileCount: number;
  readonly totalSizeMB: number;
  readonly thumbCount: number;
  readonly imageCount: number;
  readonly maxSizeMb: number;
}

export interface CacheStatsReport {
  readonly cache: BlobCacheStats;
  readonly database: MetadataStats;
  readonly cacheSizeMb: number;
  readonly cacheTtlMinutes: number;
}

export interface MaintenanceReport {
  readonly expiredFiles: number;
  readonly expiredThreads: number;
}

export interface HealthReport {
  readonly status: 'ok';
  readonly version: string;
  readonly cacheEnabled: boolean;
  readonly apiReachable: boolean;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Board list freshness window */
export const BOARD_TTL_MS = 60 * 60 * 1000;

/** Catalog threads whose thumbnails are prefetched */
export const THUMBNAIL_PREFETCH_LIMIT = 20;

/** History title used when the opening post has no subject */
export const NO_SUBJECT = 'No Subject';
