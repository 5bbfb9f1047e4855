/**
 * Metadata store.
 * Board directory and thread snapshots in an embedded SQLite database (better-sqlite3),
 * with last-write timestamps for freshness checks.
 *
 * better-sqlite3 is synchronous: each method runs to completion on the event loop before
 * any other store call starts, which serializes all access. Every method resolves to a
 * Result; database errors become StorageFailure, never an empty answer.
 */
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import {
  BOARD_TTL_MS,
  type BoardInput,
  type BoardRecord,
  type MetadataStats,
  type ThreadPayload,
} from '@shared/domain';
import { ErrorKind, fail, ok, type Result } from '@shared/errors';
import { ThreadPayloadSchema } from '@shared/zod-schemas';
import { createLogger, toError } from '../logger';

const logger = createLogger('metadata-store');

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS boards (
    code TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    is_worksafe INTEGER NOT NULL DEFAULT 0,
    fetched_at INTEGER NOT NULL
  );
  CREATE TABLE IF NOT EXISTS threads (
    board TEXT NOT NULL,
    thread_id INTEGER NOT NULL,
    payload TEXT NOT NULL,
    fetched_at INTEGER NOT NULL,
    reply_count INTEGER NOT NULL DEFAULT 0,
    PRIMARY KEY (board, thread_id)
  );
  CREATE INDEX IF NOT EXISTS idx_threads_fetched_at ON threads(fetched_at);
  CREATE INDEX IF NOT EXISTS idx_boards_fetched_at ON boards(fetched_at);
`;

interface BoardRow {
  readonly code: string;
  readonly title: string;
  readonly is_worksafe: number;
  readonly fetched_at: number;
}

interface ThreadRow {
  readonly payload: string;
  readonly fetched_at: number;
}

interface StatsRow {
  readonly board_count: number;
  readonly thread_count: number;
  readonly total_replies: number | null;
}

export interface MetadataStoreOptions {
  /** Thread freshness window */
  readonly threadTtlMs: number;
  /** Board list freshness window */
  readonly boardTtlMs?: number | undefined;
  readonly now?: (() => number) | undefined;
}

/** Replies = posts minus the opening post; an empty thread has none. */
export function countReplies(payload: ThreadPayload): number {
  return payload.posts.length > 0 ? payload.posts.length - 1 : 0;
}

export class MetadataStore {
  private readonly db: Database.Database;
  private readonly threadTtlMs: number;
  private readonly boardTtlMs: number;
  private readonly now: () => number;

  /**
   * Open (or create) the database file and its schema.
   * Use ":memory:" for a throwaway database.
   */
  constructor(dbPath: string, options: MetadataStoreOptions) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(SCHEMA);
    this.threadTtlMs = options.threadTtlMs;
    this.boardTtlMs = options.boardTtlMs ?? BOARD_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run one store operation, mapping any thrown error to a StorageFailure.
   */
  private run<T>(operation: string, fn: () => T): Result<T> {
    try {
      return ok(fn());
    } catch (err) {
      const error = toError(err);
      logger.error(`${operation} failed`, error);
      return fail(ErrorKind.StorageFailure, error.message, operation);
    }
  }

  private isFresh(fetchedAt: number, ttlMs: number): boolean {
    return this.now() - fetchedAt < ttlMs;
  }

  /**
   * Cached board list ordered by code, or null when empty or older than the board TTL.
   * ignoreExpiry serves stale rows; only used after a live refresh failed.
   */
  getCachedBoards(ignoreExpiry = false): Result<BoardRecord[] | null> {
    return this.run('getCachedBoards', () => {
      const rows = this.db
        .prepare<[], BoardRow>(
          'SELECT code, title, is_worksafe, fetched_at FROM boards ORDER BY code',
        )
        .all();
      const first = rows[0];
      if (first === undefined) return null;
      if (!ignoreExpiry && !this.isFresh(first.fetched_at, this.boardTtlMs)) return null;
      return rows.map((r) => ({
        code: r.code,
        title: r.title,
        isWorksafe: r.is_worksafe !== 0,
        fetchedAt: r.fetched_at,
      }));
    });
  }

  /**
   * Replace the whole board table in one transaction.
   */
  cacheBoards(boards: readonly BoardInput[]): Result<number> {
    return this.run('cacheBoards', () => {
      const fetchedAt = this.now();
      const insert = this.db.prepare<[string, string, number, number]>(
        'INSERT OR REPLACE INTO boards (code, title, is_worksafe, fetched_at) VALUES (?, ?, ?, ?)',
      );
      const replaceAll = this.db.transaction((items: readonly BoardInput[]) => {
        this.db.prepare('DELETE FROM boards').run();
        for (const board of items) {
          insert.run(board.code, board.title, board.isWorksafe ? 1 : 0, fetchedAt);
        }
      });
      replaceAll(boards);
      return boards.length;
    });
  }

  /**
   * Cached thread payload, or null when absent or older than the thread TTL.
   */
  getCachedThread(board: string, threadId: number): Result<ThreadPayload | null> {
    return this.run('getCachedThread', () => {
      const row = this.db
        .prepare<[string, number], ThreadRow>(
          'SELECT payload, fetched_at FROM threads WHERE board = ? AND thread_id = ?',
        )
        .get(board, threadId);
      if (row === undefined) return null;
      if (!this.isFresh(row.fetched_at, this.threadTtlMs)) return null;
      const decoded: unknown = JSON.parse(row.payload);
      return ThreadPayloadSchema.parse(decoded);
    });
  }

  /**
   * Insert or replace a thread snapshot; the reply count is computed here.
   */
  cacheThread(board: string, threadId: number, payload: ThreadPayload): Result<void> {
    return this.run('cacheThread', () => {
      this.db
        .prepare<[string, number, string, number, number]>(
          `INSERT OR REPLACE INTO threads (board, thread_id, payload, fetched_at, reply_count)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(board, threadId, JSON.stringify(payload), this.now(), countReplies(payload));
    });
  }

  clearAll(): Result<void> {
    return this.run('clearAll', () => {
      this.db.transaction(() => {
        this.db.prepare('DELETE FROM boards').run();
        this.db.prepare('DELETE FROM threads').run();
      })();
    });
  }

  /**
   * Delete thread snapshots older than the thread TTL. Returns the number removed.
   */
  cleanupExpired(): Result<number> {
    return this.run('cleanupExpired', () => {
      const cutoff = this.now() - this.threadTtlMs;
      const info = this.db
        .prepare<[number]>('DELETE FROM threads WHERE fetched_at < ?')
        .run(cutoff);
      return info.changes;
    });
  }

  stats(): Result<MetadataStats> {
    return this.run('stats', () => {
      const row = this.db
        .prepare<[], StatsRow>(
          `SELECT
             (SELECT COUNT(*) FROM boards) AS board_count,
             (SELECT COUNT(*) FROM threads) AS thread_count,
             (SELECT SUM(reply_count) FROM threads) AS total_replies`,
        )
        .get();
      return {
        boardCount: row?.board_count ?? 0,
        threadCount: row?.thread_count ?? 0,
        totalReplies: row?.total_replies ?? 0,
      };
    });
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
