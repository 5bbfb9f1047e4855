/**
 * Browsing history service.
 * Tracks recently viewed threads, most recent first, with a max entry limit.
 * Persisted to {DataDir}/history.json.
 */
import type { HistoryEntry } from '@shared/history';
import { DEFAULT_HISTORY_MAX_ENTRIES } from '@shared/history';
import { HistoryListSchema } from '@shared/zod-schemas';
import { createLogger } from '../logger';
import { atomicWriteFile, readFileSafeAsync, withFileLock } from './file-io';

const logger = createLogger('history');

export class HistoryStore {
  private readonly filePath: string;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private history: HistoryEntry[] = [];

  constructor(
    filePath: string,
    maxEntries: number = DEFAULT_HISTORY_MAX_ENTRIES,
    now: () => number = Date.now,
  ) {
    this.filePath = filePath;
    this.maxEntries = maxEntries;
    this.now = now;
  }

  /**
   * Load history from disk. A missing file is created empty; an unreadable one is logged
   * and treated as empty.
   */
  async load(): Promise<readonly HistoryEntry[]> {
    const content = await readFileSafeAsync(this.filePath);
    if (content === null) {
      this.history = [];
      await this.save();
      return this.history;
    }
    try {
      const parsed: unknown = JSON.parse(content.toString('utf-8'));
      const result = HistoryListSchema.safeParse(parsed);
      if (result.success) {
        this.history = result.data.slice(0, this.maxEntries);
      } else {
        logger.warn(`history.json has an unexpected shape, starting empty: ${result.error.message}`);
        this.history = [];
      }
    } catch (err) {
      logger.warn(
        `Failed to parse history.json, starting empty: ${err instanceof Error ? err.message : String(err)}`,
      );
      this.history = [];
    }
    logger.info(`Loaded ${String(this.history.length)} history entries`);
    return this.history;
  }

  private async save(): Promise<void> {
    const snapshot = JSON.stringify(this.history, null, 2);
    await withFileLock(this.filePath, () => atomicWriteFile(this.filePath, snapshot));
  }

  getHistory(): readonly HistoryEntry[] {
    return this.history;
  }

  /**
   * Add or update a history entry. Moves an existing entry for the same thread to the front.
   */
  async addEntry(board: string, threadId: number, title: string): Promise<readonly HistoryEntry[]> {
    const rest = this.history.filter((e) => !(e.board === board && e.threadId === threadId));
    this.history = [
      { board, threadId, title, visitedAt: new Date(this.now()).toISOString() },
      ...rest,
    ].slice(0, this.maxEntries);
    await this.save();
    return this.history;
  }

  /**
   * Remove the entry for one thread. Resolves false when there was none.
   */
  async removeEntry(board: string, threadId: number): Promise<boolean> {
    const before = this.history.length;
    this.history = this.history.filter((e) => !(e.board === board && e.threadId === threadId));
    if (this.history.length === before) return false;
    await this.save();
    return true;
  }

  /**
   * Replace the whole list (POST /api/history), keeping the first maxEntries.
   */
  async replaceHistory(entries: readonly HistoryEntry[]): Promise<readonly HistoryEntry[]> {
    this.history = entries.slice(0, this.maxEntries);
    await this.save();
    return this.history;
  }

  async clear(): Promise<void> {
    this.history = [];
    await this.save();
  }
}
