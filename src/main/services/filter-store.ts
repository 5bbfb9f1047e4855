/**
 * Thread filter service.
 * Per-board keyword rules that hide catalog threads by subject and/or comment.
 * Persisted to {DataDir}/filters.json.
 */
import {
  FilterScope,
  type FilterableThread,
  type FiltersFile,
  type ThreadFilter,
  type ThreadFilterInput,
  type ThreadFilterPatch,
} from '@shared/filter';
import { FiltersFileSchema } from '@shared/zod-schemas';
import { createLogger } from '../logger';
import { atomicWriteFile, readFileSafeAsync, withFileLock } from './file-io';

const logger = createLogger('filters');

const BREAK_TAG = /<br\s*\/?>/gi;
const ANY_TAG = /<[^>]*>/g;

/** Comment markup reduced to plain text for matching */
export function stripHtml(html: string): string {
  return html.replace(BREAK_TAG, ' ').replace(ANY_TAG, '');
}

function textForScope(thread: FilterableThread, scope: FilterScope): string {
  const subject = thread.sub ?? '';
  const comment = stripHtml(thread.com ?? '');
  switch (scope) {
    case FilterScope.Subject:
      return subject;
    case FilterScope.Comment:
      return comment;
    case FilterScope.Both:
      return `${subject} ${comment}`;
  }
}

/**
 * Check if a thread matches a filter. Disabled filters and empty keywords never match;
 * an invalid regex is logged and treated as non-matching.
 */
export function matchesFilter(filter: ThreadFilter, thread: FilterableThread): boolean {
  if (!filter.enabled || filter.keyword.length === 0) return false;
  const text = textForScope(thread, filter.scope);
  if (filter.isRegex) {
    try {
      return new RegExp(filter.keyword, filter.caseSensitive ? '' : 'i').test(text);
    } catch {
      logger.warn(`Invalid regex pattern in filter ${String(filter.id)}: ${filter.keyword}`);
      return false;
    }
  }
  if (filter.caseSensitive) {
    return text.includes(filter.keyword);
  }
  return text.toLowerCase().includes(filter.keyword.toLowerCase());
}

/**
 * Drop every thread matched by at least one filter. Order is preserved.
 */
export function applyFilters<T extends FilterableThread>(
  threads: readonly T[],
  filters: readonly ThreadFilter[],
): T[] {
  if (filters.length === 0) return [...threads];
  return threads.filter((thread) => !filters.some((f) => matchesFilter(f, thread)));
}

function highestId(filters: readonly ThreadFilter[]): number {
  return filters.reduce((max, f) => Math.max(max, f.id), -1);
}

export class FilterStore {
  private readonly filePath: string;
  private boards: Record<string, ThreadFilter[]> = {};
  private nextIds: Record<string, number> = {};

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * Load filters from disk. Missing or unreadable files start empty.
   */
  async load(): Promise<void> {
    const content = await readFileSafeAsync(this.filePath);
    this.boards = {};
    this.nextIds = {};
    if (content === null) return;
    try {
      const parsed: unknown = JSON.parse(content.toString('utf-8'));
      const result = FiltersFileSchema.safeParse(parsed);
      if (!result.success) {
        logger.warn(`filters.json has an unexpected shape, starting empty: ${result.error.message}`);
        return;
      }
      this.boards = result.data.boards;
      this.nextIds = result.data.nextIds;
      // A counter must stay ahead of every stored id, whatever the file says
      for (const [board, filters] of Object.entries(this.boards)) {
        this.nextIds[board] = Math.max(this.nextIds[board] ?? 0, highestId(filters) + 1);
      }
    } catch (err) {
      logger.warn(
        `Failed to parse filters.json, starting empty: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    logger.info(`Loaded filters for ${String(Object.keys(this.boards).length)} boards`);
  }

  private async save(): Promise<void> {
    const file: FiltersFile = { version: 1, boards: this.boards, nextIds: this.nextIds };
    const snapshot = JSON.stringify(file, null, 2);
    await withFileLock(this.filePath, () => atomicWriteFile(this.filePath, snapshot));
  }

  getBoardFilters(board: string): readonly ThreadFilter[] {
    return this.boards[board] ?? [];
  }

  getAllFilters(): Readonly<Record<string, readonly ThreadFilter[]>> {
    return { ...this.boards };
  }

  /**
   * Add a filter. Its id comes from the board's counter and is never handed out again.
   */
  async addFilter(board: string, input: ThreadFilterInput): Promise<ThreadFilter> {
    const id = this.nextIds[board] ?? 0;
    const filter: ThreadFilter = {
      id,
      keyword: input.keyword,
      scope: input.scope ?? FilterScope.Subject,
      caseSensitive: input.caseSensitive ?? false,
      isRegex: input.isRegex ?? false,
      enabled: input.enabled ?? true,
    };
    this.boards[board] = [...(this.boards[board] ?? []), filter];
    this.nextIds[board] = id + 1;
    await this.save();
    return filter;
  }

  async updateFilter(board: string, id: number, patch: ThreadFilterPatch): Promise<boolean> {
    const filters = this.boards[board];
    const current = filters?.find((f) => f.id === id);
    if (filters === undefined || current === undefined) return false;
    const updated: ThreadFilter = {
      id,
      keyword: patch.keyword ?? current.keyword,
      scope: patch.scope ?? current.scope,
      caseSensitive: patch.caseSensitive ?? current.caseSensitive,
      isRegex: patch.isRegex ?? current.isRegex,
      enabled: patch.enabled ?? current.enabled,
    };
    this.boards[board] = filters.map((f) => (f.id === id ? updated : f));
    await this.save();
    return true;
  }

  async removeFilter(board: string, id: number): Promise<boolean> {
    const filters = this.boards[board];
    if (filters === undefined || !filters.some((f) => f.id === id)) return false;
    this.boards[board] = filters.filter((f) => f.id !== id);
    await this.save();
    return true;
  }

  /**
   * Remove every filter of a board. The id counter is kept.
   */
  async clearBoardFilters(board: string): Promise<boolean> {
    if (this.boards[board] === undefined) return false;
    delete this.boards[board];
    await this.save();
    return true;
  }

  /**
   * Replace all filters with imported ones; counters move past the highest imported id.
   */
  async importFilters(data: Readonly<Record<string, readonly ThreadFilter[]>>): Promise<void> {
    this.boards = {};
    for (const [board, filters] of Object.entries(data)) {
      this.boards[board] = [...filters];
      this.nextIds[board] = Math.max(this.nextIds[board] ?? 0, highestId(filters) + 1);
    }
    await this.save();
    logger.info(`Imported filters for ${String(Object.keys(data).length)} boards`);
  }
}
