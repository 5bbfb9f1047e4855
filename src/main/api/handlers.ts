/**
 * API handler implementations.
 * Connects front-end requests to the cache orchestrator and the user stores.
 */
import type { ApiChannel, ApiChannelMap, StatusReply } from '@shared/routes';
import { ErrorKind, fail, ok, type Result } from '@shared/errors';
import { createLogger, getLogBuffer, toError } from '../logger';
import type { CacheOrchestrator } from '../services/cache-orchestrator';
import type { FilterStore } from '../services/filter-store';
import type { HistoryStore } from '../services/history-store';
import type { SettingsStore } from '../services/settings-store';

const logger = createLogger('api');

const SAVED: StatusReply = { status: 'saved' };
const CLEARED: StatusReply = { status: 'cleared' };
const ADDED: StatusReply = { status: 'added' };
const UPDATED: StatusReply = { status: 'updated' };
const REMOVED: StatusReply = { status: 'removed' };
const IMPORTED: StatusReply = { status: 'imported' };

export type ApiHandler<K extends ApiChannel> = (
  ...args: ApiChannelMap[K]['params']
) => Promise<Result<ApiChannelMap[K]['result']>>;

export type ApiHandlers = { [K in ApiChannel]: ApiHandler<K> };

export interface ApiDependencies {
  readonly orchestrator: CacheOrchestrator;
  readonly settings: SettingsStore;
  readonly history: HistoryStore;
  readonly filters: FilterStore;
}

/**
 * Run a store write, mapping a thrown error to a StorageFailure.
 */
async function persist<T>(operation: string, fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (err) {
    const error = toError(err);
    logger.error(`${operation} failed`, error);
    return fail(ErrorKind.StorageFailure, error.message, operation);
  }
}

export function createApiHandlers(deps: ApiDependencies): ApiHandlers {
  const { orchestrator, settings, history, filters } = deps;

  return {
    'boards:list': () => orchestrator.getBoards(),
    'catalog:get': (board) => orchestrator.getCatalog(board),
    'thread:get': (board, threadId) => orchestrator.getThread(board, threadId),
    'media:get': (board, filename) => orchestrator.getMedia(board, filename),
    'media:download': (board, filename) => orchestrator.downloadToUserArea(board, filename),

    'settings:get': () => Promise.resolve(ok(settings.getSettings())),
    'settings:save': async (patch) => {
      const saved = await persist('settings:save', () => settings.saveSettings(patch));
      return saved.ok ? ok(SAVED) : saved;
    },

    'history:get': () => Promise.resolve(ok(history.getHistory())),
    'history:save': async (entries) => {
      const saved = await persist('history:save', () => history.replaceHistory(entries));
      return saved.ok ? ok(SAVED) : saved;
    },
    'history:remove': async (board, threadId) => {
      const removed = await persist('history:remove', () => history.removeEntry(board, threadId));
      if (!removed.ok) return removed;
      return removed.value
        ? ok(REMOVED)
        : fail(ErrorKind.NotFound, 'History entry not found');
    },
    'history:clear': async () => {
      const cleared = await persist('history:clear', () => history.clear());
      return cleared.ok ? ok(CLEARED) : cleared;
    },

    'filters:all': () => Promise.resolve(ok(filters.getAllFilters())),
    'filters:import': async (data) => {
      const imported = await persist('filters:import', () => filters.importFilters(data));
      return imported.ok ? ok(IMPORTED) : imported;
    },
    'filters:get': (board) => Promise.resolve(ok(filters.getBoardFilters(board))),
    'filters:add': async (board, input) => {
      const added = await persist('filters:add', () => filters.addFilter(board, input));
      return added.ok ? ok({ ...ADDED, filter: added.value }) : added;
    },
    'filters:update': async (board, id, patch) => {
      const updated = await persist('filters:update', () => filters.updateFilter(board, id, patch));
      if (!updated.ok) return updated;
      return updated.value ? ok(UPDATED) : fail(ErrorKind.NotFound, 'Filter not found');
    },
    'filters:remove': async (board, id) => {
      const removed = await persist('filters:remove', () => filters.removeFilter(board, id));
      if (!removed.ok) return removed;
      return removed.value ? ok(REMOVED) : fail(ErrorKind.NotFound, 'Filter not found');
    },
    'filters:clear': async (board) => {
      const cleared = await persist('filters:clear', () => filters.clearBoardFilters(board));
      return cleared.ok ? ok(CLEARED) : cleared;
    },

    'cache:clear': async () => {
      const cleared = await orchestrator.clearCache();
      return cleared.ok ? ok(CLEARED) : cleared;
    },
    'cache:stats': () => orchestrator.stats(),
    'app:health': async () => ok(await orchestrator.health()),
    'app:logs': () => Promise.resolve(ok(getLogBuffer())),
  };
}
