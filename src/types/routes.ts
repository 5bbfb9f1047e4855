/**
 * HTTP API channel definitions.
 * Maps channel names to their parameter/result types.
 * Used by the route table and the handler implementations to keep both sides in step.
 */
import type { DiagLogEntry } from './diagnostic';
import type {
  BoardRecord,
  CacheStatsReport,
  CatalogThread,
  HealthReport,
  ThreadPayload,
} from './domain';
import type { ThreadFilter, ThreadFilterInput, ThreadFilterPatch } from './filter';
import type { HistoryEntry } from './history';
import type { UserSettings } from './settings';
import type { SettingsPatch } from './zod-schemas';

/** Acknowledgement body of state-changing routes */
export interface StatusReply {
  readonly status: 'saved' | 'cleared' | 'added' | 'updated' | 'removed' | 'imported';
}

export interface ApiChannelMap {
  'boards:list': {
    params: [];
    result: readonly BoardRecord[];
  };
  /** Live catalog with the board's filters applied */
  'catalog:get': {
    params: [board: string];
    result: readonly CatalogThread[];
  };
  'thread:get': {
    params: [board: string, threadId: number];
    result: ThreadPayload;
  };
  /** Local path of a cached thumbnail or full image */
  'media:get': {
    params: [board: string, filename: string];
    result: string;
  };
  /** Local path of a file saved into the user download area */
  'media:download': {
    params: [board: string, filename: string];
    result: string;
  };
  'settings:get': {
    params: [];
    result: UserSettings;
  };
  'settings:save': {
    params: [patch: SettingsPatch];
    result: StatusReply;
  };
  'history:get': {
    params: [];
    result: readonly HistoryEntry[];
  };
  'history:save': {
    params: [entries: readonly HistoryEntry[]];
    result: StatusReply;
  };
  'history:remove': {
    params: [board: string, threadId: number];
    result: StatusReply;
  };
  'history:clear': {
    params: [];
    result: StatusReply;
  };
  'filters:all': {
    params: [];
    result: Readonly<Record<string, readonly ThreadFilter[]>>;
  };
  'filters:import': {
    params: [data: Readonly<Record<string, readonly ThreadFilter[]>>];
    result: StatusReply;
  };
  'filters:get': {
    params: [board: string];
    result: readonly ThreadFilter[];
  };
  'filters:add': {
    params: [board: string, input: ThreadFilterInput];
    result: StatusReply & { readonly filter: ThreadFilter };
  };
  'filters:update': {
    params: [board: string, id: number, patch: ThreadFilterPatch];
    result: StatusReply;
  };
  'filters:remove': {
    params: [board: string, id: number];
    result: StatusReply;
  };
  'filters:clear': {
    params: [board: string];
    result: StatusReply;
  };
  'cache:clear': {
    params: [];
    result: StatusReply;
  };
  'cache:stats': {
    params: [];
    result: CacheStatsReport;
  };
  'app:health': {
    params: [];
    result: HealthReport;
  };
  'app:logs': {
    params: [];
    result: readonly DiagLogEntry[];
  };
}

export type ApiChannel = keyof ApiChannelMap;

/** How a route's result is written to the response */
export const ReplyKind = {
  Json: 'json',
  /** Result is a local file path, streamed inline */
  File: 'file',
  /** Result is a local file path, streamed as an attachment */
  Attachment: 'attachment',
} as const;
export type ReplyKind = (typeof ReplyKind)[keyof typeof ReplyKind];

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
