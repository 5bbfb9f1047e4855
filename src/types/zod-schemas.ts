/**
 * Zod schemas for runtime validation at I/O boundaries.
 */
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Remote API payloads (unknown fields are kept so cached payloads round-trip)
// ---------------------------------------------------------------------------

/** One entry of boards.json */
export const RemoteBoardSchema = z
  .object({
    board: z.string().min(1),
    title: z.string(),
    ws_board: z.number().int().optional(),
  })
  .passthrough();
export type RemoteBoard = z.infer<typeof RemoteBoardSchema>;

export const BoardsResponseSchema = z.object({
  boards: z.array(RemoteBoardSchema),
});

/** A post inside a thread, or the opening post of a catalog entry */
export const PostSchema = z
  .object({
    no: z.number().int().nonnegative(),
    resto: z.number().int().nonnegative().optional(),
    sub: z.string().optional(),
    com: z.string().optional(),
    /** Upload timestamp; names the media object on the image host */
    tim: z.number().int().nonnegative().optional(),
    ext: z.string().optional(),
  })
  .passthrough();
export type Post = z.infer<typeof PostSchema>;

/** {board}/thread/{id}.json */
export const ThreadPayloadSchema = z
  .object({
    posts: z.array(PostSchema),
  })
  .passthrough();
export type ThreadPayload = z.infer<typeof ThreadPayloadSchema>;

export const CatalogThreadSchema = PostSchema.extend({
  replies: z.number().int().nonnegative().optional(),
  images: z.number().int().nonnegative().optional(),
}).passthrough();
export type CatalogThread = z.infer<typeof CatalogThreadSchema>;

/** {board}/catalog.json: an array of pages */
export const CatalogResponseSchema = z.array(
  z
    .object({
      page: z.number().int(),
      threads: z.array(CatalogThreadSchema),
    })
    .passthrough(),
);

// ---------------------------------------------------------------------------
// Identifiers accepted from the front end
// ---------------------------------------------------------------------------

export const BoardCodeSchema = z.string().regex(/^[a-z0-9]{1,10}$/, 'Invalid board code');

/** Media filename: "<tim>.<ext>" or "<tim>s.jpg" for thumbnails */
export const MediaFilenameSchema = z
  .string()
  .regex(/^\d+s?\.[a-z0-9]{2,5}$/i, 'Invalid media filename');

// ---------------------------------------------------------------------------
// User settings
// ---------------------------------------------------------------------------

export const UserSettingsSchema = z.object({
  theme: z.enum(['dark', 'light']),
  autoRefresh: z.boolean(),
  refreshInterval: z.number().int().positive(),
  enableDownloadButton: z.boolean(),
  showStickyThreads: z.boolean(),
  maxThreadsPerPage: z.number().int().positive(),
  imageHoverPreview: z.boolean(),
  compactView: z.boolean(),
  quickBoards: z.array(BoardCodeSchema),
});

/** Stored settings may lack keys added later; they are filled from defaults */
export const StoredSettingsSchema = UserSettingsSchema.partial();

/** Updates from the front end: known keys only */
export const SettingsPatchSchema = UserSettingsSchema.partial().strict();
export type SettingsPatch = z.infer<typeof SettingsPatchSchema>;

// ---------------------------------------------------------------------------
// Thread filters
// ---------------------------------------------------------------------------

export const FilterScopeSchema = z.enum(['subject', 'comment', 'both']);

export const ThreadFilterSchema = z.object({
  id: z.number().int().nonnegative(),
  keyword: z.string(),
  scope: FilterScopeSchema,
  caseSensitive: z.boolean(),
  isRegex: z.boolean(),
  enabled: z.boolean(),
});

export const ThreadFilterInputSchema = z.object({
  keyword: z.string().min(1, 'Keyword must not be empty'),
  scope: FilterScopeSchema.optional(),
  caseSensitive: z.boolean().optional(),
  isRegex: z.boolean().optional(),
  enabled: z.boolean().optional(),
});

export const ThreadFilterPatchSchema = ThreadFilterSchema.omit({ id: true }).partial().strict();

export const FilterImportSchema = z.record(z.string(), z.array(ThreadFilterSchema));

export const FiltersFileSchema = z.object({
  version: z.literal(1),
  boards: FilterImportSchema,
  nextIds: z.record(z.string(), z.number().int().nonnegative()),
});

/** DELETE /api/filters/:board body */
export const FilterIdBodySchema = z.object({
  id: z.number().int().nonnegative(),
});

// ---------------------------------------------------------------------------
// Browsing history
// ---------------------------------------------------------------------------

export const HistoryEntrySchema = z.object({
  board: z.string().min(1),
  threadId: z.number().int().nonnegative(),
  title: z.string(),
  visitedAt: z.string(),
});

export const HistoryListSchema = z.array(HistoryEntrySchema);

// ---------------------------------------------------------------------------
// Process configuration (environment variables)
// ---------------------------------------------------------------------------

const emptyAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const positiveInt = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().nonnegative().default(fallback));

export const EnvSchema = z.object({
  DATA_DIR: z.preprocess(emptyAsUndefined, z.string().default('./data')),
  HOST: z.preprocess(emptyAsUndefined, z.string().default('127.0.0.1')),
  PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(0).max(65535).default(5000)),
  CACHE_TIME: positiveInt(10),
  MAX_CACHE_SIZE: positiveInt(500),
  CACHE_MAX_AGE_HOURS: positiveInt(24),
  CACHE_CLEANUP_INTERVAL: positiveInt(3600),
  REQUEST_TIMEOUT: positiveInt(10_000),
  DOWNLOAD_TIMEOUT: positiveInt(15_000),
  HEALTH_TIMEOUT: positiveInt(5_000),
  MAX_RETRIES: positiveInt(3),
  RETRY_DELAY: nonNegativeInt(1_000),
  RATE_LIMIT_INTERVAL: nonNegativeInt(1_000),
  API_BASE_URL: z.preprocess(emptyAsUndefined, z.string().url().default('https://a.4cdn.org')),
  MEDIA_BASE_URL: z.preprocess(emptyAsUndefined, z.string().url().default('https://i.4cdn.org')),
  PROXY_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  HISTORY_MAX_ENTRIES: positiveInt(50),
  LOG_LEVEL: z.preprocess(emptyAsUndefined, z.enum(['info', 'warn', 'error']).default('info')),
});
