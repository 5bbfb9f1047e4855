/**
 * Diagnostic log types.
 * Entries are kept in a ring buffer and served by GET /api/logs.
 */

/** Log severity level */
export const DiagLogLevel = {
  Info: 'info',
  Warn: 'warn',
  Error: 'error',
} as const;
export type DiagLogLevel = (typeof DiagLogLevel)[keyof typeof DiagLogLevel];

/** A single diagnostic log entry */
export interface DiagLogEntry {
  /** ISO 8601 timestamp */
  readonly timestamp: string;
  /** Log severity */
  readonly level: DiagLogLevel;
  /** Logger tag (e.g. "blob-cache", "http-client", "metadata-store") */
  readonly tag: string;
  /** Log message (sensitive values already masked) */
  readonly message: string;
}
