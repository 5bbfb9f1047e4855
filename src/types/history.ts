/**
 * Browsing history types.
 */

/** A visited thread, most recent first in the history list */
export interface HistoryEntry {
  readonly board: string;
  readonly threadId: number;
  readonly title: string;
  /** ISO 8601 timestamp of the visit */
  readonly visitedAt: string;
}

/** Default maximum browsing history entries */
export const DEFAULT_HISTORY_MAX_ENTRIES = 50 as const;
