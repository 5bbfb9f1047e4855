/**
 * User settings types.
 * Persisted in {DataDir}/settings.json.
 */

export const Theme = {
  Dark: 'dark',
  Light: 'light',
} as const;
export type Theme = (typeof Theme)[keyof typeof Theme];

export interface UserSettings {
  readonly theme: Theme;
  readonly autoRefresh: boolean;
  /** Auto refresh interval in seconds */
  readonly refreshInterval: number;
  /** Gates manual full-image downloads into the user downloads area */
  readonly enableDownloadButton: boolean;
  readonly showStickyThreads: boolean;
  readonly maxThreadsPerPage: number;
  readonly imageHoverPreview: boolean;
  readonly compactView: boolean;
  readonly quickBoards: readonly string[];
}

export const DEFAULT_SETTINGS: UserSettings = {
  theme: Theme.Dark,
  autoRefresh: false,
  refreshInterval: 60,
  enableDownloadButton: false,
  showStickyThreads: true,
  maxThreadsPerPage: 50,
  imageHoverPreview: true,
  compactView: false,
  quickBoards: ['g', 'pol', 'v', 'tv', 'b', 'x'],
} as const;
