/**
 * Constants for local persistence and outbound requests.
 */

/** Application version reported by /api/health and the User-Agent */
export const APP_VERSION = '2.0.0' as const;

/** Default User-Agent for every outbound request */
export const DEFAULT_USER_AGENT = `Mozilla/5.0 (chanmirror/${APP_VERSION})` as const;

/** Blob cache subdirectory holding thumbnails: thumbs/<board>/<tim>s.jpg */
export const THUMBS_DIR_NAME = 'thumbs' as const;

/** Blob cache subdirectory holding full images: temp/<board>/<tim><ext> */
export const TEMP_DIR_NAME = 'temp' as const;

/** Suffix of in-flight downloads; such files are never cache entries */
export const PARTIAL_SUFFIX = '.part' as const;

/** Thumbnails are always JPEG, named "<tim>s.jpg" */
export const THUMBNAIL_SUFFIX = 's.jpg' as const;

/** Fraction of the size limit the LRU eviction shrinks the cache to */
export const EVICTION_TARGET_RATIO = 0.8 as const;

export const BYTES_PER_MB = 1024 * 1024;
