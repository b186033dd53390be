// src/core/config/constants.ts
export const APP_NAME = 'likedrop';
export const DEFAULT_CONFIG_FILE = 'config.env';

export const DEFAULT_TIMEOUT = 30000; // 30 seconds

// The likes endpoint only ever exposes the most recent 200 likes.
export const MAX_LIKED_POSTS = 200;
export const LIKES_PAGE_SIZE = 200;
export const MAX_LIKES_PAGES = 5;
export const LOOKUP_BATCH_SIZE = 100;

export const RATE_LIMIT_PADDING_MS = 1000;
export const RATE_LIMIT_FALLBACK_MS = 15 * 60 * 1000;

export const API_RETRY = {
  maxAttempts: 3,
  backoffMs: [2000, 4000],
} as const;

export const DOWNLOAD_RETRY = {
  maxAttempts: 3,
  backoffMs: [1000, 2000, 4000],
} as const;

export const DEFAULT_BLACKLIST_FILE = 'blacklist.txt';
export const DEFAULT_TAGS_FILE = 'tags.json';
export const DEFAULT_CREATE_DIR_AFTER_FILES = 10;
export const DEFAULT_RECENT_ALBUM_SLUG = 'recent';
export const DEFAULT_RECENT_MEDIA_HOURS = 24;
export const DEFAULT_TAGGER_LABEL = 'likedrop-tagged';

export const STATUS_URL_PREFIX = 'https://twitter.com/i/web/status/';

export function statusUrl(postId: string): string {
  return `${STATUS_URL_PREFIX}${postId}`;
}
