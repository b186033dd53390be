/**
 * Subset of the v1.1 status payload the downloader reads.
 */
export interface RawTweet {
  id_str: string;
  created_at: string;
  full_text?: string;
  text?: string;
  user: {
    screen_name: string;
  };
  extended_entities?: {
    /** Checked one by one; malformed entries are dropped */
    media: unknown[];
  };
}

export interface RawMedia {
  type: string;
  media_url_https: string;
  sizes?: Record<string, RawMediaSize>;
  video_info?: {
    variants: RawVideoVariant[];
  };
}

export interface RawMediaSize {
  w: number;
  h: number;
  resize?: string;
}

export interface RawVideoVariant {
  url: string;
  content_type?: string;
  bitrate?: number;
}

export type QueryValue = string | number | boolean;

/**
 * Minimal surface the likes client needs from an authenticated HTTP client.
 * Implementations throw `LikedropError`s classified by `ErrorCode`.
 */
export interface TwitterTransport {
  get(endpoint: string, query: Record<string, QueryValue>): Promise<unknown>;
}
