// src/core/api/tweet-parser.ts
import type { MediaDescriptor, MediaKind, MediaVariant, Post, PostStub } from '../types/index.js';
import type { RawMedia, RawTweet } from './types.js';

// Photo renditions the service serves through the `name` query parameter.
const PHOTO_SIZE_NAMES = ['thumb', 'small', 'medium', 'large'] as const;
const DEFAULT_PHOTO_SIZE = 'large';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isRawTweet(value: unknown): value is RawTweet {
  if (!isRecord(value)) return false;
  if (typeof value.id_str !== 'string' || typeof value.created_at !== 'string') return false;
  if (Number.isNaN(Date.parse(value.created_at))) return false;
  if (!isRecord(value.user) || typeof value.user.screen_name !== 'string') return false;

  const entities = value.extended_entities;
  if (entities === undefined) return true;
  return isRecord(entities) && Array.isArray(entities.media);
}

export function isRawMedia(value: unknown): value is RawMedia {
  if (!isRecord(value)) return false;
  if (typeof value.type !== 'string' || typeof value.media_url_https !== 'string') return false;

  const videoInfo = value.video_info;
  if (videoInfo === undefined) return true;
  return (
    isRecord(videoInfo) &&
    Array.isArray(videoInfo.variants) &&
    videoInfo.variants.every(v => isRecord(v) && typeof v.url === 'string')
  );
}

/**
 * Keeps the well-formed statuses of a response and reports how many were not.
 */
export function readTweets(payload: unknown): { tweets: RawTweet[]; rejected: number } {
  if (!Array.isArray(payload)) {
    return { tweets: [], rejected: 0 };
  }
  const tweets = payload.filter(isRawTweet);
  return { tweets, rejected: payload.length - tweets.length };
}

export function toPostStub(raw: RawTweet): PostStub {
  return { id: raw.id_str, author: raw.user.screen_name };
}

export function toPost(raw: RawTweet): Post {
  const media: MediaDescriptor[] = [];
  for (const item of raw.extended_entities?.media ?? []) {
    if (!isRawMedia(item)) continue;
    const descriptor = toMediaDescriptor(item);
    if (descriptor) media.push(descriptor);
  }

  return {
    id: raw.id_str,
    author: raw.user.screen_name,
    publishedAt: new Date(raw.created_at).toISOString(),
    text: raw.full_text ?? raw.text,
    media,
  };
}

function toMediaKind(type: string): MediaKind | undefined {
  if (type === 'photo' || type === 'video' || type === 'animated_gif') {
    return type;
  }
  return undefined;
}

export function toMediaDescriptor(raw: RawMedia): MediaDescriptor | undefined {
  const kind = toMediaKind(raw.type);
  if (!kind) return undefined;

  if (kind === 'photo') {
    return { kind, variants: photoVariants(raw) };
  }

  const variants: MediaVariant[] = (raw.video_info?.variants ?? []).map(v => ({
    url: v.url,
    contentType: v.content_type,
    bitrate: v.bitrate,
  }));
  return { kind, variants };
}

function photoVariants(raw: RawMedia): MediaVariant[] {
  const base = raw.media_url_https;
  const format = extensionOf(base) || 'jpg';
  const sizes = raw.sizes ?? {};

  const variants: MediaVariant[] = [];
  for (const name of PHOTO_SIZE_NAMES) {
    const size = sizes[name];
    if (!size) continue;
    variants.push({
      url: `${base}?format=${format}&name=${name}`,
      width: size.w,
      height: size.h,
    });
  }

  if (variants.length === 0) {
    variants.push({ url: `${base}?format=${format}&name=${DEFAULT_PHOTO_SIZE}` });
  }
  return variants;
}

/**
 * Extension of the URL's path without the dot, lower-cased; '' when none.
 */
export function extensionOf(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  const match = pathname.match(/\.([a-z0-9]{2,5})$/i);
  return match ? match[1].toLowerCase() : '';
}
