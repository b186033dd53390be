// src/core/extract/media-extractor.ts
import { extensionOf } from '../api/tweet-parser.js';
import type { ExtractedMedia, MediaDescriptor, MediaVariant, Post } from '../types/index.js';

const DEFAULT_EXTENSION: Record<ExtractedMedia['kind'], string> = {
  photo: 'jpg',
  video: 'mp4',
  animated_gif: 'mp4',
};

/**
 * Largest rendition by pixel area; the first one wins a tie.
 */
export function selectPhotoVariant(variants: MediaVariant[]): MediaVariant | undefined {
  let best: MediaVariant | undefined;
  let bestArea = -1;
  for (const variant of variants) {
    const area = (variant.width ?? 0) * (variant.height ?? 0);
    if (area > bestArea) {
      best = variant;
      bestArea = area;
    }
  }
  return best;
}

/**
 * Highest positive bitrate. Streaming playlists carry no bitrate and only win
 * when nothing else is offered, in which case the first variant is used.
 */
export function selectVideoVariant(variants: MediaVariant[]): MediaVariant | undefined {
  let best: MediaVariant | undefined;
  for (const variant of variants) {
    if (!variant.bitrate || variant.bitrate <= 0) continue;
    if (!best || variant.bitrate > (best.bitrate ?? 0)) {
      best = variant;
    }
  }
  return best ?? variants[0];
}

export function selectVariant(descriptor: MediaDescriptor): MediaVariant | undefined {
  return descriptor.kind === 'photo'
    ? selectPhotoVariant(descriptor.variants)
    : selectVideoVariant(descriptor.variants);
}

/**
 * One entry per attached asset, in post order. An empty result means the
 * post has nothing to download, which is not an error.
 */
export function extractMedia(post: Post): ExtractedMedia[] {
  const extracted: ExtractedMedia[] = [];

  post.media.forEach((descriptor, position) => {
    const variant = selectVariant(descriptor);
    if (!variant) return;

    extracted.push({
      url: variant.url,
      kind: descriptor.kind,
      extension: extensionOf(variant.url) || DEFAULT_EXTENSION[descriptor.kind],
      index: position + 1,
    });
  });

  return extracted;
}
