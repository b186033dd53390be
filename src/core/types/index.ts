// src/core/types/index.ts
export type MediaKind = 'photo' | 'video' | 'animated_gif';

export interface PostStub {
  id: string;
  author: string;
}

export interface Post {
  id: string;
  author: string;
  publishedAt: string;
  text?: string;
  media: MediaDescriptor[];
}

/**
 * One attached asset with every rendition the service offers for it.
 */
export interface MediaDescriptor {
  kind: MediaKind;
  variants: MediaVariant[];
}

export interface MediaVariant {
  url: string;
  width?: number;
  height?: number;
  bitrate?: number;
  contentType?: string;
}

export interface ExtractedMedia {
  url: string;
  kind: MediaKind;
  /** Extension without the leading dot, e.g. `jpg` */
  extension: string;
  /** 1-based position of the asset within its post */
  index: number;
}

export interface DownloadedFile {
  postId: string;
  author: string;
  path: string;
}
