// src/core/download/filename.ts
import type { ExtractedMedia, Post } from '../types/index.js';

// {author}_{YYYY-MM-DD}_{postId}_{index}.{extension}
const FILENAME_PATTERN = /^(?<author>\w+)_(?<date>\d{4}-\d{2}-\d{2})_(?<postId>\d+)_(?<index>\d+)\.(?<extension>\w+)$/;

export interface ParsedFilename {
  author: string;
  date: string;
  postId: string;
  index: number;
  extension: string;
}

/**
 * @example
 * buildFilename(post, media) // 'nasa_2024-03-09_1766239002373984256_1.jpg'
 */
export function buildFilename(post: Post, media: ExtractedMedia): string {
  const date = post.publishedAt.slice(0, 10);
  return `${post.author}_${date}_${post.id}_${media.index}.${media.extension}`;
}

export function parseFilename(filename: string): ParsedFilename | undefined {
  const groups = FILENAME_PATTERN.exec(filename)?.groups;
  if (!groups) return undefined;

  return {
    author: groups.author,
    date: groups.date,
    postId: groups.postId,
    index: Number(groups.index),
    extension: groups.extension,
  };
}
