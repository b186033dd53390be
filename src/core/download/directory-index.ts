// src/core/download/directory-index.ts
import * as fs from 'fs/promises';
import { ErrorCode, LikedropError, errorMessage } from '../errors.js';
import { parseFilename } from './filename.js';

/**
 * Per-author view of the download directory: how many files sit flat in it
 * and which authors already have a subdirectory. Scanned once, then kept in
 * step with the files the downloader writes.
 */
export class DirectoryIndex {
  private flatCounts = new Map<string, number>();
  private subdirectories = new Set<string>();
  private scanned: boolean = false;

  constructor(private root: string) {}

  async ensureScanned(): Promise<void> {
    if (this.scanned) return;

    const entries = await fs.readdir(this.root, { withFileTypes: true }).catch((error: unknown) => {
      throw new LikedropError(
        ErrorCode.LOCAL_IO,
        `Failed to scan download directory ${this.root}: ${errorMessage(error)}`
      );
    });

    for (const entry of entries) {
      if (entry.isDirectory()) {
        this.subdirectories.add(entry.name);
        continue;
      }
      if (!entry.isFile()) continue;

      const parsed = parseFilename(entry.name);
      if (parsed) {
        this.recordFlatFile(parsed.author);
      }
    }
    this.scanned = true;
  }

  flatCount(author: string): number {
    return this.flatCounts.get(author) ?? 0;
  }

  hasSubdirectory(author: string): boolean {
    return this.subdirectories.has(author);
  }

  recordFlatFile(author: string): void {
    this.flatCounts.set(author, this.flatCount(author) + 1);
  }

  recordSubdirectory(author: string): void {
    this.subdirectories.add(author);
  }
}
