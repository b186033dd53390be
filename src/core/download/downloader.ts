// src/core/download/downloader.ts
import * as fs from 'fs/promises';
import { join } from 'path';
import { ErrorCode, LikedropError, errorMessage, hasErrnoCode, isLikedropError } from '../errors.js';
import { createAppLogger, type AppLogger } from '../logger.js';
import { RetryExhaustedError, type RetryPolicy } from '../retry/policy.js';
import { DirectoryIndex } from './directory-index.js';
import type { MediaFetcher } from './fetcher.js';

export interface DownloadRequest {
  url: string;
  filename: string;
  author: string;
}

/**
 * Outcome of a single media download.
 *
 * @example
 * { status: 'downloaded', path: '/media/nasa/nasa_2024-03-09_1766239002373984256_1.jpg', attempts: 1 }
 *
 * @example
 * { status: 'failed', path: '/media/nasa_2024-03-09_1766239002373984256_2.mp4', attempts: 3, error: 'HTTP 503 for https://...' }
 */
export interface DownloadOutcome {
  status: 'downloaded' | 'skipped_exists' | 'failed';
  /** Where the file is (or would have been) on disk */
  path: string;
  /** Fetch attempts made; 0 when the file was already present */
  attempts: number;
  error?: string;
}

export interface Downloader {
  download(request: DownloadRequest): Promise<DownloadOutcome>;
}

export interface DownloaderOptions {
  downloadDirectory: string;
  organize: boolean;
  /** Flat files per author, counting the next one, that move new files into a subdirectory */
  threshold: number;
}

/**
 * Files already on disk are never fetched again. In organize mode an
 * author's new files go into `<downloadDirectory>/<author>/` once the
 * threshold is reached; files already placed flat stay where they are.
 */
export class MediaDownloader implements Downloader {
  private index: DirectoryIndex;
  private logger: AppLogger;

  constructor(
    private options: DownloaderOptions,
    private fetcher: MediaFetcher,
    private retryPolicy: RetryPolicy,
    logger?: AppLogger
  ) {
    this.index = new DirectoryIndex(options.downloadDirectory);
    this.logger = logger ?? createAppLogger('download');
  }

  async download(request: DownloadRequest): Promise<DownloadOutcome> {
    await this.index.ensureScanned();

    const flatPath = join(this.options.downloadDirectory, request.filename);
    const authorDir = join(this.options.downloadDirectory, request.author);
    const nestedPath = join(authorDir, request.filename);

    for (const candidate of [nestedPath, flatPath]) {
      if (await this.isOnDisk(candidate)) {
        this.logger.debug(`File ${request.filename} already on disk`, { path: candidate });
        return { status: 'skipped_exists', path: candidate, attempts: 0 };
      }
    }

    const useSubdirectory = this.shouldUseSubdirectory(request.author);
    const target = useSubdirectory ? nestedPath : flatPath;

    let content: Buffer;
    let attempts: number;
    try {
      const result = await this.retryPolicy.run(() => this.fetcher.fetch(request.url), {
        shouldRetry: error => isLikedropError(error) && error.retryable,
        onRetry: (attempt, delay, error) => {
          this.logger.warn(`Download of ${request.filename} failed (attempt ${attempt}), retrying in ${delay}ms`, {
            url: request.url,
            error: errorMessage(error),
          });
        },
      });
      content = result.value;
      attempts = result.attempts;
    } catch (error) {
      const failedAttempts = error instanceof RetryExhaustedError ? error.attempts : 1;
      const reason = errorMessage(error);
      this.logger.error(`Failed to download ${request.filename}`, { url: request.url, error: reason });
      return { status: 'failed', path: target, attempts: failedAttempts, error: reason };
    }

    if (useSubdirectory && !this.index.hasSubdirectory(request.author)) {
      await this.createSubdirectory(authorDir);
      this.index.recordSubdirectory(request.author);
    }

    await this.writeToDisk(target, content);
    if (!useSubdirectory) {
      this.index.recordFlatFile(request.author);
    }

    this.logger.info(`Downloaded ${request.filename}`);
    this.logger.debug(`Written ${content.length} bytes`, { path: target });
    return { status: 'downloaded', path: target, attempts };
  }

  private shouldUseSubdirectory(author: string): boolean {
    if (!this.options.organize) return false;
    if (this.index.hasSubdirectory(author)) return true;
    return this.index.flatCount(author) + 1 >= this.options.threshold;
  }

  // A zero-byte file is a leftover of an interrupted download.
  private async isOnDisk(filepath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filepath);
      if (!stats.isFile()) return false;
      if (stats.size > 0) return true;
      this.logger.warn(`File ${filepath} is on disk but has size 0, downloading again`);
      return false;
    } catch (error) {
      if (hasErrnoCode(error, 'ENOENT') || hasErrnoCode(error, 'ENOTDIR')) return false;
      throw new LikedropError(ErrorCode.LOCAL_IO, `Failed to inspect ${filepath}: ${errorMessage(error)}`);
    }
  }

  private async createSubdirectory(dir: string): Promise<void> {
    try {
      await fs.mkdir(dir, { recursive: true });
      this.logger.info(`Created directory ${dir}`);
    } catch (error) {
      throw new LikedropError(ErrorCode.LOCAL_IO, `Failed to create directory ${dir}: ${errorMessage(error)}`);
    }
  }

  private async writeToDisk(filepath: string, content: Buffer): Promise<void> {
    const partPath = `${filepath}.part`;
    try {
      await fs.writeFile(partPath, content);
      await fs.rename(partPath, filepath);
    } catch (error) {
      await fs.rm(partPath, { force: true });
      throw new LikedropError(
        ErrorCode.LOCAL_IO,
        `Failed to write file ${filepath} to disk: ${errorMessage(error)}`,
        false,
        'Check free disk space and permissions on the download directory'
      );
    }
  }
}
