// src/core/runtime.ts
import * as fs from 'fs/promises';
import { LikesClient } from './api/likes-client.js';
import { TwitterApiTransport } from './api/transport.js';
import { FileBlacklistStore } from './blacklist/index.js';
import type { AppConfig } from './config/app-config.js';
import { API_RETRY, DOWNLOAD_RETRY } from './config/constants.js';
import { MediaDownloader } from './download/downloader.js';
import { HttpMediaFetcher } from './download/fetcher.js';
import { ErrorCode, LikedropError, errorMessage } from './errors.js';
import { MysqlMediaLibrary, type MediaLibrary } from './library/index.js';
import { LikesPipeline } from './orchestrator.js';
import { RetryPolicy } from './retry/policy.js';

export interface PipelineSettings {
  organize: boolean;
}

export async function ensureDownloadDirectory(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
    const stats = await fs.stat(dir);
    if (!stats.isDirectory()) {
      throw new Error('not a directory');
    }
  } catch (error) {
    throw new LikedropError(
      ErrorCode.CONFIG_INVALID,
      `Download path ${dir} is not a usable directory: ${errorMessage(error)}`,
      false,
      'Set DOWNLOAD_PATH to a writable directory'
    );
  }
}

/**
 * Wires the production collaborators from a validated configuration.
 */
export async function createPipeline(config: AppConfig, settings: PipelineSettings): Promise<LikesPipeline> {
  await ensureDownloadDirectory(config.files.downloadPath);

  const client = new LikesClient(new TwitterApiTransport(config.credentials), {
    retryPolicy: new RetryPolicy(API_RETRY),
  });
  const downloader = new MediaDownloader(
    {
      downloadDirectory: config.files.downloadPath,
      organize: settings.organize,
      threshold: config.organize.createDirAfterFiles,
    },
    new HttpMediaFetcher(),
    new RetryPolicy(DOWNLOAD_RETRY)
  );

  return new LikesPipeline({
    client,
    blacklist: new FileBlacklistStore(config.files.blacklistFile),
    downloader,
  });
}

export function createMediaLibrary(config: AppConfig): MediaLibrary {
  const database = config.tagging.database;
  if (!database) {
    throw new LikedropError(
      ErrorCode.CONFIG_INVALID,
      'Media library database is not configured',
      false,
      'Set MEDIA_LIBRARY_DB_HOST, MEDIA_LIBRARY_DB_NAME and MEDIA_LIBRARY_DB_USER'
    );
  }
  return new MysqlMediaLibrary(database);
}
