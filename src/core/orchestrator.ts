// src/core/orchestrator.ts
import type { LikesApi } from './api/likes-client.js';
import type { BlacklistStore } from './blacklist/index.js';
import { LOOKUP_BATCH_SIZE, MAX_LIKED_POSTS, statusUrl } from './config/constants.js';
import { buildFilename } from './download/filename.js';
import type { Downloader } from './download/downloader.js';
import { errorMessage, isFatal } from './errors.js';
import { extractMedia } from './extract/media-extractor.js';
import { createAppLogger, type AppLogger } from './logger.js';
import type { DownloadedFile, Post } from './types/index.js';

export type PipelineStage =
  | 'FETCH_LIKES'
  | 'FILTER_BLACKLIST'
  | 'LOOKUP_DETAILS'
  | 'EXTRACT_MEDIA'
  | 'DOWNLOAD_EACH'
  | 'UPDATE_BLACKLIST'
  | 'DONE';

export interface RunOptions {
  /** Skip posts already in the blacklist (outcomes are recorded either way) */
  useBlacklist: boolean;
  count?: number;
  /** Drop blacklisted ids that no longer appear among the fetched likes (full listings only) */
  pruneExpired?: boolean;
}

export interface RunSummary {
  fetched: number;
  filtered: number;
  lookedUp: number;
  missing: number;
  noMedia: number;
  downloaded: number;
  skipped: number;
  failed: number;
  blacklisted: number;
  expired: number;
  failedBatches: number;
  files: DownloadedFile[];
}

export interface PostResult {
  post: Post;
  mediaCount: number;
  downloaded: number;
  skipped: number;
  failed: number;
  files: DownloadedFile[];
}

/** Outcome of a single-post download; an unknown id is reported, not thrown */
export type PostDownload = ({ found: true } & PostResult) | { found: false; postId: string };

export function emptySummary(): RunSummary {
  return {
    fetched: 0,
    filtered: 0,
    lookedUp: 0,
    missing: 0,
    noMedia: 0,
    downloaded: 0,
    skipped: 0,
    failed: 0,
    blacklisted: 0,
    expired: 0,
    failedBatches: 0,
    files: [],
  };
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export interface PipelineDeps {
  client: LikesApi;
  blacklist: BlacklistStore;
  downloader: Downloader;
  logger?: AppLogger;
}

export class LikesPipeline {
  private client: LikesApi;
  private blacklist: BlacklistStore;
  private downloader: Downloader;
  private logger: AppLogger;
  private stage: PipelineStage = 'DONE';

  constructor(deps: PipelineDeps) {
    this.client = deps.client;
    this.blacklist = deps.blacklist;
    this.downloader = deps.downloader;
    this.logger = deps.logger ?? createAppLogger('pipeline');
  }

  get currentStage(): PipelineStage {
    return this.stage;
  }

  /**
   * Fetch likes, drop blacklisted ones, look the rest up in batches and
   * download their media. The blacklist is saved after every batch.
   */
  async run(options: RunOptions): Promise<RunSummary> {
    const summary = emptySummary();

    this.enter('FETCH_LIKES');
    const stubs = await this.client.listLiked(options.count ?? MAX_LIKED_POSTS);
    summary.fetched = stubs.length;

    this.enter('FILTER_BLACKLIST');
    await this.blacklist.load();
    const pending = options.useBlacklist
      ? stubs.filter(stub => {
          if (!this.blacklist.contains(stub.id)) return true;
          this.logger.debug(`Removing blacklisted post ${stub.id}`, { postId: stub.id });
          return false;
        })
      : stubs;
    summary.filtered = stubs.length - pending.length;
    this.logger.info(`${pending.length} of ${stubs.length} liked posts left after filtering`);

    for (const batch of chunk(pending.map(stub => stub.id), LOOKUP_BATCH_SIZE)) {
      this.enter('LOOKUP_DETAILS');
      let posts: Map<string, Post>;
      try {
        posts = await this.client.lookup(batch);
      } catch (error) {
        if (isFatal(error)) throw error;
        summary.failedBatches++;
        this.logger.error(`Skipping lookup batch of ${batch.length} posts`, { error: errorMessage(error) });
        continue;
      }
      summary.lookedUp += posts.size;

      for (const id of batch) {
        const post = posts.get(id);
        if (!post) {
          summary.missing++;
          this.logger.debug(`Post ${statusUrl(id)} is no longer available`, { postId: id });
          continue;
        }

        const result = await this.processPost(post);
        this.tally(summary, result);
        if (this.recordOutcome(result)) {
          summary.blacklisted++;
        }
      }

      this.enter('UPDATE_BLACKLIST');
      await this.blacklist.save();
    }

    this.enter('UPDATE_BLACKLIST');
    // Only a listing of the whole window tells which likes are gone.
    const coversWindow = (options.count ?? MAX_LIKED_POSTS) >= MAX_LIKED_POSTS;
    if ((options.pruneExpired ?? true) && coversWindow) {
      summary.expired = this.pruneExpired(new Set(stubs.map(stub => stub.id)));
    }
    await this.blacklist.save();

    this.enter('DONE');
    this.logger.info(
      `Downloaded ${summary.downloaded} media files from ${summary.lookedUp} of ${summary.fetched} liked posts`
    );
    return summary;
  }

  /**
   * Download one post's media by id. The blacklist is neither consulted nor
   * updated.
   */
  async downloadPost(postId: string): Promise<PostDownload> {
    this.enter('LOOKUP_DETAILS');
    const posts = await this.client.lookup([postId]);
    const post = posts.get(postId);
    if (!post) {
      this.logger.error(`Unable to find post ${statusUrl(postId)}`, { postId });
      this.enter('DONE');
      return { found: false, postId };
    }

    const result = await this.processPost(post);
    this.enter('DONE');
    return { found: true, ...result };
  }

  private async processPost(post: Post): Promise<PostResult> {
    this.enter('EXTRACT_MEDIA');
    this.logger.debug(`Processing post ${statusUrl(post.id)}`, { postId: post.id, author: post.author });

    const result: PostResult = { post, mediaCount: 0, downloaded: 0, skipped: 0, failed: 0, files: [] };
    const media = extractMedia(post);
    result.mediaCount = media.length;

    if (media.length === 0) {
      const text = post.text ? ` - [${post.author}] ${post.text.replace(/\n/g, ' ')}` : '';
      this.logger.warn(`Unable to detect media for post ${statusUrl(post.id)}${text}`);
      return result;
    }

    this.enter('DOWNLOAD_EACH');
    for (const item of media) {
      const filename = buildFilename(post, item);
      const outcome = await this.downloader.download({ url: item.url, filename, author: post.author });

      switch (outcome.status) {
        case 'downloaded':
          result.downloaded++;
          result.files.push({ postId: post.id, author: post.author, path: outcome.path });
          break;
        case 'skipped_exists':
          result.skipped++;
          break;
        case 'failed':
          result.failed++;
          break;
      }
    }

    this.logger.debug(
      `Post ${post.id}: ${result.downloaded} downloaded, ${result.skipped} already on disk, ${result.failed} failed`,
      { postId: post.id }
    );
    return result;
  }

  private tally(summary: RunSummary, result: PostResult): void {
    if (result.mediaCount === 0) summary.noMedia++;
    summary.downloaded += result.downloaded;
    summary.skipped += result.skipped;
    summary.failed += result.failed;
    summary.files.push(...result.files);
  }

  // Every media item has reached a terminal outcome here, so the post is done.
  private recordOutcome(result: PostResult): boolean {
    const reason =
      result.mediaCount === 0
        ? 'no media'
        : result.failed > 0
          ? `${result.failed} of ${result.mediaCount} media failed`
          : undefined;
    const added = this.blacklist.add(result.post.id, reason);
    if (added) {
      this.logger.debug(`Blacklisted post ${result.post.id}`, { postId: result.post.id });
    }
    return added;
  }

  private pruneExpired(liked: Set<string>): number {
    let expired = 0;
    for (const entry of this.blacklist.entries()) {
      if (!liked.has(entry.id) && this.blacklist.remove(entry.id)) {
        expired++;
      }
    }
    if (expired > 0) {
      this.logger.info(`Removed ${expired} expired post IDs from the blacklist`);
    }
    return expired;
  }

  private enter(stage: PipelineStage): void {
    if (this.stage !== stage) {
      this.logger.debug(`Stage ${stage}`);
    }
    this.stage = stage;
  }
}
