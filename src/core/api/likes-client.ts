// src/core/api/likes-client.ts
import {
  LIKES_PAGE_SIZE,
  LOOKUP_BATCH_SIZE,
  MAX_LIKED_POSTS,
  MAX_LIKES_PAGES,
  RATE_LIMIT_FALLBACK_MS,
  RATE_LIMIT_PADDING_MS,
} from '../config/constants.js';
import { ErrorCode, LikedropError, isLikedropError } from '../errors.js';
import { createAppLogger, type AppLogger } from '../logger.js';
import { RetryExhaustedError, RetryPolicy, systemClock, type Clock } from '../retry/policy.js';
import type { Post, PostStub } from '../types/index.js';
import { readTweets, toPost, toPostStub } from './tweet-parser.js';
import type { QueryValue, TwitterTransport } from './types.js';

export interface LikesApi {
  listLiked(maxCount?: number): Promise<PostStub[]>;
  lookup(ids: string[]): Promise<Map<string, Post>>;
}

export interface LikesClientOptions {
  retryPolicy: RetryPolicy;
  clock?: Clock;
  logger?: AppLogger;
  rateLimitFallbackMs?: number;
}

export class LikesClient implements LikesApi {
  private retryPolicy: RetryPolicy;
  private clock: Clock;
  private logger: AppLogger;
  private rateLimitFallbackMs: number;

  constructor(
    private transport: TwitterTransport,
    options: LikesClientOptions
  ) {
    this.retryPolicy = options.retryPolicy;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createAppLogger('api');
    this.rateLimitFallbackMs = options.rateLimitFallbackMs ?? RATE_LIMIT_FALLBACK_MS;
  }

  /**
   * Most recent likes of the authenticating user, newest first. The service
   * never exposes more than the latest 200, whatever is requested.
   */
  async listLiked(maxCount: number = MAX_LIKED_POSTS): Promise<PostStub[]> {
    const cap = Math.max(0, Math.min(Math.floor(maxCount), MAX_LIKED_POSTS));
    const stubs: PostStub[] = [];
    const seen = new Set<string>();
    let maxId: string | undefined;

    for (let page = 0; page < MAX_LIKES_PAGES && stubs.length < cap; page++) {
      const query: Record<string, QueryValue> = {
        count: Math.min(cap - stubs.length, LIKES_PAGE_SIZE),
        tweet_mode: 'extended',
        include_entities: true,
      };
      if (maxId) query.max_id = maxId;

      const payload = await this.request('favorites/list.json', query);
      const { tweets, rejected } = readTweets(payload);
      if (rejected > 0) {
        this.logger.warn(`Ignored ${rejected} malformed statuses in likes page ${page + 1}`);
      }
      if (tweets.length === 0) break;

      let added = 0;
      for (const tweet of tweets) {
        if (seen.has(tweet.id_str) || stubs.length >= cap) continue;
        seen.add(tweet.id_str);
        stubs.push(toPostStub(tweet));
        added++;
      }
      if (added === 0) break;

      maxId = previousId(tweets[tweets.length - 1].id_str);
      if (!maxId) break;
    }

    this.logger.info(`Loaded ${stubs.length} liked posts`);
    return stubs;
  }

  /**
   * Full details for up to 100 ids. Deleted or protected posts are simply
   * missing from the result.
   */
  async lookup(ids: string[]): Promise<Map<string, Post>> {
    if (ids.length > LOOKUP_BATCH_SIZE) {
      throw new LikedropError(
        ErrorCode.INVALID_ARGUMENT,
        `lookup accepts at most ${LOOKUP_BATCH_SIZE} ids, got ${ids.length}`
      );
    }

    const posts = new Map<string, Post>();
    if (ids.length === 0) return posts;

    let payload: unknown;
    try {
      payload = await this.request('statuses/lookup.json', {
        id: ids.join(','),
        tweet_mode: 'extended',
        include_entities: true,
      });
    } catch (error) {
      if (isLikedropError(error, ErrorCode.NOT_FOUND)) {
        this.logger.debug(`None of ${ids.length} posts could be found`);
        return posts;
      }
      throw error;
    }

    const { tweets, rejected } = readTweets(payload);
    if (rejected > 0) {
      this.logger.warn(`Ignored ${rejected} malformed statuses in lookup response`);
    }
    for (const tweet of tweets) {
      posts.set(tweet.id_str, toPost(tweet));
    }
    this.logger.debug(`Looked up ${posts.size} of ${ids.length} posts`);
    return posts;
  }

  // One rate-limit wait per request: a second signal after the reset is fatal.
  private async request(endpoint: string, query: Record<string, QueryValue>): Promise<unknown> {
    try {
      return await this.requestWithRetry(endpoint, query);
    } catch (error) {
      if (!isLikedropError(error, ErrorCode.RATE_LIMITED)) {
        throw error;
      }
      const waitMs = this.rateLimitWait(error);
      this.logger.warn(`Rate limited on ${endpoint}, waiting ${Math.ceil(waitMs / 1000)}s for the window to reset`);
      await this.clock.sleep(waitMs);
    }

    try {
      return await this.requestWithRetry(endpoint, query);
    } catch (error) {
      if (isLikedropError(error, ErrorCode.RATE_LIMITED)) {
        throw new LikedropError(
          ErrorCode.RATE_LIMITED,
          `Still rate limited on ${endpoint} after waiting for the window to reset`,
          false,
          'Try again later',
          error.context
        );
      }
      throw error;
    }
  }

  private async requestWithRetry(endpoint: string, query: Record<string, QueryValue>): Promise<unknown> {
    try {
      const { value } = await this.retryPolicy.run(() => this.transport.get(endpoint, query), {
        shouldRetry: error => isLikedropError(error, ErrorCode.NETWORK_ERROR) && error.retryable,
        onRetry: (attempt, delay, error) => {
          this.logger.warn(`Request to ${endpoint} failed (attempt ${attempt}), retrying in ${delay}ms`, {
            error: error instanceof Error ? error : String(error),
          });
        },
      });
      return value;
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new LikedropError(
          ErrorCode.NETWORK_ERROR,
          `Request to ${endpoint} failed after ${error.attempts} attempts: ${error.message}`,
          false
        );
      }
      throw error;
    }
  }

  private rateLimitWait(error: LikedropError): number {
    const resetAt = error.context?.resetAt;
    if (typeof resetAt !== 'number' || !Number.isFinite(resetAt)) {
      return this.rateLimitFallbackMs;
    }
    return Math.max(0, resetAt * 1000 - this.clock.now()) + RATE_LIMIT_PADDING_MS;
  }
}

function previousId(id: string): string | undefined {
  if (!/^\d+$/.test(id)) return undefined;
  const value = BigInt(id) - 1n;
  return value > 0n ? value.toString() : undefined;
}
