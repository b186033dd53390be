// src/core/__tests__/support.ts
import type { LikesApi } from '../api/likes-client.js';
import type { RawMedia, RawTweet, QueryValue, TwitterTransport } from '../api/types.js';
import type { DownloadOutcome, DownloadRequest, Downloader } from '../download/downloader.js';
import type { Clock } from '../retry/policy.js';
import type { MediaDescriptor, Post, PostStub } from '../types/index.js';

export class FakeClock implements Clock {
  sleeps: number[] = [];

  constructor(private current: number = Date.UTC(2024, 2, 9, 12, 0, 0)) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}

export interface TransportCall {
  endpoint: string;
  query: Record<string, QueryValue>;
}

type Responder = (call: TransportCall) => unknown;

/**
 * Replays scripted responses in order; a thrown value is rejected.
 */
export class ScriptedTransport implements TwitterTransport {
  calls: TransportCall[] = [];
  private queue: Responder[] = [];

  reply(payload: unknown): this {
    this.queue.push(() => payload);
    return this;
  }

  fail(error: unknown): this {
    this.queue.push(() => {
      throw error;
    });
    return this;
  }

  respond(responder: Responder): this {
    this.queue.push(responder);
    return this;
  }

  async get(endpoint: string, query: Record<string, QueryValue>): Promise<unknown> {
    const call = { endpoint, query };
    this.calls.push(call);
    const next = this.queue.shift();
    if (!next) {
      throw new Error(`Unexpected request to ${endpoint}`);
    }
    return next(call);
  }
}

export function rawPhoto(name: string): RawMedia {
  return {
    type: 'photo',
    media_url_https: `https://pbs.example.com/media/${name}.jpg`,
    sizes: {
      thumb: { w: 150, h: 150, resize: 'crop' },
      small: { w: 680, h: 453, resize: 'fit' },
      medium: { w: 1200, h: 800, resize: 'fit' },
      large: { w: 2048, h: 1365, resize: 'fit' },
    },
  };
}

export function rawVideo(name: string): RawMedia {
  return {
    type: 'video',
    media_url_https: `https://pbs.example.com/thumb/${name}.jpg`,
    video_info: {
      variants: [
        { url: `https://video.example.com/${name}.m3u8`, content_type: 'application/x-mpegURL' },
        { url: `https://video.example.com/${name}_low.mp4?tag=12`, content_type: 'video/mp4', bitrate: 256000 },
        { url: `https://video.example.com/${name}_high.mp4?tag=12`, content_type: 'video/mp4', bitrate: 2176000 },
        { url: `https://video.example.com/${name}_mid.mp4?tag=12`, content_type: 'video/mp4', bitrate: 832000 },
      ],
    },
  };
}

export function rawTweet(id: string, author: string = 'artist', media: RawMedia[] = []): RawTweet {
  return {
    id_str: id,
    created_at: 'Sat Mar 09 12:00:00 +0000 2024',
    full_text: `post ${id}`,
    user: { screen_name: author },
    ...(media.length > 0 ? { extended_entities: { media } } : {}),
  };
}

export function photoDescriptor(name: string): MediaDescriptor {
  return {
    kind: 'photo',
    variants: [
      { url: `https://pbs.example.com/media/${name}.jpg?format=jpg&name=small`, width: 680, height: 453 },
      { url: `https://pbs.example.com/media/${name}.jpg?format=jpg&name=large`, width: 2048, height: 1365 },
    ],
  };
}

export function makePost(id: string, author: string = 'artist', media: MediaDescriptor[] = []): Post {
  return {
    id,
    author,
    publishedAt: '2024-03-09T12:00:00.000Z',
    text: `post ${id}`,
    media,
  };
}

/**
 * Likes API over fixed data. Queued lookup failures are thrown in order.
 */
export class FakeLikesApi implements LikesApi {
  lookups: string[][] = [];
  lookupFailures: unknown[] = [];
  private posts: Map<string, Post>;

  constructor(
    private stubs: PostStub[],
    posts: Post[]
  ) {
    this.posts = new Map(posts.map(post => [post.id, post]));
  }

  static of(posts: Post[]): FakeLikesApi {
    return new FakeLikesApi(
      posts.map(post => ({ id: post.id, author: post.author })),
      posts
    );
  }

  async listLiked(maxCount: number = 200): Promise<PostStub[]> {
    return this.stubs.slice(0, maxCount);
  }

  async lookup(ids: string[]): Promise<Map<string, Post>> {
    this.lookups.push(ids);
    const failure = this.lookupFailures.shift();
    if (failure) throw failure;

    const found = new Map<string, Post>();
    for (const id of ids) {
      const post = this.posts.get(id);
      if (post) found.set(id, post);
    }
    return found;
  }
}

/**
 * Downloader over an in-memory "disk": a name written once is skipped after.
 */
export class FakeDownloader implements Downloader {
  requests: DownloadRequest[] = [];
  onDisk = new Set<string>();
  failingUrls = new Set<string>();

  async download(request: DownloadRequest): Promise<DownloadOutcome> {
    this.requests.push(request);
    const filePath = `/downloads/${request.filename}`;
    if (this.onDisk.has(request.filename)) {
      return { status: 'skipped_exists', path: filePath, attempts: 0 };
    }
    if (this.failingUrls.has(request.url)) {
      return { status: 'failed', path: filePath, attempts: 3, error: `HTTP 503 for ${request.url}` };
    }
    this.onDisk.add(request.filename);
    return { status: 'downloaded', path: filePath, attempts: 1 };
  }
}
