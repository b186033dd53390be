// src/core/library/labeler.ts
import { ErrorCode, LikedropError } from '../errors.js';
import { createAppLogger, type AppLogger } from '../logger.js';
import { systemClock, type Clock } from '../retry/policy.js';
import type { Label, MediaLibrary, TagMap } from './types.js';

export interface AuthorLabelResult {
  author: string;
  photos: number;
  updated: number;
  /** Slugs from the tag map with no matching label; the author was skipped */
  missingLabels: string[];
}

export interface RecentAlbumResult {
  albumUid: string;
  added: number;
}

export interface MediaLabelerOptions {
  taggerLabel: string;
  clock?: Clock;
  logger?: AppLogger;
}

/**
 * Applies the tag map to photos in the media library and keeps the recent
 * album current. Photos carrying the tagger label are never touched again.
 */
export class MediaLabeler {
  private taggerSlug: string;
  private clock: Clock;
  private logger: AppLogger;

  constructor(
    private library: MediaLibrary,
    options: MediaLabelerOptions
  ) {
    this.taggerSlug = options.taggerLabel;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createAppLogger('labeler');
  }

  async labelKnownAuthors(tagMap: TagMap): Promise<AuthorLabelResult[]> {
    this.logger.info('Labeling media of known authors');

    const labels = await this.library.listLabels();
    const taggerLabel = labels.find(label => label.slug === this.taggerSlug);
    if (!taggerLabel) {
      throw new LikedropError(
        ErrorCode.MEDIA_LIBRARY,
        `Required label ${this.taggerSlug} not found in media library`,
        false,
        'Create the label manually, or set TAGGER_LABEL to an existing label slug'
      );
    }

    const results: AuthorLabelResult[] = [];
    for (const [author, slugs] of Object.entries(tagMap)) {
      results.push(await this.labelAuthor(author, slugs, labels, taggerLabel));
    }
    return results;
  }

  async updateRecentAlbum(hours: number, slug: string): Promise<RecentAlbumResult> {
    this.logger.info(`Updating album ${slug} with media from the last ${hours} hours`);

    const uids = await this.library.albumUidsBySlug(slug);
    if (uids.length !== 1) {
      throw new LikedropError(
        ErrorCode.MEDIA_LIBRARY,
        uids.length === 0
          ? `Unable to find album with slug '${slug}'`
          : `Expecting exactly one album with slug '${slug}', got ${uids.length}`,
        false,
        uids.length === 0 ? 'Create the album manually in the media library' : undefined
      );
    }
    const albumUid = uids[0];

    const since = new Date(this.clock.now() - hours * 60 * 60 * 1000);
    const photoUids = await this.library.photoUidsCreatedAfter(since);
    this.logger.info(`Adding ${photoUids.length} media items to album ${slug}`);

    await this.library.clearAlbum(albumUid);
    await this.library.addPhotosToAlbum(albumUid, photoUids);
    return { albumUid, added: photoUids.length };
  }

  private async labelAuthor(
    author: string,
    slugs: string[],
    labels: Label[],
    taggerLabel: Label
  ): Promise<AuthorLabelResult> {
    const expected = labels.filter(label => slugs.includes(label.slug));
    const missingLabels = slugs.filter(slug => !expected.some(label => label.slug === slug));
    if (missingLabels.length > 0) {
      this.logger.error(
        `Labels missing for author ${author}: ${missingLabels.join(', ')}. Assign them to at least one photo first`,
        { author }
      );
      return { author, photos: 0, updated: 0, missingLabels };
    }

    const photoIds = await this.library.photoIdsForAuthor(author);
    this.logger.debug(`Found ${photoIds.length} photos for author ${author}`, { author });

    let updated = 0;
    for (const photoId of photoIds) {
      const current = await this.library.labelIdsForPhoto(photoId);
      if (current.has(taggerLabel.id)) {
        this.logger.debug(`Skipping photo ${photoId} (already tagged)`);
        continue;
      }

      for (const label of expected) {
        if (!current.has(label.id)) {
          await this.library.addLabelToPhoto(photoId, label);
        }
      }
      await this.library.addLabelToPhoto(photoId, taggerLabel);
      updated++;
    }

    const message = `Updated ${updated} of ${photoIds.length} photos for author ${author}`;
    if (updated > 0) {
      this.logger.info(message, { author });
    } else {
      this.logger.debug(message, { author });
    }
    return { author, photos: photoIds.length, updated, missingLabels: [] };
  }
}
