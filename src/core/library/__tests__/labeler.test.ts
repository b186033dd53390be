// src/core/library/__tests__/labeler.test.ts
import { describe, it, expect } from '@jest/globals';
import { MediaLabeler } from '../labeler.js';
import { escapeLikePrefix } from '../mysql-library.js';
import { ErrorCode, isLikedropError } from '../../errors.js';
import { FakeClock } from '../../__tests__/support.js';
import { MemoryMediaLibrary } from './memory-library.js';

const LABELS = [
  { id: 1, slug: 'likedrop-tagged' },
  { id: 2, slug: 'photo' },
  { id: 3, slug: 'topic-space' },
];

const CREATED = new Date('2024-03-01T00:00:00Z');

describe('MediaLabeler.labelKnownAuthors', () => {
  it('adds missing labels and marks photos as processed', async () => {
    const library = new MemoryMediaLibrary(LABELS, [
      { id: 10, uid: 'p10', name: 'nasa_2024-03-01_100_1.jpg', createdAt: CREATED },
      { id: 11, uid: 'p11', name: 'nasa_2024-03-01_100_2.jpg', createdAt: CREATED, labelIds: [2] },
      { id: 12, uid: 'p12', name: 'nasa_2024-03-01_101_1.jpg', createdAt: CREATED, labelIds: [1] },
      { id: 13, uid: 'p13', name: 'nasafan_2024-03-01_102_1.jpg', createdAt: CREATED },
    ]);
    const labeler = new MediaLabeler(library, { taggerLabel: 'likedrop-tagged' });

    const results = await labeler.labelKnownAuthors({ nasa: ['photo', 'topic-space'] });

    expect(results).toEqual([{ author: 'nasa', photos: 3, updated: 2, missingLabels: [] }]);
    expect(library.labelsOf(10)).toEqual([1, 2, 3]);
    expect(library.labelsOf(11)).toEqual([1, 2, 3]);
    expect(library.labelsOf(12)).toEqual([1]);
    expect(library.labelsOf(13)).toEqual([]);
    expect(Object.fromEntries(library.labelCounts)).toEqual({ 1: 2, 2: 1, 3: 2 });
  });

  it('skips an author whose labels do not exist', async () => {
    const library = new MemoryMediaLibrary(LABELS, [
      { id: 10, uid: 'p10', name: 'artist_2024-03-01_100_1.jpg', createdAt: CREATED },
    ]);
    const labeler = new MediaLabeler(library, { taggerLabel: 'likedrop-tagged' });

    const results = await labeler.labelKnownAuthors({ artist: ['photo', 'fandom-x'] });

    expect(results).toEqual([{ author: 'artist', photos: 0, updated: 0, missingLabels: ['fandom-x'] }]);
    expect(library.labelsOf(10)).toEqual([]);
  });

  it('requires the tagger label', async () => {
    const library = new MemoryMediaLibrary([{ id: 2, slug: 'photo' }], []);
    const labeler = new MediaLabeler(library, { taggerLabel: 'likedrop-tagged' });

    const error = await labeler.labelKnownAuthors({}).catch((e: unknown) => e);

    expect(isLikedropError(error, ErrorCode.MEDIA_LIBRARY)).toBe(true);
    expect(error).toHaveProperty('message', 'Required label likedrop-tagged not found in media library');
  });
});

describe('MediaLabeler.updateRecentAlbum', () => {
  const clock = new FakeClock(Date.parse('2024-03-09T12:00:00Z'));

  it('replaces the album content with recently added photos', async () => {
    const library = new MemoryMediaLibrary(LABELS, [
      { id: 1, uid: 'fresh', name: 'a_2024-03-09_1_1.jpg', createdAt: new Date('2024-03-09T11:00:00Z') },
      { id: 2, uid: 'stale', name: 'a_2024-03-08_2_1.jpg', createdAt: new Date('2024-03-08T11:00:00Z') },
    ]).addAlbum('album-1', 'recent', ['stale']);
    const labeler = new MediaLabeler(library, { taggerLabel: 'likedrop-tagged', clock });

    const result = await labeler.updateRecentAlbum(24, 'recent');

    expect(result).toEqual({ albumUid: 'album-1', added: 1 });
    expect(library.albums.get('album-1')?.photoUids).toEqual(['fresh']);
  });

  it('fails when the album does not exist', async () => {
    const library = new MemoryMediaLibrary(LABELS, []);
    const labeler = new MediaLabeler(library, { taggerLabel: 'likedrop-tagged', clock });

    await expect(labeler.updateRecentAlbum(24, 'recent')).rejects.toThrow("Unable to find album with slug 'recent'");
  });

  it('fails when the slug is ambiguous', async () => {
    const library = new MemoryMediaLibrary(LABELS, []).addAlbum('a1', 'recent').addAlbum('a2', 'recent');
    const labeler = new MediaLabeler(library, { taggerLabel: 'likedrop-tagged', clock });

    await expect(labeler.updateRecentAlbum(24, 'recent')).rejects.toThrow(
      "Expecting exactly one album with slug 'recent', got 2"
    );
  });
});

describe('escapeLikePrefix', () => {
  it('escapes LIKE wildcards', () => {
    expect(escapeLikePrefix('some_artist')).toBe('some\\_artist');
    expect(escapeLikePrefix('100%')).toBe('100\\%');
  });
});
