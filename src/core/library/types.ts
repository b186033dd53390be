// src/core/library/types.ts

/** A label row: numeric id plus the slug shown in the application's search bar. */
export interface Label {
  id: number;
  slug: string;
}

/** Author handle -> label slugs every one of their photos should carry. */
export type TagMap = Record<string, string[]>;

/**
 * The slice of the media-management database the tagger works on. Photo ids
 * are numeric row ids; photo and album uids are the application's string ids.
 */
export interface MediaLibrary {
  listLabels(): Promise<Label[]>;
  photoIdsForAuthor(author: string): Promise<number[]>;
  labelIdsForPhoto(photoId: number): Promise<Set<number>>;
  addLabelToPhoto(photoId: number, label: Label): Promise<void>;
  albumUidsBySlug(slug: string): Promise<string[]>;
  photoUidsCreatedAfter(since: Date): Promise<string[]>;
  clearAlbum(albumUid: string): Promise<void>;
  addPhotosToAlbum(albumUid: string, photoUids: string[]): Promise<void>;
  close(): Promise<void>;
}
