// src/core/blacklist/types.ts
export interface BlacklistEntry {
  id: string;
  reason?: string;
}

/**
 * Persisted set of post ids that must not be downloaded again.
 *
 * `contains`, `add` and `remove` work on the loaded state; nothing reaches
 * disk until `save`. Single process at a time: there is no locking.
 */
export interface BlacklistStore {
  load(): Promise<void>;
  save(): Promise<void>;
  contains(id: string): boolean;
  /** Returns false when the id was already present. */
  add(id: string, reason?: string): boolean;
  remove(id: string): boolean;
  entries(): BlacklistEntry[];
  readonly size: number;
}
