// src/core/blacklist/memory-store.ts
import type { BlacklistEntry, BlacklistStore } from './types.js';

export class MemoryBlacklistStore implements BlacklistStore {
  private entriesById = new Map<string, BlacklistEntry>();
  private changed = false;
  saveCount = 0;

  constructor(initial: Array<string | BlacklistEntry> = []) {
    for (const item of initial) {
      const entry = typeof item === 'string' ? { id: item } : item;
      this.entriesById.set(entry.id, entry);
    }
  }

  async load(): Promise<void> {
    this.changed = false;
  }

  async save(): Promise<void> {
    if (!this.changed) return;
    this.saveCount++;
    this.changed = false;
  }

  contains(id: string): boolean {
    return this.entriesById.has(id);
  }

  add(id: string, reason?: string): boolean {
    if (this.entriesById.has(id)) return false;
    this.entriesById.set(id, reason ? { id, reason } : { id });
    this.changed = true;
    return true;
  }

  remove(id: string): boolean {
    const removed = this.entriesById.delete(id);
    if (removed) this.changed = true;
    return removed;
  }

  entries(): BlacklistEntry[] {
    return [...this.entriesById.values()];
  }

  get size(): number {
    return this.entriesById.size;
  }
}
