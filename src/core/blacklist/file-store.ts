// src/core/blacklist/file-store.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { ErrorCode, LikedropError, errorMessage, hasErrnoCode } from '../errors.js';
import { createAppLogger, type AppLogger } from '../logger.js';
import type { BlacklistEntry, BlacklistStore } from './types.js';

const HEADER = [
  '# Posts listed here are never downloaded again.',
  '# One post ID per line; anything after "#" is a note.',
];

export function parseBlacklist(content: string): BlacklistEntry[] {
  const entries: BlacklistEntry[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) continue;

    const hashAt = line.indexOf('#');
    const idPart = (hashAt === -1 ? line : line.slice(0, hashAt)).trim();
    const id = idPart.split(/\s+/)[0];
    if (!id) continue;

    const reason = hashAt === -1 ? '' : line.slice(hashAt + 1).trim();
    entries.push(reason ? { id, reason } : { id });
  }

  return entries;
}

export function serializeBlacklist(entries: BlacklistEntry[]): string {
  const lines = entries.map(({ id, reason }) => (reason ? `${id}  # ${reason}` : id));
  return [...HEADER, ...lines].join('\n') + '\n';
}

export class FileBlacklistStore implements BlacklistStore {
  private entriesById = new Map<string, BlacklistEntry>();
  private loaded: boolean = false;
  private changed: boolean = false;
  private logger: AppLogger;

  constructor(
    private filePath: string,
    logger?: AppLogger
  ) {
    this.logger = logger ?? createAppLogger('blacklist');
  }

  async load(): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (hasErrnoCode(error, 'ENOENT')) {
        this.logger.info(`Creating empty blacklist file ${this.filePath}`);
        this.entriesById.clear();
        this.loaded = true;
        this.changed = false;
        await this.write();
        return;
      }
      throw new LikedropError(
        ErrorCode.LOCAL_IO,
        `Failed to read blacklist file ${this.filePath}: ${errorMessage(error)}`
      );
    }

    this.entriesById.clear();
    for (const entry of parseBlacklist(content)) {
      this.entriesById.set(entry.id, entry);
    }
    this.loaded = true;
    this.changed = false;
    this.logger.info(`Loaded ${this.entriesById.size} blacklisted posts`, { path: this.filePath });
  }

  async save(): Promise<void> {
    if (!this.changed) {
      this.logger.debug("Blacklist doesn't need saving");
      return;
    }
    await this.write();
    this.changed = false;
    this.logger.debug(`Saved blacklist with ${this.entriesById.size} post IDs`, { path: this.filePath });
  }

  contains(id: string): boolean {
    this.ensureLoaded();
    return this.entriesById.has(id);
  }

  add(id: string, reason?: string): boolean {
    this.ensureLoaded();
    if (this.entriesById.has(id)) return false;
    this.entriesById.set(id, reason ? { id, reason } : { id });
    this.changed = true;
    return true;
  }

  remove(id: string): boolean {
    this.ensureLoaded();
    const removed = this.entriesById.delete(id);
    if (removed) this.changed = true;
    return removed;
  }

  entries(): BlacklistEntry[] {
    this.ensureLoaded();
    return [...this.entriesById.values()];
  }

  get size(): number {
    return this.entriesById.size;
  }

  private ensureLoaded(): void {
    if (!this.loaded) {
      throw new LikedropError(ErrorCode.INVALID_ARGUMENT, 'Blacklist used before load()');
    }
  }

  // Sibling temp file renamed over the target.
  private async write(): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, serializeBlacklist(this.entries()), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw new LikedropError(
        ErrorCode.LOCAL_IO,
        `Failed to write blacklist file ${this.filePath}: ${errorMessage(error)}`
      );
    }
  }
}
