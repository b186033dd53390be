// src/core/blacklist/index.ts
export { FileBlacklistStore, parseBlacklist, serializeBlacklist } from './file-store.js';
export { MemoryBlacklistStore } from './memory-store.js';
export type { BlacklistEntry, BlacklistStore } from './types.js';
