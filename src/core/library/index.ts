// src/core/library/index.ts
export * from './types.js';
export * from './tag-map.js';
export * from './labeler.js';
export * from './mysql-library.js';
