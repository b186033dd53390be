// src/core/library/__tests__/tag-map.test.ts
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadTagMap, parseTagMap } from '../tag-map.js';
import { ErrorCode, isLikedropError } from '../../errors.js';

describe('parseTagMap', () => {
  it('reads author to label slug lists', () => {
    expect(parseTagMap('{"nasa": ["photo", "topic-space"], "painter": []}', 'tags.json')).toEqual({
      nasa: ['photo', 'topic-space'],
      painter: [],
    });
  });

  it('rejects invalid JSON', () => {
    let caught: unknown;
    try {
      parseTagMap('nasa:\n  - photo', 'tags.json');
    } catch (error) {
      caught = error;
    }
    expect(isLikedropError(caught, ErrorCode.CONFIG_INVALID)).toBe(true);
  });

  it('rejects labels that are not lists', () => {
    expect(() => parseTagMap('{"nasa": "photo"}', 'tags.json')).toThrow('Tag map file tags.json is malformed');
  });
});

describe('loadTagMap', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'likedrop-tags-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('creates an empty map when the file is missing', async () => {
    const file = path.join(dir, 'tags.json');

    expect(await loadTagMap(file)).toEqual({});
    expect(await fs.readFile(file, 'utf-8')).toBe('{}\n');
  });

  it('loads an existing map', async () => {
    const file = path.join(dir, 'tags.json');
    await fs.writeFile(file, JSON.stringify({ nasa: ['photo'] }), 'utf-8');

    expect(await loadTagMap(file)).toEqual({ nasa: ['photo'] });
  });
});
