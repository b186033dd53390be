// src/core/config/__tests__/app-config.test.ts
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, parseConfig } from '../app-config.js';
import { ErrorCode, isLikedropError } from '../../errors.js';

const BASE = [
  'CONSUMER_KEY=test-consumer-key',
  'CONSUMER_SECRET=test-secret',
  'ACCESS_TOKEN=test-token',
  'ACCESS_TOKEN_SECRET=test-token-secret',
  'DOWNLOAD_PATH=media',
].join('\n');

describe('parseConfig', () => {
  it('applies defaults and resolves paths against the config directory', () => {
    const config = parseConfig(BASE, '/srv/likedrop');

    expect(config.credentials).toEqual({
      consumerKey: 'test-consumer-key',
      consumerSecret: 'test-secret',
      accessToken: 'test-token',
      accessTokenSecret: 'test-token-secret',
    });
    expect(config.files).toEqual({
      downloadPath: '/srv/likedrop/media',
      blacklistFile: '/srv/likedrop/blacklist.txt',
      tagsFile: '/srv/likedrop/tags.json',
    });
    expect(config.organize.createDirAfterFiles).toBe(10);
    expect(config.tagging).toEqual({
      recentAlbumSlug: 'recent',
      recentMediaHours: 24,
      taggerLabel: 'likedrop-tagged',
      database: undefined,
    });
  });

  it('reads numbers and the media library settings', () => {
    const content = [
      BASE,
      'CREATE_DIR_AFTER_FILES=3',
      'MEDIA_LIBRARY_DB_HOST=localhost',
      'MEDIA_LIBRARY_DB_NAME=photoprism',
      'MEDIA_LIBRARY_DB_USER=tagger',
      'MEDIA_LIBRARY_DB_PASSWORD=test-secret',
    ].join('\n');

    const config = parseConfig(content, '/srv/likedrop');

    expect(config.organize.createDirAfterFiles).toBe(3);
    expect(config.tagging.database).toEqual({
      host: 'localhost',
      port: 3306,
      database: 'photoprism',
      user: 'tagger',
      password: 'test-secret',
    });
  });

  it('lets the environment override known keys', () => {
    const config = parseConfig(BASE, '/srv/likedrop', {
      DOWNLOAD_PATH: '/data/likes',
      CREATE_DIR_AFTER_FILES: '',
    });

    expect(config.files.downloadPath).toBe('/data/likes');
    expect(config.organize.createDirAfterFiles).toBe(10);
  });

  it('names the missing key', () => {
    expect(() => parseConfig('DOWNLOAD_PATH=media', '/srv')).toThrow(
      'Config validation error: "CONSUMER_KEY" is required'
    );
  });

  it('rejects a threshold below one', () => {
    expect(() => parseConfig(`${BASE}\nCREATE_DIR_AFTER_FILES=0`, '/srv')).toThrow('"CREATE_DIR_AFTER_FILES"');
  });

  it('rejects a partial media library configuration', () => {
    let caught: unknown;
    try {
      parseConfig(`${BASE}\nMEDIA_LIBRARY_DB_HOST=localhost`, '/srv');
    } catch (error) {
      caught = error;
    }
    expect(isLikedropError(caught, ErrorCode.CONFIG_INVALID)).toBe(true);
  });

  it('treats blank optional values as unset', () => {
    const content = [BASE, 'MEDIA_LIBRARY_DB_HOST=', 'MEDIA_LIBRARY_DB_PORT=', 'TAGGER_LABEL='].join('\n');

    const config = parseConfig(content, '/srv');

    expect(config.tagging.database).toBeUndefined();
    expect(config.tagging.taggerLabel).toBe('likedrop-tagged');
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(parseConfig(BASE, '/srv'))).toBe(true);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'likedrop-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads the file next to which relative paths resolve', async () => {
    const file = path.join(dir, 'config.env');
    await fs.writeFile(file, BASE, 'utf-8');

    const config = await loadConfig(file, {});

    expect(config.files.downloadPath).toBe(path.join(dir, 'media'));
  });

  it('accepts the shipped example once the credentials are filled in', async () => {
    const example = await fs.readFile(path.resolve(__dirname, '../../../../config.env.example'), 'utf-8');
    const file = path.join(dir, 'config.env');
    await fs.writeFile(file, example.replace(/^(CONSUMER_KEY|CONSUMER_SECRET|ACCESS_TOKEN|ACCESS_TOKEN_SECRET)=$/gm, '$1=test-secret'), 'utf-8');

    const config = await loadConfig(file, {});

    expect(config.credentials.accessTokenSecret).toBe('test-secret');
    expect(config.files.downloadPath).toBe(path.join(dir, 'media'));
    expect(config.tagging.database).toBeUndefined();
  });

  it('reports a missing file as invalid configuration', async () => {
    const error = await loadConfig(path.join(dir, 'absent.env'), {}).catch((e: unknown) => e);

    expect(isLikedropError(error, ErrorCode.CONFIG_INVALID)).toBe(true);
    expect(error).toHaveProperty('suggestion', 'Pass --config <path> or create config.env from config.env.example');
  });
});
