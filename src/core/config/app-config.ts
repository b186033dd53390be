// src/core/config/app-config.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import * as dotenv from 'dotenv';
import Joi from 'joi';
import { ErrorCode, LikedropError, errorMessage } from '../errors.js';
import {
  DEFAULT_BLACKLIST_FILE,
  DEFAULT_CREATE_DIR_AFTER_FILES,
  DEFAULT_RECENT_ALBUM_SLUG,
  DEFAULT_RECENT_MEDIA_HOURS,
  DEFAULT_TAGGER_LABEL,
  DEFAULT_TAGS_FILE,
} from './constants.js';

export interface ApiCredentials {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessTokenSecret: string;
}

export interface MediaLibraryConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface AppConfig {
  credentials: ApiCredentials;
  files: {
    downloadPath: string;
    blacklistFile: string;
    tagsFile: string;
  };
  organize: {
    createDirAfterFiles: number;
  };
  tagging: {
    recentAlbumSlug: string;
    recentMediaHours: number;
    taggerLabel: string;
    database?: MediaLibraryConfig;
  };
}

interface ValidatedValues {
  CONSUMER_KEY: string;
  CONSUMER_SECRET: string;
  ACCESS_TOKEN: string;
  ACCESS_TOKEN_SECRET: string;
  DOWNLOAD_PATH: string;
  BLACKLIST_FILE: string;
  TAGS_FILE: string;
  CREATE_DIR_AFTER_FILES: number;
  MEDIA_LIBRARY_DB_HOST?: string;
  MEDIA_LIBRARY_DB_PORT: number;
  MEDIA_LIBRARY_DB_NAME?: string;
  MEDIA_LIBRARY_DB_USER?: string;
  MEDIA_LIBRARY_DB_PASSWORD?: string;
  RECENT_ALBUM_SLUG: string;
  RECENT_MEDIA_HOURS: number;
  TAGGER_LABEL: string;
}

const schemaKeys = {
  CONSUMER_KEY: Joi.string().required(),
  CONSUMER_SECRET: Joi.string().required(),
  ACCESS_TOKEN: Joi.string().required(),
  ACCESS_TOKEN_SECRET: Joi.string().required(),

  DOWNLOAD_PATH: Joi.string().required(),
  BLACKLIST_FILE: Joi.string().empty('').default(DEFAULT_BLACKLIST_FILE),
  TAGS_FILE: Joi.string().empty('').default(DEFAULT_TAGS_FILE),
  CREATE_DIR_AFTER_FILES: Joi.number().integer().min(1).empty('').default(DEFAULT_CREATE_DIR_AFTER_FILES),

  MEDIA_LIBRARY_DB_HOST: Joi.string().empty(''),
  MEDIA_LIBRARY_DB_PORT: Joi.number().port().empty('').default(3306),
  MEDIA_LIBRARY_DB_NAME: Joi.string().empty(''),
  MEDIA_LIBRARY_DB_USER: Joi.string().empty(''),
  MEDIA_LIBRARY_DB_PASSWORD: Joi.string().empty(''),
  RECENT_ALBUM_SLUG: Joi.string().empty('').default(DEFAULT_RECENT_ALBUM_SLUG),
  RECENT_MEDIA_HOURS: Joi.number().integer().min(1).empty('').default(DEFAULT_RECENT_MEDIA_HOURS),
  TAGGER_LABEL: Joi.string().empty('').default(DEFAULT_TAGGER_LABEL),
};

const configSchema = Joi.object<ValidatedValues>(schemaKeys)
  .and('MEDIA_LIBRARY_DB_HOST', 'MEDIA_LIBRARY_DB_NAME', 'MEDIA_LIBRARY_DB_USER')
  .unknown();

const KNOWN_KEYS = Object.keys(schemaKeys);

/**
 * Parse `KEY=value` text and validate it. Environment values override the
 * file for known keys only.
 */
export function parseConfig(
  content: string,
  baseDir: string,
  env: NodeJS.ProcessEnv = {}
): AppConfig {
  const fromFile = dotenv.parse(content);
  const merged: Record<string, string> = { ...fromFile };
  for (const key of KNOWN_KEYS) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      merged[key] = value;
    }
  }

  const result = configSchema
    .prefs({ errors: { label: 'key' }, convert: true })
    .validate(merged);

  if (result.error !== undefined) {
    throw new LikedropError(
      ErrorCode.CONFIG_INVALID,
      `Config validation error: ${result.error.message}`,
      false,
      'Check the configuration file against config.env.example'
    );
  }

  const value = result.value;
  const resolve = (p: string) => path.resolve(baseDir, p);

  const database: MediaLibraryConfig | undefined =
    value.MEDIA_LIBRARY_DB_HOST && value.MEDIA_LIBRARY_DB_NAME && value.MEDIA_LIBRARY_DB_USER
      ? {
          host: value.MEDIA_LIBRARY_DB_HOST,
          port: value.MEDIA_LIBRARY_DB_PORT,
          database: value.MEDIA_LIBRARY_DB_NAME,
          user: value.MEDIA_LIBRARY_DB_USER,
          password: value.MEDIA_LIBRARY_DB_PASSWORD ?? '',
        }
      : undefined;

  return Object.freeze({
    credentials: {
      consumerKey: value.CONSUMER_KEY,
      consumerSecret: value.CONSUMER_SECRET,
      accessToken: value.ACCESS_TOKEN,
      accessTokenSecret: value.ACCESS_TOKEN_SECRET,
    },
    files: {
      downloadPath: resolve(value.DOWNLOAD_PATH),
      blacklistFile: resolve(value.BLACKLIST_FILE),
      tagsFile: resolve(value.TAGS_FILE),
    },
    organize: {
      createDirAfterFiles: value.CREATE_DIR_AFTER_FILES,
    },
    tagging: {
      recentAlbumSlug: value.RECENT_ALBUM_SLUG,
      recentMediaHours: value.RECENT_MEDIA_HOURS,
      taggerLabel: value.TAGGER_LABEL,
      database,
    },
  });
}

export async function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new LikedropError(
      ErrorCode.CONFIG_INVALID,
      `Unable to read configuration file ${configPath}: ${errorMessage(error)}`,
      false,
      'Pass --config <path> or create config.env from config.env.example'
    );
  }

  return parseConfig(content, path.dirname(configPath), env);
}
