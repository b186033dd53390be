// src/core/library/tag-map.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import Joi from 'joi';
import { ErrorCode, LikedropError, errorMessage, hasErrnoCode } from '../errors.js';
import { createAppLogger } from '../logger.js';
import type { TagMap } from './types.js';

const logger = createAppLogger('tag-map');

const tagMapSchema = Joi.object<TagMap>().pattern(
  Joi.string().pattern(/^\w+$/),
  Joi.array().items(Joi.string().min(1)).unique()
);

export function parseTagMap(content: string, source: string): TagMap {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new LikedropError(
      ErrorCode.CONFIG_INVALID,
      `Failed to parse tag map file ${source}: ${errorMessage(error)}`,
      false,
      'Delete the file and a new empty one will be created on the next run'
    );
  }

  const result = tagMapSchema.validate(raw ?? {});
  if (result.error !== undefined) {
    throw new LikedropError(
      ErrorCode.CONFIG_INVALID,
      `Tag map file ${source} is malformed: ${result.error.message}`,
      false,
      'Expected an object mapping author handles to arrays of label slugs'
    );
  }
  return result.value;
}

/**
 * Reads the tag map, creating an empty one when the file does not exist yet.
 */
export async function loadTagMap(filePath: string): Promise<TagMap> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!hasErrnoCode(error, 'ENOENT')) {
      throw new LikedropError(ErrorCode.LOCAL_IO, `Failed to load tag map file ${filePath}: ${errorMessage(error)}`);
    }
    logger.info(`Creating default tag map file in ${filePath}`);
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, '{}\n', 'utf-8');
    } catch (writeError) {
      throw new LikedropError(
        ErrorCode.LOCAL_IO,
        `Failed to write tag map file ${filePath}: ${errorMessage(writeError)}`
      );
    }
    return {};
  }

  return parseTagMap(content, filePath);
}
