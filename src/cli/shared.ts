// src/cli/shared.ts
import { InvalidArgumentError } from 'commander';
import { loadConfig, type AppConfig } from '../core/config/app-config.js';
import { resolveConfigPath } from '../core/config/app-dirs.js';
import { errorMessage, isLikedropError } from '../core/errors.js';
import { createAppLogger, setLogLevel } from '../core/logger.js';

const logger = createAppLogger('cli');

export interface CommonOptions {
  debug?: boolean;
  config?: string;
}

export async function prepareCommand(options: CommonOptions): Promise<AppConfig> {
  if (options.debug) {
    setLogLevel('debug');
  }
  const configPath = resolveConfigPath(options.config);
  logger.debug(`Loading configuration from ${configPath}`);
  return loadConfig(configPath);
}

/**
 * Prints a fatal error and marks the process as failed.
 */
export function reportFatal(error: unknown): void {
  console.error(`Error: ${errorMessage(error)}`);
  if (isLikedropError(error) && error.suggestion) {
    console.error(`Hint: ${error.suggestion}`);
  }
  process.exitCode = 1;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}
