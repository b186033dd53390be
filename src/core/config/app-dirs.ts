import { existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { APP_NAME, DEFAULT_CONFIG_FILE } from './constants.js';

export function getAppDataDir(
  appName: string = APP_NAME,
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (platform === 'win32') {
    const base = env.LOCALAPPDATA || env.APPDATA;
    if (base) {
      return path.join(base, appName);
    }
  }

  if (platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', appName);
  }

  const xdgConfigHome = env.XDG_CONFIG_HOME;
  if (xdgConfigHome) {
    return path.join(xdgConfigHome, appName);
  }

  return path.join(os.homedir(), '.config', appName);
}

/**
 * An explicit path always wins; otherwise `./config.env` when present, then
 * the per-user application directory.
 */
export function resolveConfigPath(explicit?: string, cwd: string = process.cwd()): string {
  if (explicit) {
    return path.resolve(cwd, explicit);
  }

  const local = path.join(cwd, DEFAULT_CONFIG_FILE);
  if (existsSync(local)) {
    return local;
  }

  return path.join(getAppDataDir(), DEFAULT_CONFIG_FILE);
}
