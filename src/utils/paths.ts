/**
 * Cross-Platform Path Utilities
 *
 * Where mediactl keeps its configuration and player snapshot on each
 * platform. XDG variables win on Linux and macOS, APPDATA/LOCALAPPDATA on
 * Windows.
 */

import { join } from 'path';
import { homedir } from 'os';

export const APP_DIR_NAME = 'mediactl';

/**
 * Get Windows-appropriate config directory
 */
export function getConfigDir(): string {
  if (process.platform === 'win32') {
    return process.env.APPDATA || join(homedir(), 'AppData', 'Roaming');
  }
  return process.env.XDG_CONFIG_HOME || join(homedir(), '.config');
}

/**
 * Get Windows-appropriate data directory
 * Falls back to sensible locations instead of XDG paths
 */
export function getDataDir(): string {
  if (process.platform === 'win32') {
    return process.env.LOCALAPPDATA || join(homedir(), 'AppData', 'Local');
  }
  return process.env.XDG_DATA_HOME || join(homedir(), '.local', 'share');
}

export function getAppConfigDir(): string {
  return join(getConfigDir(), APP_DIR_NAME);
}

export function getAppDataDir(): string {
  return join(getDataDir(), APP_DIR_NAME);
}
