/**
 * Configuration Loader
 *
 * Handles loading and merging configuration from multiple sources, lowest
 * priority first:
 * - Defaults
 * - User config: $XDG_CONFIG_HOME/mediactl/config.json
 * - Project config: ./.mediactl.json
 * - Environment variables (MEDIACTL_STATE_FILE, MEDIACTL_IGNORE_PLAYERS)
 *
 * Command line flags are applied on top by the CLI.
 */

import { readFileSync, existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { z } from 'zod';
import { getAppConfigDir, getAppDataDir } from '../utils/paths.js';
import { debugLog } from '../utils/debug.js';
import { parsePlayerList } from '../players/index.js';

export const ConfigFileSchema = z
  .object({
    /** Player snapshot document used as the player bus */
    stateFile: z.string().min(1).optional(),
    /** Players never selected, same matching rules as --ignore-player */
    ignorePlayers: z.array(z.string()).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface MediactlConfig {
  stateFile: string;
  ignorePlayers: string[];
}

export function getDefaultConfig(): MediactlConfig {
  return {
    stateFile: join(getAppDataDir(), 'players.json'),
    ignorePlayers: [],
  };
}

/**
 * Configuration file locations
 */
export function getConfigPaths(cwd: string = process.cwd()): { user: string; project: string } {
  return {
    user: join(getAppConfigDir(), 'config.json'),
    project: join(cwd, '.mediactl.json'),
  };
}

/**
 * Load and validate a JSON config file.
 * Missing, unreadable and invalid files are skipped (null).
 * A relative stateFile is resolved against the file's own directory.
 */
export function loadConfigFile(path: string): ConfigFile | null {
  if (!existsSync(path)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    debugLog('config', `Skipping unreadable config ${path}`, err);
    return null;
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    debugLog('config', `Skipping invalid config ${path}: ${result.error.issues.map((i) => i.message).join('; ')}`);
    return null;
  }

  const config = result.data;
  if (config.stateFile !== undefined) {
    config.stateFile = resolve(dirname(path), config.stateFile);
  }
  return config;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ConfigFile {
  const config: ConfigFile = {};

  if (env.MEDIACTL_STATE_FILE) {
    config.stateFile = resolve(cwd, env.MEDIACTL_STATE_FILE);
  }
  const ignored = parsePlayerList(env.MEDIACTL_IGNORE_PLAYERS);
  if (ignored !== undefined) {
    config.ignorePlayers = ignored;
  }

  return config;
}

function applyLayer(base: MediactlConfig, layer: ConfigFile | null): MediactlConfig {
  if (!layer) return base;
  return {
    stateFile: layer.stateFile ?? base.stateFile,
    ignorePlayers: layer.ignorePlayers ?? base.ignorePlayers,
  };
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): MediactlConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const paths = getConfigPaths(cwd);

  let config = getDefaultConfig();
  config = applyLayer(config, loadConfigFile(paths.user));
  config = applyLayer(config, loadConfigFile(paths.project));
  config = applyLayer(config, loadEnvConfig(env, cwd));

  debugLog('config', `Using player snapshot ${config.stateFile}`);
  return config;
}
