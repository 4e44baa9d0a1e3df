/**
 * Directory and path resolution for tinct
 *
 * Every function takes the environment explicitly so callers and tests can
 * substitute their own.
 */

import { existsSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, isAbsolute, join, resolve } from 'node:path';

export const APP_DIR_NAME = 'tinct';
export const LOCAL_DIR_NAME = '.tinct';
export const RUNTIME_DIR_NAME = 'runtime';
export const CONFIG_FILE_NAME = 'config.toml';

export type Env = Record<string, string | undefined>;

/**
 * Expand a leading ~/ and resolve relative paths against cwd
 */
export function expandPath(filePath: string, cwd: string = process.cwd()): string {
  let p = filePath;
  if (p === '~') {
    p = homedir();
  } else if (p.startsWith('~/')) {
    p = join(homedir(), p.slice(2));
  }
  return isAbsolute(p) ? resolve(p) : resolve(cwd, p);
}

/**
 * User configuration directory
 *
 * TINCT_CONFIG_DIR, then $XDG_CONFIG_HOME/tinct, then ~/.config/tinct.
 */
export function configDir(env: Env = process.env): string {
  if (env.TINCT_CONFIG_DIR) {
    return expandPath(env.TINCT_CONFIG_DIR);
  }
  if (env.XDG_CONFIG_HOME) {
    return join(expandPath(env.XDG_CONFIG_HOME), APP_DIR_NAME);
  }
  return join(homedir(), '.config', APP_DIR_NAME);
}

/**
 * Directory holding the built-in flavor files
 *
 * TINCT_RUNTIME wins. Otherwise a runtime directory inside the config dir is
 * used when present, else `fallback` (the one shipped next to the program).
 */
export function runtimeDir(fallback: string, env: Env = process.env): string {
  if (env.TINCT_RUNTIME) {
    return expandPath(env.TINCT_RUNTIME);
  }
  const inConfig = join(configDir(env), RUNTIME_DIR_NAME);
  if (existsSync(inConfig)) {
    return inConfig;
  }
  return fallback;
}

export function configFile(env: Env = process.env): string {
  return join(configDir(env), CONFIG_FILE_NAME);
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Workspace-local config directories from `cwd` upwards, nearest first
 *
 * The walk stops at the first repository root (a directory containing .git),
 * which is included whether or not it has a .tinct directory.
 */
export function findLocalConfigDirs(cwd: string = process.cwd()): string[] {
  const directories: string[] = [];
  let current = resolve(cwd);

  for (;;) {
    if (existsSync(join(current, '.git'))) {
      directories.push(join(current, LOCAL_DIR_NAME));
      break;
    }
    if (isDirectory(join(current, LOCAL_DIR_NAME))) {
      directories.push(join(current, LOCAL_DIR_NAME));
    }
    const parent = dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  return directories;
}

/**
 * Replace the home directory prefix with ~ for display
 */
export function getDisplayPath(filePath: string): string {
  const home = homedir();
  if (filePath === home || filePath.startsWith(`${home}/`)) {
    return `~${filePath.slice(home.length)}`;
  }
  return filePath;
}
