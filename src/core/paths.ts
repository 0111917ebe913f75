/**
 * Path resolution for vexcmd.
 *
 * Environment variables:
 *   VEXCMD_HOME  - Global directory (default: ~/.vexcmd)
 *   VEXCMD_ROOT  - Project root holding command_library/ and seasons/ (default: cwd)
 *
 * Layout under a project root:
 *   .vexcmd/config.json              project config
 *   .vexcmd/logs/                    rotated log files
 *   command_library/<category>.json  reusable command categories
 *   seasons/<season>/config.json     season configs
 */

import { resolve, join, isAbsolute } from 'node:path';
import { homedir } from 'node:os';

/** Name of the per-project state directory. */
export const STATE_DIR_NAME = '.vexcmd';

/** File name of a season config inside its season directory. */
export const SEASON_CONFIG_FILE = 'config.json';

/**
 * Get the global vexcmd home directory.
 * Respects VEXCMD_HOME env var, defaults to ~/.vexcmd.
 */
export function getVexcmdHome(): string {
  return process.env['VEXCMD_HOME'] ?? join(homedir(), STATE_DIR_NAME);
}

/** Get the global config file path. */
export function getGlobalConfigPath(): string {
  return join(getVexcmdHome(), 'config.json');
}

/**
 * Get the project root.
 * An explicit root wins, then VEXCMD_ROOT, then the current directory.
 */
export function getProjectRoot(root?: string): string {
  return resolve(root ?? process.env['VEXCMD_ROOT'] ?? process.cwd());
}

/** Get the absolute path to the project's .vexcmd directory. */
export function getStateDir(root?: string): string {
  return join(getProjectRoot(root), STATE_DIR_NAME);
}

/** Get the project config file path. */
export function getConfigPath(root?: string): string {
  return join(getStateDir(root), 'config.json');
}

/**
 * Resolve a project-relative path to an absolute path.
 * Absolute paths pass through; a leading tilde expands to the home directory.
 */
export function resolveProjectPath(relativePath: string, root?: string): string {
  if (isAbsolute(relativePath)) {
    return relativePath;
  }
  if (relativePath.startsWith('~/') || relativePath === '~') {
    return resolve(homedir(), relativePath.slice(2));
  }
  return resolve(getProjectRoot(root), relativePath);
}

/** Absolute path of a category file inside a library directory. */
export function getCategoryPath(libraryDir: string, category: string): string {
  return join(libraryDir, `${category}.json`);
}

/** Absolute path of a season's config file inside a seasons directory. */
export function getSeasonConfigPath(seasonsDir: string, season: string): string {
  return join(seasonsDir, season, SEASON_CONFIG_FILE);
}
