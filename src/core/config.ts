/**
 * Configuration engine for vexcmd.
 *
 * Resolution priority: Environment vars > Project config > Global config > Defaults
 */

import type { ConfigSource, ResolvedValue, VexcmdConfig } from '../types/config.js';
import { isPlainObject, readJsonObject, saveJson } from '../store/json.js';
import { ConfigError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { getConfigPath, getGlobalConfigPath, getProjectRoot, resolveProjectPath } from './paths.js';

/** Default configuration values. */
const DEFAULTS: VexcmdConfig = {
  version: '1.0.0',
  defaultSeason: '',
  paths: {
    libraryDir: 'command_library',
    seasonsDir: 'seasons',
  },
  output: {
    defaultFormat: 'json',
    showColor: true,
  },
  logging: {
    level: 'info',
    filePath: 'logs/vexcmd.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'VEXCMD_LIBRARY_DIR': 'paths.libraryDir',
  'VEXCMD_SEASONS_DIR': 'paths.seasonsDir',
  'VEXCMD_DEFAULT_SEASON': 'defaultSeason',
  'VEXCMD_FORMAT': 'output.defaultFormat',
  'VEXCMD_OUTPUT_SHOW_COLOR': 'output.showColor',
  'VEXCMD_LOG_LEVEL': 'logging.level',
  'VEXCMD_LOG_FILE': 'logging.filePath',
};

/** Get a copy of the built-in defaults. */
export function getDefaultConfig(): VexcmdConfig {
  return structuredClone(DEFAULTS);
}

/**
 * Get a value at a dotted path from an object.
 */
export function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = Object.hasOwn(current, part) ? current[part] : undefined;
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
export function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop() ?? path;
  let current = obj;
  for (const part of parts) {
    const next = Object.hasOwn(current, part) ? current[part] : undefined;
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse a string value into its appropriate JS type.
 * Handles booleans, null, integers, floats, and JSON.
 */
export function parseConfigValue(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === 'null') return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * Parse a raw string for the config key it is written to.
 * Keys whose default is a string keep the text as given, so a season
 * named "2026" stays a string.
 */
export function parseConfigValueFor(path: string, value: unknown): unknown {
  if (typeof getNestedValue({ ...DEFAULTS }, path) === 'string') return value;
  return parseConfigValue(value);
}

// Hand-edited files may hold a bare number where a string is expected.
function pickString(value: unknown, fallback: string): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return fallback;
}

function pickNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function pickOneOf<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
const OUTPUT_FORMATS = ['json', 'human'] as const;

/**
 * Coerce a merged raw object into a VexcmdConfig.
 * Keys with the wrong type fall back to their defaults.
 */
export function normalizeConfig(raw: Record<string, unknown>): VexcmdConfig {
  const get = (path: string): unknown => getNestedValue(raw, path);
  return {
    version: pickString(get('version'), DEFAULTS.version),
    defaultSeason: pickString(get('defaultSeason'), DEFAULTS.defaultSeason),
    paths: {
      libraryDir: pickString(get('paths.libraryDir'), DEFAULTS.paths.libraryDir),
      seasonsDir: pickString(get('paths.seasonsDir'), DEFAULTS.paths.seasonsDir),
    },
    output: {
      defaultFormat: pickOneOf(get('output.defaultFormat'), OUTPUT_FORMATS, DEFAULTS.output.defaultFormat),
      showColor: pickBoolean(get('output.showColor'), DEFAULTS.output.showColor),
    },
    logging: {
      level: pickOneOf(get('logging.level'), LOG_LEVELS, DEFAULTS.logging.level),
      filePath: pickString(get('logging.filePath'), DEFAULTS.logging.filePath),
      maxFileSize: pickNumber(get('logging.maxFileSize'), DEFAULTS.logging.maxFileSize),
      maxFiles: pickNumber(get('logging.maxFiles'), DEFAULTS.logging.maxFiles),
    },
  };
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(root?: string): Promise<VexcmdConfig> {
  let merged: Record<string, unknown> = { ...getDefaultConfig() };

  // Layer 1: Global config
  const globalConfig = await readJsonObject(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  // Layer 2: Project config
  const projectConfig = await readJsonObject(getConfigPath(root));
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  // Layer 3: Environment variables
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseConfigValueFor(configPath, envValue));
    }
  }

  return normalizeConfig(merged);
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(
  path: string,
  root?: string,
): Promise<ResolvedValue<unknown>> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseConfigValueFor(path, envValue), source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, string]> = [
    ['project', getConfigPath(root)],
    ['global', getGlobalConfigPath()],
  ];
  for (const [source, filePath] of layers) {
    const config = await readJsonObject(filePath);
    const val = config ? getNestedValue(config, path) : undefined;
    if (val !== undefined) {
      return { value: val, source };
    }
  }

  return { value: getNestedValue({ ...getDefaultConfig() }, path), source: 'default' };
}

const CONFIG_KEY_SEGMENT = /^[A-Za-z0-9_-]+$/;
const RESERVED_KEY_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

/**
 * Set a config value in the project or global config file (dot-notation supported).
 * Creates intermediate objects as needed. String values are parsed
 * into booleans, numbers, null or JSON where they look like one, except
 * for keys whose default is a string.
 * @throws ConfigError INVALID_INPUT for a malformed or reserved key
 */
export async function setConfigValue(
  key: string,
  value: unknown,
  root?: string,
  opts?: { global?: boolean },
): Promise<{ key: string; value: unknown; scope: 'project' | 'global' }> {
  const badSegment = key.split('.').find(
    (part) => !CONFIG_KEY_SEGMENT.test(part) || RESERVED_KEY_SEGMENTS.has(part),
  );
  if (badSegment !== undefined) {
    throw new ConfigError(ExitCode.INVALID_INPUT, `Invalid config key: '${key}'`, {
      fix: 'Use dotted names such as output.defaultFormat',
    });
  }

  const configPath = opts?.global ? getGlobalConfigPath() : getConfigPath(root);
  const config = (await readJsonObject(configPath)) ?? {};

  const parsedValue = parseConfigValueFor(key, value);
  setNestedValue(config, key, parsedValue);

  await saveJson(configPath, config);

  return { key, value: parsedValue, scope: opts?.global ? 'global' : 'project' };
}

/** Absolute library and seasons directories for a project. */
export interface DataDirs {
  root: string;
  libraryDir: string;
  seasonsDir: string;
}

/** Resolve the configured data directories against the project root. */
export function resolveDataDirs(config: VexcmdConfig, root?: string): DataDirs {
  const projectRoot = getProjectRoot(root);
  return {
    root: projectRoot,
    libraryDir: resolveProjectPath(config.paths.libraryDir, projectRoot),
    seasonsDir: resolveProjectPath(config.paths.seasonsDir, projectRoot),
  };
}
