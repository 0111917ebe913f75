/**
 * JSON read/write with locking and validation.
 * Every category, season and config file goes through here.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { atomicWriteJson, safeReadFile } from './atomic.js';
import { withLock } from './lock.js';
import { ConfigError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

function parseJson(content: string, filePath: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(
      ExitCode.VALIDATION_ERROR,
      `Invalid JSON in ${filePath}: ${detail}`,
      { file: filePath, cause: err },
    );
  }
}

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist. A file holding the literal
 * `null` also reads as null; use readJsonRequired to tell the two apart.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;
  return parseJson(content, filePath);
}

/**
 * Read a JSON file, throwing NOT_FOUND if it doesn't exist.
 * Whatever the file parses to, `null` included, is returned for the
 * caller to validate.
 */
export async function readJsonRequired(filePath: string, what = 'Required file'): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) {
    throw new ConfigError(
      ExitCode.NOT_FOUND,
      `${what} not found: ${filePath}`,
      { file: filePath },
    );
  }
  return parseJson(content, filePath);
}

/** Read a JSON file expected to hold an object; null when missing. */
export async function readJsonObject(filePath: string): Promise<Record<string, unknown> | null> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;
  const data = parseJson(content, filePath);
  if (!isPlainObject(data)) {
    throw new ConfigError(
      ExitCode.VALIDATION_ERROR,
      `Expected a JSON object in ${filePath}`,
      { file: filePath },
    );
  }
  return data;
}

/** True for non-null, non-array objects. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Options for saveJson. */
export interface SaveJsonOptions {
  /** JSON indentation. Default: 2. */
  indent?: number;
  /** Validation function. Called before write; throw to abort. */
  validate?: (data: unknown) => void | Promise<void>;
}

/**
 * Save JSON data with locking and optional validation:
 *   1. Acquire lock
 *   2. Validate data
 *   3. Atomic write (temp file -> rename)
 *   4. Release lock
 */
export async function saveJson(
  filePath: string,
  data: unknown,
  options?: SaveJsonOptions,
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await withLock(filePath, async () => {
    if (options?.validate) {
      try {
        await options.validate(data);
      } catch (err) {
        if (err instanceof ConfigError) throw err;
        throw new ConfigError(
          ExitCode.VALIDATION_ERROR,
          `Validation failed before write: ${filePath}`,
          { file: filePath, cause: err },
        );
      }
    }

    await atomicWriteJson(filePath, data, { indent: options?.indent });
  });
}
