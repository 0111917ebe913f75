/**
 * Tests for JSON read/write with locking and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { readJson, readJsonRequired, readJsonObject, isPlainObject, saveJson } from '../json.js';
import { ConfigError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('readJson', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'vexcmd-json-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reads and parses valid JSON', async () => {
    const filePath = join(tempDir, 'data.json');
    await writeFile(filePath, '{"key": "value"}');
    expect(await readJson(filePath)).toEqual({ key: 'value' });
  });

  it('returns null for missing files', async () => {
    expect(await readJson(join(tempDir, 'missing.json'))).toBeNull();
  });

  it('throws VALIDATION_ERROR naming the file on invalid JSON', async () => {
    const filePath = join(tempDir, 'bad.json');
    await writeFile(filePath, '{invalid}');
    const err: unknown = await readJson(filePath).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ code: ExitCode.VALIDATION_ERROR, file: filePath });
    expect(String(err)).toContain(`Invalid JSON in ${filePath}`);
  });
});

describe('readJsonRequired', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'vexcmd-json-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns data for existing files', async () => {
    const filePath = join(tempDir, 'data.json');
    await writeFile(filePath, '[1, 2]');
    expect(await readJsonRequired(filePath)).toEqual([1, 2]);
  });

  it('throws NOT_FOUND with the given description', async () => {
    const filePath = join(tempDir, 'missing.json');
    await expect(readJsonRequired(filePath, 'Season config')).rejects.toMatchObject({
      code: ExitCode.NOT_FOUND,
      message: `Season config not found: ${filePath}`,
    });
  });

  it('returns a parsed null instead of reporting the file missing', async () => {
    const filePath = join(tempDir, 'null.json');
    await writeFile(filePath, 'null');
    expect(await readJsonRequired(filePath, 'Season config')).toBeNull();
  });
});

describe('readJsonObject', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'vexcmd-json-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('rejects a JSON null', async () => {
    const filePath = join(tempDir, 'null.json');
    await writeFile(filePath, 'null');
    await expect(readJsonObject(filePath)).rejects.toMatchObject({
      code: ExitCode.VALIDATION_ERROR,
      message: `Expected a JSON object in ${filePath}`,
    });
  });

  it('rejects a JSON array', async () => {
    const filePath = join(tempDir, 'list.json');
    await writeFile(filePath, '[]');
    await expect(readJsonObject(filePath)).rejects.toMatchObject({
      code: ExitCode.VALIDATION_ERROR,
      message: `Expected a JSON object in ${filePath}`,
    });
  });
});

describe('isPlainObject', () => {
  it('accepts objects only', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject('x')).toBe(false);
  });
});

describe('saveJson', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'vexcmd-json-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('creates parent directories and writes indented JSON', async () => {
    const filePath = join(tempDir, 'nested', 'config.json');
    await saveJson(filePath, { a: 1 });
    expect(await readFile(filePath, 'utf8')).toBe('{\n  "a": 1\n}\n');
  });

  it('releases the lock after writing', async () => {
    const filePath = join(tempDir, 'config.json');
    await saveJson(filePath, { a: 1 });
    expect(existsSync(`${filePath}.lock`)).toBe(false);
  });

  it('aborts the write when validation throws', async () => {
    const filePath = join(tempDir, 'config.json');
    await expect(
      saveJson(filePath, { a: 1 }, {
        validate: () => {
          throw new Error('nope');
        },
      }),
    ).rejects.toMatchObject({
      code: ExitCode.VALIDATION_ERROR,
      message: `Validation failed before write: ${filePath}`,
    });
    expect(existsSync(filePath)).toBe(false);
  });

  it('passes a ConfigError from validation through unchanged', async () => {
    const filePath = join(tempDir, 'config.json');
    const original = new ConfigError(ExitCode.ID_COLLISION, 'duplicate');
    await expect(
      saveJson(filePath, {}, {
        validate: () => {
          throw original;
        },
      }),
    ).rejects.toBe(original);
  });
});
