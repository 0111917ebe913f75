/**
 * Tests for config and season write locks.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { acquireLock, withLock } from '../lock.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('write locks', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'vexcmd-lock-'));
    configPath = join(tempDir, 'config.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('locks a file that does not exist yet and releases it', async () => {
    const release = await acquireLock(configPath);
    expect(existsSync(`${configPath}.lock`)).toBe(true);
    await release();
    expect(existsSync(`${configPath}.lock`)).toBe(false);
  });

  it('fails with LOCK_TIMEOUT while another writer holds the lock', async () => {
    await withLock(configPath, async () => {
      await expect(acquireLock(configPath, { retries: 0 })).rejects.toMatchObject({
        code: ExitCode.LOCK_TIMEOUT,
        message: `Failed to acquire lock: ${configPath}`,
        file: configPath,
      });
    });
  });

  it('releases the lock when the locked work throws', async () => {
    await expect(
      withLock(configPath, async () => {
        throw new Error('write failed');
      }),
    ).rejects.toThrow('write failed');
    expect(existsSync(`${configPath}.lock`)).toBe(false);
  });
});
