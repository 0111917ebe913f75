/**
 * Write locks for season configs and `.vexcmd/config.json` files.
 *
 * `vexcmd season init` and `vexcmd config set` both rewrite a JSON file in
 * place through saveJson, which holds one of these locks for the whole
 * validate-then-write step. proper-lockfile marks a held lock with a
 * `<file>.lock` directory beside the target, so the target itself need not
 * exist yet.
 */

import lockfile from 'proper-lockfile';
import { ConfigError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';

/** Tuning for a single lock attempt. */
export interface LockOptions {
  /** Age in ms after which another writer's lock counts as abandoned. */
  stale?: number;
  /** Retries before giving up with LOCK_TIMEOUT. */
  retries?: number;
}

// Backoff 100ms, 200ms, 400ms: a CLI write finishes well inside that.
const RETRY_BACKOFF = {
  retries: 3,
  minTimeout: 100,
  maxTimeout: 1000,
  factor: 2,
};
const STALE_AFTER_MS = 10_000;

export type ReleaseFn = () => Promise<void>;

/**
 * Take the write lock on a season or config file.
 * @throws ConfigError LOCK_TIMEOUT when another writer keeps it past the retries
 */
export async function acquireLock(filePath: string, options: LockOptions = {}): Promise<ReleaseFn> {
  try {
    const release = await lockfile.lock(filePath, {
      realpath: false,
      stale: options.stale ?? STALE_AFTER_MS,
      retries: { ...RETRY_BACKOFF, retries: options.retries ?? RETRY_BACKOFF.retries },
    });
    getLogger('store').debug({ file: filePath }, 'Lock acquired');
    return release;
  } catch (err) {
    throw new ConfigError(
      ExitCode.LOCK_TIMEOUT,
      `Failed to acquire lock: ${filePath}`,
      {
        fix: `Another vexcmd process is writing this file. Wait and retry, or remove ${filePath}.lock if no writer is running.`,
        file: filePath,
        cause: err,
      },
    );
  }
}

/** Run `fn` holding the file's write lock; the lock is released even if `fn` throws. */
export async function withLock<T>(
  filePath: string,
  fn: () => Promise<T>,
  options?: LockOptions,
): Promise<T> {
  const release = await acquireLock(filePath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}
