/**
 * Cross-process write locks (proper-lockfile).
 *
 * Every read-modify-write of a shared file runs inside withLock on that
 * file: a context artifact, the changelog, the processed index, the history
 * artifact and the session registry. The lock is a `<file>.lock` directory,
 * so the file itself need not exist yet.
 */

import lockfile from 'proper-lockfile';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ShiftlogError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

const RETRY_BACKOFF = { minTimeout: 100, maxTimeout: 1000, factor: 2 };
const DEFAULT_RETRIES = 5;
/** A lock older than this is considered abandoned by a crashed writer. */
const STALE_MS = 10_000;

export interface LockOptions {
  /** Attempts after the first before failing with LOCK_TIMEOUT. */
  retries?: number;
}

/**
 * Run `fn` holding an exclusive lock on `filePath`; released when `fn`
 * settles. Fails with LOCK_TIMEOUT when the lock stays held.
 */
export async function withLock<T>(
  filePath: string,
  fn: () => Promise<T>,
  options: LockOptions = {},
): Promise<T> {
  await mkdir(dirname(filePath), { recursive: true });
  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(filePath, {
      retries: { ...RETRY_BACKOFF, retries: options.retries ?? DEFAULT_RETRIES },
      stale: STALE_MS,
      realpath: false,
    });
  } catch (err) {
    throw new ShiftlogError(ExitCode.LOCK_TIMEOUT, `Failed to acquire lock: ${filePath}`, {
      fix: 'Another agent may be writing to this file. Wait and retry.',
      cause: err,
    });
  }

  try {
    return await fn();
  } finally {
    await release();
  }
}
