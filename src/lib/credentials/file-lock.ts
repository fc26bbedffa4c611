import { open, rm, stat } from 'fs/promises';

import { LOCK_RETRY_INTERVAL_MS, LOCK_STALE_MS, LOCK_TIMEOUT_MS } from '../constants/defaults.js';
import { IOError, LockTimeoutError } from '../errors/lifecycle-errors.js';
import { sleep } from '../transport/retry.js';
import { debugCredentials, logWarn } from '../utils/debug.js';
import { isErrnoException } from '../utils/fs.js';

export interface FileLockOptions {
  /** Give up waiting after this long (default 10 s) */
  timeoutMs?: number;
  retryIntervalMs?: number;
  /** A lock file older than this is assumed abandoned and removed (default 60 s) */
  staleMs?: number;
}

async function tryAcquire(lockPath: string): Promise<boolean> {
  try {
    const handle = await open(lockPath, 'wx', 0o600);
    try {
      await handle.writeFile(`${process.pid}\n`);
    } finally {
      await handle.close();
    }
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === 'EEXIST') return false;
    throw IOError.wrap('create lock file', lockPath, err);
  }
}

async function breakIfStale(lockPath: string, staleMs: number): Promise<void> {
  try {
    const info = await stat(lockPath);
    const age = Date.now() - info.mtimeMs;
    if (age > staleMs) {
      logWarn(`Removing stale lock ${lockPath} (${Math.round(age / 1000)}s old)`);
      await rm(lockPath, { force: true });
    }
  } catch (err) {
    // released between our open() and stat()
    if (isErrnoException(err) && err.code === 'ENOENT') return;
    throw IOError.wrap('inspect lock file', lockPath, err);
  }
}

/**
 * Run `fn` while holding an advisory lock: `<path>.lock`, created
 * exclusively. Only writers take the lock.
 */
export async function withFileLock<T>(path: string, fn: () => Promise<T>, options: FileLockOptions = {}): Promise<T> {
  const lockPath = `${path}.lock`;
  const timeoutMs = options.timeoutMs ?? LOCK_TIMEOUT_MS;
  const retryIntervalMs = options.retryIntervalMs ?? LOCK_RETRY_INTERVAL_MS;
  const staleMs = options.staleMs ?? LOCK_STALE_MS;
  const deadline = Date.now() + timeoutMs;

  while (!(await tryAcquire(lockPath))) {
    await breakIfStale(lockPath, staleMs);
    if (Date.now() >= deadline) {
      throw LockTimeoutError.waiting(lockPath, timeoutMs);
    }
    await sleep(retryIntervalMs);
  }
  debugCredentials('acquired %s', lockPath);

  try {
    return await fn();
  } finally {
    await rm(lockPath, { force: true });
    debugCredentials('released %s', lockPath);
  }
}
