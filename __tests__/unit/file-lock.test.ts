import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { stat, utimes, writeFile } from 'fs/promises';
import { join } from 'path';

import { LockTimeoutError, setLogger, sleep, withFileLock } from '../../src/index.js';
import { makeTempDir, removeTempDir } from '../helpers/tmp.js';

describe('withFileLock', () => {
  let dir: string;
  let target: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    target = join(dir, 'cloudflare.ini');
  });

  afterEach(async () => {
    setLogger(undefined);
    await removeTempDir(dir);
  });

  it('returns the result and removes the lock file', async () => {
    const result = await withFileLock(target, async () => 'done');

    expect(result).toBe('done');
    await expect(stat(`${target}.lock`)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('removes the lock file when the callback throws', async () => {
    await expect(
      withFileLock(target, async () => {
        throw new Error('write failed');
      }),
    ).rejects.toThrow('write failed');
    await expect(stat(`${target}.lock`)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('runs concurrent holders one at a time', async () => {
    let active = 0;
    let maxActive = 0;
    const hold = () =>
      withFileLock(
        target,
        async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await sleep(20);
          active--;
        },
        { retryIntervalMs: 2 },
      );

    await Promise.all([hold(), hold(), hold()]);

    expect(maxActive).toBe(1);
  });

  it('breaks a stale lock left by a crashed writer', async () => {
    const warnings: string[] = [];
    setLogger((message) => warnings.push(message));
    const lockPath = `${target}.lock`;
    await writeFile(lockPath, '99999\n');
    const old = new Date(Date.now() - 5 * 60 * 1000);
    await utimes(lockPath, old, old);

    const result = await withFileLock(target, async () => 42, { staleMs: 1000, retryIntervalMs: 2 });

    expect(result).toBe(42);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^WARN: Removing stale lock .*cloudflare\.ini\.lock \(\d+s old\)$/);
  });

  it('gives up when a live lock is held past the timeout', async () => {
    const lockPath = `${target}.lock`;
    await writeFile(lockPath, '99999\n');
    let called = false;

    const error = await withFileLock(
      target,
      async () => {
        called = true;
      },
      { timeoutMs: 30, retryIntervalMs: 5 },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LockTimeoutError);
    expect(called).toBe(false);
    await expect(stat(lockPath)).resolves.toBeDefined();
  });
});
