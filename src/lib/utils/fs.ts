import { randomBytes } from 'crypto';
import { chmod, rename, rm, stat, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';

/**
 * Errors raised by Node's own modules can come from another realm (Jest runs
 * tests in a vm context), so these checks look at the shape, not the prototype.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && 'message' in error;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return false;
    throw err;
  }
}

/**
 * Write through a temporary file in the target's directory and rename it over
 * the target, so readers see either the old or the new content.
 */
export async function writeFileAtomic(path: string, data: string, mode = 0o644): Promise<void> {
  const suffix = `${process.pid}.${randomBytes(4).toString('hex')}`;
  const tmp = join(dirname(path), `.${basename(path)}.${suffix}.tmp`);

  try {
    await writeFile(tmp, data, { mode });
    // writeFile's mode is filtered through the umask
    await chmod(tmp, mode);
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}
