/**
 * DNS provider API tokens on disk
 *
 * One file per provider, `<dir>/<providerId>.ini`, mode 0600 inside a 0700
 * directory:
 *
 *   # cloudflare API credentials
 *   # Created: 2026-10-18T00:00:00.000Z
 *   provider = cloudflare
 *   created = 2026-10-18T00:00:00.000Z
 *   dns_cloudflare_api_token = <token>
 */

import { mkdir, readFile } from 'fs/promises';
import { join } from 'path';

import {
  AlreadyExistsError,
  CredentialNotFoundError,
  EmptySecretError,
  IOError,
  InvalidArgumentError,
  MalformedCredentialError,
} from '../errors/lifecycle-errors.js';
import { debugCredentials } from '../utils/debug.js';
import { fileExists, isErrnoException, writeFileAtomic } from '../utils/fs.js';
import { withFileLock, type FileLockOptions } from './file-lock.js';

export interface Credential {
  providerId: string;
  secret: string;
  createdAt: Date;
}

export interface SaveCredentialOptions {
  overwrite?: boolean;
}

const PROVIDER_ID = /^[a-z0-9][a-z0-9_-]*$/;

/** `dns_<provider>_api_token`, with `-` folded to `_` */
export function secretKeyFor(providerId: string): string {
  return `dns_${providerId.replace(/-/g, '_')}_api_token`;
}

export function formatCredentialFile(credential: Credential): string {
  const created = credential.createdAt.toISOString();
  return [
    `# ${credential.providerId} API credentials`,
    `# Created: ${created}`,
    `provider = ${credential.providerId}`,
    `created = ${created}`,
    `${secretKeyFor(credential.providerId)} = ${credential.secret}`,
    '',
  ].join('\n');
}

/** `key = value` lines; blank lines and `#` comments are skipped. */
export function parseCredentialFile(text: string): Map<string, string> {
  const entries = new Map<string, string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    entries.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
  }
  return entries;
}

export class CredentialStore {
  constructor(
    private readonly directory: string,
    private readonly lockOptions: FileLockOptions = {},
  ) {}

  pathFor(providerId: string): string {
    if (!PROVIDER_ID.test(providerId)) {
      throw new InvalidArgumentError(`Invalid provider id "${providerId}"`, { providerId });
    }
    return join(this.directory, `${providerId}.ini`);
  }

  exists(providerId: string): Promise<boolean> {
    return fileExists(this.pathFor(providerId));
  }

  /**
   * Store the secret for a provider and return the file path. An existing
   * file is only replaced with `overwrite`; otherwise it is left untouched.
   */
  async save(providerId: string, secret: string, options: SaveCredentialOptions = {}): Promise<string> {
    const path = this.pathFor(providerId);
    const token = secret.trim();
    if (!token) {
      throw EmptySecretError.forProvider(providerId);
    }

    try {
      await mkdir(this.directory, { recursive: true, mode: 0o700 });
    } catch (err) {
      throw IOError.wrap('create credentials directory', this.directory, err, { providerId });
    }

    return withFileLock(
      path,
      async () => {
        if (!options.overwrite && (await fileExists(path))) {
          throw AlreadyExistsError.credential(providerId, path);
        }

        const content = formatCredentialFile({ providerId, secret: token, createdAt: new Date() });
        try {
          await writeFileAtomic(path, content, 0o600);
        } catch (err) {
          throw IOError.wrap('write credentials', path, err, { providerId });
        }

        debugCredentials('saved %s credentials to %s', providerId, path);
        return path;
      },
      this.lockOptions,
    );
  }

  async load(providerId: string): Promise<Credential> {
    const path = this.pathFor(providerId);

    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw CredentialNotFoundError.forProvider(providerId, path);
      }
      throw IOError.wrap('read credentials', path, err, { providerId });
    }

    const entries = parseCredentialFile(text);
    const key = secretKeyFor(providerId);
    const secret = entries.get(key);
    if (!secret) {
      throw MalformedCredentialError.missingSecret(providerId, path, key);
    }

    const created = new Date(entries.get('created') ?? '');
    return {
      providerId,
      secret,
      createdAt: Number.isNaN(created.getTime()) ? new Date(0) : created,
    };
  }
}
