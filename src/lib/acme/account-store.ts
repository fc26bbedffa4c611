import { mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';

import { AccountNotFoundError, IOError } from '../errors/lifecycle-errors.js';
import { debugAcme } from '../utils/debug.js';
import { isErrnoException, writeFileAtomic } from '../utils/fs.js';
import type { AccountKeys } from './request-signer.js';

/**
 * On-disk form of a registered account: the key pair as JWK plus the
 * account URL the authority assigned.
 */
export interface StoredAccount {
  privateKey: JsonWebKey;
  publicKey: JsonWebKey;
  kid: string;
  contact: string[];
  directoryUrl: string;
  createdAt: string;
}

const EC_P256 = { name: 'ECDSA', namedCurve: 'P-256' } as const;

function isJwk(value: unknown): value is JsonWebKey {
  return typeof value === 'object' && value !== null && 'kty' in value && typeof value.kty === 'string';
}

function isStoredAccount(value: unknown): value is StoredAccount {
  return (
    typeof value === 'object' &&
    value !== null &&
    'privateKey' in value &&
    isJwk(value.privateKey) &&
    'publicKey' in value &&
    isJwk(value.publicKey) &&
    'kid' in value &&
    typeof value.kid === 'string' &&
    'contact' in value &&
    Array.isArray(value.contact) &&
    'directoryUrl' in value &&
    typeof value.directoryUrl === 'string'
  );
}

export async function generateAccountKeys(): Promise<AccountKeys> {
  return crypto.subtle.generateKey(EC_P256, true, ['sign', 'verify']);
}

export async function importAccountKeys(account: StoredAccount): Promise<AccountKeys> {
  const [privateKey, publicKey] = await Promise.all([
    crypto.subtle.importKey('jwk', account.privateKey, EC_P256, true, ['sign']),
    crypto.subtle.importKey('jwk', account.publicKey, EC_P256, true, ['verify']),
  ]);
  return { privateKey, publicKey };
}

/**
 * Account key file (JSON, mode 0600). The file records the directory it was
 * registered with; an account for another directory counts as absent.
 */
export class AccountStore {
  constructor(private readonly path: string) {}

  get location(): string {
    return this.path;
  }

  async load(directoryUrl: string): Promise<StoredAccount | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw IOError.wrap('read account key', this.path, err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw AccountNotFoundError.malformed(this.path);
    }
    if (!isStoredAccount(parsed)) {
      throw AccountNotFoundError.malformed(this.path);
    }
    if (parsed.directoryUrl !== directoryUrl) {
      debugAcme('stored account belongs to %s, not %s', parsed.directoryUrl, directoryUrl);
      return null;
    }
    return parsed;
  }

  async save(keys: AccountKeys, account: Omit<StoredAccount, 'privateKey' | 'publicKey'>): Promise<StoredAccount> {
    const [privateKey, publicKey] = await Promise.all([
      crypto.subtle.exportKey('jwk', keys.privateKey),
      crypto.subtle.exportKey('jwk', keys.publicKey),
    ]);
    const stored: StoredAccount = { privateKey, publicKey, ...account };

    try {
      await mkdir(dirname(this.path), { recursive: true, mode: 0o700 });
      await writeFileAtomic(this.path, `${JSON.stringify(stored, null, 2)}\n`, 0o600);
    } catch (err) {
      throw IOError.wrap('write account key', this.path, err);
    }
    debugAcme('stored account %s at %s', account.kid, this.path);
    return stored;
  }
}
