import { mkdir, readFile } from 'fs/promises';
import { join } from 'path';

import { PemConverter, X509Certificate } from '@peculiar/x509';

import { ConfigurationError, IOError } from '../errors/lifecycle-errors.js';
import { debugLifecycle } from '../utils/debug.js';
import { errorMessage, isErrnoException, writeFileAtomic } from '../utils/fs.js';
import type { IssuedCertificate } from './authority.js';

export interface CertificateRecord {
  domain: string;
  chainPath: string;
  keyPath: string;
  issuedAt: Date;
  expiresAt: Date;
}

export const CHAIN_FILE = 'fullchain.pem';
export const KEY_FILE = 'privkey.pem';

/** Directory name for a domain; `*.example.org` becomes `_wildcard.example.org` */
export function domainDirectoryName(domain: string): string {
  return domain.replace(/^\*\./, '_wildcard.');
}

/** Validity window of the first (leaf) certificate of a PEM chain */
export function readValidity(chainPem: string): { notBefore: Date; notAfter: Date } {
  const [leaf] = PemConverter.decode(chainPem);
  if (!leaf) {
    throw new Error('no PEM certificate found');
  }
  const cert = new X509Certificate(leaf);
  return { notBefore: cert.notBefore, notAfter: cert.notAfter };
}

/**
 * Certificate files under `<certs>/live/<domain>/`: fullchain.pem (0644) and
 * privkey.pem (0600). Renewal overwrites both in place.
 */
export class CertificateRepository {
  constructor(private readonly certificatesDir: string) {}

  directoryFor(domain: string): string {
    return join(this.certificatesDir, 'live', domainDirectoryName(domain));
  }

  pathsFor(domain: string): { chainPath: string; keyPath: string } {
    const dir = this.directoryFor(domain);
    return { chainPath: join(dir, CHAIN_FILE), keyPath: join(dir, KEY_FILE) };
  }

  async save(domain: string, issued: IssuedCertificate): Promise<CertificateRecord> {
    const { chainPath, keyPath } = this.pathsFor(domain);
    const dir = this.directoryFor(domain);

    let validity: { notBefore: Date; notAfter: Date };
    try {
      validity = readValidity(issued.chainPem);
    } catch (err) {
      throw ConfigurationError.unreadableCertificate(domain, chainPath, errorMessage(err));
    }

    try {
      await mkdir(dir, { recursive: true, mode: 0o755 });
      // key first: a chain on disk always has its key next to it
      await writeFileAtomic(keyPath, issued.privateKeyPem, 0o600);
      await writeFileAtomic(chainPath, issued.chainPem, 0o644);
    } catch (err) {
      throw IOError.wrap('store certificate in', dir, err, { domain, operation: 'store' });
    }

    debugLifecycle('stored %s (expires %s)', domain, validity.notAfter.toISOString());
    return { domain, chainPath, keyPath, issuedAt: validity.notBefore, expiresAt: validity.notAfter };
  }

  /** The stored record, or null when no chain is stored for the domain. */
  async load(domain: string): Promise<CertificateRecord | null> {
    const { chainPath, keyPath } = this.pathsFor(domain);

    let chainPem: string;
    try {
      chainPem = await readFile(chainPath, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw IOError.wrap('read certificate', chainPath, err, { domain });
    }

    try {
      const { notBefore, notAfter } = readValidity(chainPem);
      return { domain, chainPath, keyPath, issuedAt: notBefore, expiresAt: notAfter };
    } catch (err) {
      throw ConfigurationError.unreadableCertificate(domain, chainPath, errorMessage(err));
    }
  }
}
