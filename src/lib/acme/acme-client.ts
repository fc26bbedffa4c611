import { createErrorFromProblem } from '../errors/factory.js';
import { AcmeError } from '../errors/acme-errors.js';
import { HttpClient } from '../transport/http-client.js';
import { debugAcme } from '../utils/debug.js';
import type { AcmeDirectoryEntry } from './directory.js';
import { NonceManager } from './nonce-manager.js';
import type { AcmeDirectory } from './types.js';

function isAcmeDirectory(value: unknown): value is AcmeDirectory {
  return (
    typeof value === 'object' &&
    value !== null &&
    'newNonce' in value &&
    typeof value.newNonce === 'string' &&
    'newAccount' in value &&
    typeof value.newAccount === 'string' &&
    'newOrder' in value &&
    typeof value.newOrder === 'string'
  );
}

/**
 * Entry point to an ACME server: fetches and caches the directory and owns
 * the HTTP transport and the nonce pool shared by every signed request.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.1
 */
export class AcmeClient {
  public readonly directoryUrl: string;
  private readonly http: HttpClient;

  private directory?: AcmeDirectory;
  private nonce?: NonceManager;

  constructor(directoryUrlOrEntry: string | AcmeDirectoryEntry, http: HttpClient = new HttpClient()) {
    this.directoryUrl =
      typeof directoryUrlOrEntry === 'string' ? directoryUrlOrEntry : directoryUrlOrEntry.directoryUrl;
    this.http = http;
  }

  async getDirectory(): Promise<AcmeDirectory> {
    if (this.directory) return this.directory;

    debugAcme('fetching directory %s', this.directoryUrl);
    const res = await this.http.get(this.directoryUrl);
    if (res.statusCode !== 200) {
      throw createErrorFromProblem(res.body, res.statusCode);
    }
    if (!isAcmeDirectory(res.body)) {
      throw new AcmeError(`Invalid ACME directory at ${this.directoryUrl}`, res.statusCode);
    }

    this.directory = res.body;
    return this.directory;
  }

  async getNonceManager(): Promise<NonceManager> {
    if (!this.nonce) {
      const directory = await this.getDirectory();
      this.nonce = new NonceManager({
        newNonceUrl: directory.newNonce,
        fetch: (url: string) => this.http.head(url),
      });
    }
    return this.nonce;
  }

  getHttp(): HttpClient {
    return this.http;
  }
}
