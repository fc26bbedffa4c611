/**
 * RFC 8555 replay nonce pool
 *
 * Every JWS request carries a fresh nonce. Nonces returned in Replay-Nonce
 * headers are pooled and handed out newest first; when the pool is empty a
 * HEAD request to newNonce fetches one.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.5
 */

import { BadNonceError } from '../errors/acme-errors.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { headerValue, type HttpResponse } from '../transport/http-client.js';
import { debugNonce } from '../utils/debug.js';

export type NonceFetch = (url: string) => Promise<HttpResponse>;

export interface NonceManagerOptions {
  /** Absolute URL of the newNonce endpoint */
  newNonceUrl: string;
  fetch: NonceFetch;
  /** Age after which a pooled nonce is discarded (default 120 s) */
  maxAgeMs?: number;
  /** Pool size cap (default 16) */
  maxPool?: number;
}

interface NonceEntry {
  value: string;
  timestamp: number;
}

export class NonceManager {
  private readonly opts: Required<NonceManagerOptions>;
  private pool: NonceEntry[] = [];

  constructor(opts: NonceManagerOptions) {
    this.opts = {
      maxAgeMs: 120_000,
      maxPool: 16,
      ...opts,
    };
  }

  async get(): Promise<string> {
    this.cleanStale();

    const entry = this.pool.pop();
    if (entry) {
      debugNonce('returning pooled nonce, pool size now=%d', this.pool.length);
      return entry.value;
    }

    return this.fetchNewNonce();
  }

  /**
   * Run a signed request, retrying once with a fresh nonce when the server
   * answers `badNonce`. Any other response is returned to the caller.
   */
  async withNonceRetry(fn: (nonce: string) => Promise<HttpResponse>, maxAttempts = 2): Promise<HttpResponse> {
    let res: HttpResponse | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const nonce = await this.get();
      res = await fn(nonce);
      this.putFromResponse(res);

      debugNonce('attempt %d: HTTP %d (pool size %d)', attempt, res.statusCode, this.pool.length);

      if (res.statusCode < 400) return res;

      const problem = createErrorFromProblem(res.body, res.statusCode);
      if (!(problem instanceof BadNonceError)) return res;

      debugNonce('badNonce on attempt %d/%d', attempt, maxAttempts);
    }

    if (!res) {
      throw new BadNonceError('Nonce retry exhausted');
    }
    return res;
  }

  get size(): number {
    return this.pool.length;
  }

  clear(): void {
    this.pool = [];
  }

  private async fetchNewNonce(): Promise<string> {
    debugNonce('fetching new nonce from %s', this.opts.newNonceUrl);
    const res = await this.opts.fetch(this.opts.newNonceUrl);

    if (res.statusCode !== 200 && res.statusCode !== 204) {
      throw createErrorFromProblem(res.body, res.statusCode);
    }

    const nonce = headerValue(res.headers, 'replay-nonce');
    if (!nonce) {
      throw new BadNonceError('No replay-nonce header in newNonce response');
    }
    return nonce;
  }

  private putFromResponse(res: HttpResponse): void {
    const nonce = headerValue(res.headers, 'replay-nonce');
    if (!nonce) return;
    if (this.pool.some((entry) => entry.value === nonce)) return;

    this.pool.push({ value: nonce, timestamp: Date.now() });
    if (this.pool.length > this.opts.maxPool) {
      this.pool.shift();
    }
  }

  private cleanStale(): void {
    const cutoff = Date.now() - this.opts.maxAgeMs;
    const before = this.pool.length;
    this.pool = this.pool.filter((entry) => entry.timestamp >= cutoff);
    if (this.pool.length !== before) {
      debugNonce('discarded %d stale nonces', before - this.pool.length);
    }
  }
}
