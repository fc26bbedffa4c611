import { PROPAGATION_DELAY_MS } from '../constants/defaults.js';
import { sleep } from '../transport/retry.js';
import { debugChallenge, logWarn } from '../utils/debug.js';
import { errorMessage } from '../utils/fs.js';

/** One dns-01 validation attempt */
export interface ChallengeRequest {
  domain: string;
  token: string;
  /** `_acme-challenge.<domain>` */
  recordName: string;
  recordValue: string;
}

export interface ChallengeProvider {
  readonly id: string;
  /** Upsert the TXT record, then wait for DNS propagation. */
  publish(request: ChallengeRequest, signal?: AbortSignal): Promise<void>;
  /** Remove the TXT record. Never throws. */
  cleanup(request: ChallengeRequest): Promise<void>;
}

export interface DnsChallengeProviderOptions {
  propagationDelayMs?: number;
}

/**
 * Base for REST-backed DNS vendors. Subclasses implement the record upsert
 * and removal; publish adds the propagation wait and cleanup turns failures
 * into warnings.
 */
export abstract class DnsChallengeProvider implements ChallengeProvider {
  abstract readonly id: string;
  protected readonly propagationDelayMs: number;

  constructor(options: DnsChallengeProviderOptions = {}) {
    this.propagationDelayMs = options.propagationDelayMs ?? PROPAGATION_DELAY_MS;
  }

  /** Create the TXT record or update the one that already has this name. */
  protected abstract upsertTxtRecord(request: ChallengeRequest, signal?: AbortSignal): Promise<void>;

  /** Delete the TXT record; an absent record is not an error. */
  protected abstract removeTxtRecord(request: ChallengeRequest): Promise<void>;

  async publish(request: ChallengeRequest, signal?: AbortSignal): Promise<void> {
    await this.upsertTxtRecord(request, signal);
    debugChallenge(
      '%s: published %s, waiting %dms for propagation',
      this.id,
      request.recordName,
      this.propagationDelayMs,
    );
    await sleep(this.propagationDelayMs, signal);
  }

  async cleanup(request: ChallengeRequest): Promise<void> {
    try {
      await this.removeTxtRecord(request);
      debugChallenge('%s: removed %s', this.id, request.recordName);
    } catch (err) {
      logWarn(
        `${this.id}: failed to remove ${request.recordName}: ${errorMessage(err)}`,
        err,
      );
    }
  }
}
