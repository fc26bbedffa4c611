/**
 * Issuance and renewal workflow
 *
 * ensure account -> create order -> publish dns-01 record -> submit challenge
 * -> poll validation -> finalize and download -> store files
 *
 * The challenge record is removed in a `finally` block once it has been
 * requested, so every attempt that got as far as an order cleans up exactly
 * once, whatever the outcome.
 *
 * Each call runs against one deadline, counted from the start of the call:
 * publication (with the propagation wait), validation polling and
 * finalization all have to finish before it.
 */

import {
  RENEWAL_THRESHOLD_DAYS,
  VALIDATION_POLL_FACTOR,
  VALIDATION_POLL_INITIAL_DELAY_MS,
  VALIDATION_POLL_MAX_DELAY_MS,
  VALIDATION_TIMEOUT_MS,
} from '../constants/defaults.js';
import type { ChallengeProvider, ChallengeRequest } from '../challenges/challenge-provider.js';
import { AcmeError } from '../errors/acme-errors.js';
import {
  AuthorityError,
  CertificateNotFoundError,
  DnsProviderError,
  IOError,
  InvalidArgumentError,
  InvalidDomainError,
  LifecycleError,
  NotDueForRenewalError,
  OperationCancelledError,
  TermsNotAcceptedError,
  UnexpectedError,
  ValidationTimeoutError,
  type ErrorContext,
} from '../errors/lifecycle-errors.js';
import { sleep, withRetry, type RetryConfig } from '../transport/retry.js';
import { debugLifecycle, logWarn } from '../utils/debug.js';
import { errorMessage } from '../utils/fs.js';
import { isValidEmail, isValidHostname, normalizeDomain } from '../utils/domain.js';
import type { AuthorityAccount, AuthorityOrder, CertificateAuthorityClient } from './authority.js';
import type { CertificateRecord, CertificateRepository } from './certificate-repository.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PollConfig {
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export const DEFAULT_POLL_CONFIG: PollConfig = {
  initialDelayMs: VALIDATION_POLL_INITIAL_DELAY_MS,
  maxDelayMs: VALIDATION_POLL_MAX_DELAY_MS,
  factor: VALIDATION_POLL_FACTOR,
};

export interface CertificateClientOptions {
  authority: CertificateAuthorityClient;
  challenges: ChallengeProvider;
  repository: CertificateRepository;
  renewalThresholdDays?: number;
  /** Deadline for one issue or renew call, unless the call passes its own */
  validationTimeoutMs?: number;
  poll?: Partial<PollConfig>;
  retry?: Partial<RetryConfig>;
  now?: () => Date;
}

export interface IssueOptions {
  signal?: AbortSignal;
  /** Overrides the client's deadline for this call */
  timeoutMs?: number;
}

export interface RenewOptions {
  /** Renew even when the certificate is not due */
  force?: boolean;
  /** Overrides the client's renewal threshold for this call */
  thresholdDays?: number;
  signal?: AbortSignal;
  /** Overrides the client's deadline for this call */
  timeoutMs?: number;
}

type Operation = 'issue' | 'renew';

type Step = 'ensureAccount' | 'createOrder' | 'publish' | 'submitChallenge' | 'checkValidation' | 'finalize' | 'store';

/** State of one issue or renew call */
interface Attempt {
  domain: string;
  operation: Operation;
  timeoutMs: number;
  /** Epoch milliseconds */
  deadline: number;
  polls: number;
  signal?: AbortSignal;
}

export class CertificateClient {
  private readonly authority: CertificateAuthorityClient;
  private readonly challenges: ChallengeProvider;
  private readonly repository: CertificateRepository;
  private readonly renewalThresholdDays: number;
  private readonly validationTimeoutMs: number;
  private readonly poll: PollConfig;
  private readonly retry: Partial<RetryConfig>;
  private readonly now: () => Date;

  constructor(options: CertificateClientOptions) {
    this.authority = options.authority;
    this.challenges = options.challenges;
    this.repository = options.repository;
    this.renewalThresholdDays = options.renewalThresholdDays ?? RENEWAL_THRESHOLD_DAYS;
    this.validationTimeoutMs = options.validationTimeoutMs ?? VALIDATION_TIMEOUT_MS;
    this.poll = { ...DEFAULT_POLL_CONFIG, ...options.poll };
    this.retry = options.retry ?? {};
    this.now = options.now ?? (() => new Date());
  }

  async issue(
    domain: string,
    contactEmail: string,
    agreeToTerms: boolean,
    options: IssueOptions = {},
  ): Promise<CertificateRecord> {
    const attempt = this.begin(normalizeDomain(domain), 'issue', options);
    const name = attempt.domain;
    if (agreeToTerms !== true) {
      throw TermsNotAcceptedError.create(name);
    }
    this.assertHostname(name, 'issue');
    if (!isValidEmail(contactEmail)) {
      throw new InvalidArgumentError(`"${contactEmail}" is not a valid contact email`, {
        domain: name,
        operation: 'issue',
      });
    }

    const account = await this.call(attempt, 'ensureAccount', () =>
      this.authority.ensureAccount({ contactEmail, termsOfServiceAgreed: true }),
    );
    return this.runProtocol(attempt, account);
  }

  /**
   * Renew a stored certificate. Fails with NotDueForRenewalError, before any
   * authority call, while the certificate has more than the threshold left.
   */
  async renew(domain: string, options: RenewOptions = {}): Promise<CertificateRecord> {
    const attempt = this.begin(normalizeDomain(domain), 'renew', options);
    const name = attempt.domain;
    this.assertHostname(name, 'renew');

    let current: CertificateRecord | null;
    try {
      current = await this.repository.load(name);
    } catch (err) {
      throw this.contextualize(err, attempt, 'store');
    }
    if (!current) {
      throw CertificateNotFoundError.forDomain(name, this.repository.pathsFor(name).chainPath);
    }

    const thresholdDays = options.thresholdDays ?? this.renewalThresholdDays;
    const remainingMs = current.expiresAt.getTime() - this.now().getTime();
    if (!options.force && remainingMs > thresholdDays * DAY_MS) {
      throw new NotDueForRenewalError(name, current.expiresAt, thresholdDays, Math.floor(remainingMs / DAY_MS));
    }

    debugLifecycle('renewing %s (expires %s, force=%s)', name, current.expiresAt.toISOString(), Boolean(options.force));
    const account = await this.call(attempt, 'ensureAccount', () =>
      this.authority.ensureAccount({ termsOfServiceAgreed: false, reuseOnly: true }),
    );
    return this.runProtocol(attempt, account);
  }

  /** True when the stored certificate is within the renewal window (or missing). */
  async isDue(domain: string, thresholdDays = this.renewalThresholdDays): Promise<boolean> {
    const current = await this.repository.load(normalizeDomain(domain));
    if (!current) return true;
    return current.expiresAt.getTime() - this.now().getTime() <= thresholdDays * DAY_MS;
  }

  private begin(domain: string, operation: Operation, options: IssueOptions): Attempt {
    const timeoutMs = options.timeoutMs ?? this.validationTimeoutMs;
    return { domain, operation, timeoutMs, deadline: Date.now() + timeoutMs, polls: 0, signal: options.signal };
  }

  private async runProtocol(attempt: Attempt, account: AuthorityAccount): Promise<CertificateRecord> {
    const { domain, operation } = attempt;
    const order = await this.call(attempt, 'createOrder', () => this.authority.createOrder(account, domain));

    const request: ChallengeRequest = {
      domain,
      token: order.token,
      recordName: order.recordName,
      recordValue: order.recordValue,
    };

    let step: Step = 'publish';
    try {
      await this.beforeDeadline(attempt, (signal) => this.challenges.publish(request, signal));

      step = 'submitChallenge';
      await this.beforeDeadline(attempt, (signal) =>
        this.call(attempt, 'submitChallenge', () => this.authority.submitChallenge(account, order), signal),
      );

      step = 'checkValidation';
      await this.awaitValidation(attempt, account, order);

      step = 'finalize';
      const issued = await this.beforeDeadline(attempt, (signal) =>
        this.call(attempt, 'finalize', () => this.authority.finalize(account, order, { signal }), signal),
      );
      if (!issued.chainPem.trim() || !issued.privateKeyPem.trim()) {
        throw AuthorityError.emptyCertificate(domain, operation);
      }

      step = 'store';
      const record = await this.repository.save(domain, issued);
      debugLifecycle('%s %s: done, expires %s', operation, domain, record.expiresAt.toISOString());
      return record;
    } catch (err) {
      throw this.contextualize(err, attempt, step);
    } finally {
      await this.cleanup(request);
    }
  }

  private async awaitValidation(attempt: Attempt, account: AuthorityAccount, order: AuthorityOrder): Promise<void> {
    let delay = this.poll.initialDelayMs;

    for (;;) {
      const status = await this.call(attempt, 'checkValidation', () => this.authority.checkValidation(account, order));
      attempt.polls++;
      debugLifecycle('%s %s: validation %s after %d polls', attempt.operation, attempt.domain, status.state, attempt.polls);

      if (status.state === 'valid') return;
      if (status.state === 'invalid') {
        throw AuthorityError.challengeRejected(attempt.domain, attempt.operation, status.detail);
      }

      const remaining = attempt.deadline - Date.now();
      if (remaining <= 0) {
        throw this.timedOut(attempt);
      }
      await sleep(Math.min(delay, remaining), attempt.signal);
      delay = Math.min(delay * this.poll.factor, this.poll.maxDelayMs);
    }
  }

  /**
   * Run a step under the call's deadline. The step gets a signal that aborts
   * on the caller's signal or when the deadline passes; the latter rejects
   * with ValidationTimeoutError.
   */
  private async beforeDeadline<T>(attempt: Attempt, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(attempt.signal?.reason);
    if (attempt.signal?.aborted) controller.abort(attempt.signal.reason);
    attempt.signal?.addEventListener('abort', onAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => {
          const error = this.timedOut(attempt);
          reject(error);
          controller.abort(error);
        },
        Math.max(attempt.deadline - Date.now(), 0),
      );
    });

    try {
      return await Promise.race([fn(controller.signal), expired]);
    } finally {
      clearTimeout(timer);
      attempt.signal?.removeEventListener('abort', onAbort);
    }
  }

  private timedOut(attempt: Attempt): ValidationTimeoutError {
    return ValidationTimeoutError.after(attempt.domain, attempt.operation, attempt.timeoutMs, attempt.polls);
  }

  private async cleanup(request: ChallengeRequest): Promise<void> {
    try {
      await this.challenges.cleanup(request);
    } catch (err) {
      logWarn(`Cleanup of ${request.recordName} failed: ${errorMessage(err)}`, err);
    }
  }

  /**
   * Authority call with transient-failure retry. Protocol errors leave as
   * AuthorityError carrying the step, domain and operation.
   */
  private async call<T>(
    attempt: Attempt,
    step: Step,
    fn: () => Promise<T>,
    signal: AbortSignal | undefined = attempt.signal,
  ): Promise<T> {
    const ctx: ErrorContext = { domain: attempt.domain, operation: attempt.operation, step };
    try {
      return await withRetry(fn, this.retry, `${attempt.operation} ${attempt.domain} ${step}`, signal);
    } catch (err) {
      if (signal?.aborted || err instanceof LifecycleError) {
        throw this.contextualize(err, attempt, step, signal);
      }
      if (err instanceof AcmeError) {
        throw new AuthorityError(
          `${attempt.operation} ${attempt.domain}: ${step} rejected by the certificate authority: ${err.detail}`,
          { ...ctx, problemType: err.type, status: err.status },
          { cause: err },
        );
      }
      throw new AuthorityError(`${attempt.operation} ${attempt.domain}: ${step} failed: ${errorMessage(err)}`, ctx, {
        cause: err,
      });
    }
  }

  /**
   * Attach the domain, operation and step. Errors from outside the
   * LifecycleError hierarchy are wrapped by the step they came from.
   */
  private contextualize(
    err: unknown,
    attempt: Attempt,
    step: Step,
    signal: AbortSignal | undefined = attempt.signal,
  ): LifecycleError {
    const ctx: ErrorContext = { domain: attempt.domain, operation: attempt.operation, step };
    if (signal?.aborted && !(err instanceof OperationCancelledError) && !(err instanceof ValidationTimeoutError)) {
      return OperationCancelledError.create().withContext(ctx).prefixed(attempt.operation, attempt.domain);
    }
    if (!(err instanceof LifecycleError)) {
      return this.wrapForeign(err, ctx, attempt, step);
    }
    return err.withContext(ctx).prefixed(attempt.operation, attempt.domain);
  }

  private wrapForeign(err: unknown, ctx: ErrorContext, attempt: Attempt, step: Step): LifecycleError {
    const message = `${attempt.operation} ${attempt.domain}: ${step} failed: ${errorMessage(err)}`;
    switch (step) {
      case 'publish':
        return new DnsProviderError(message, ctx, { cause: err });
      case 'store':
        return new IOError(message, ctx, { cause: err });
      default:
        return new UnexpectedError(message, ctx, { cause: err });
    }
  }

  private assertHostname(domain: string, operation: Operation): void {
    if (!isValidHostname(domain)) {
      throw InvalidDomainError.create(domain, operation);
    }
  }
}
