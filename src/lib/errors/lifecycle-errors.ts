/**
 * Certificate lifecycle errors
 *
 * Every failure surfaced by the credential store, the challenge providers, the
 * certificate client and the config synchronizer is one of these classes. Each
 * carries a stable `code`, a `category` used by the CLI to pick an exit code,
 * and a `context` naming the domain and the operation that failed.
 *
 * Server-side ACME problem documents are modelled separately by `AcmeError`;
 * `AuthorityError` wraps them once they leave the protocol layer.
 */

import { errorMessage } from '../utils/fs.js';

export type ErrorCategory = 'configuration' | 'validation' | 'authority' | 'dns' | 'io' | 'lifecycle';

export interface ErrorContext {
  domain?: string;
  operation?: string;
  [key: string]: unknown;
}

export abstract class LifecycleError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.context = { ...context };

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get domain(): string | undefined {
    return this.context.domain;
  }

  get operation(): string | undefined {
    return this.context.operation;
  }

  /** Fill in context fields that are not set yet; existing values win. */
  withContext(extra: ErrorContext): this {
    for (const [key, value] of Object.entries(extra)) {
      if (this.context[key] === undefined && value !== undefined) {
        this.context[key] = value;
      }
    }
    return this;
  }

  /** Prefix `<operation> <domain>: ` unless the message already names the domain. */
  prefixed(operation: string, domain: string): this {
    if (!this.message.includes(domain)) {
      this.message = `${operation} ${domain}: ${this.message}`;
    }
    return this;
  }
}

/**
 * Missing or malformed credentials, settings or arguments. Never retried:
 * these need an operator.
 */
export class ConfigurationError extends LifecycleError {
  readonly code: string = 'CONFIGURATION_ERROR';
  readonly category: ErrorCategory = 'configuration';

  static invalidSetting(name: string, value: string, expected: string): ConfigurationError {
    return new ConfigurationError(`Setting ${name}="${value}" is invalid: expected ${expected}`, {
      setting: name,
      value,
    });
  }

  static unreadableCertificate(domain: string, path: string, reason: string): ConfigurationError {
    return new ConfigurationError(`Stored certificate for ${domain} at ${path} is unreadable: ${reason}`, {
      domain,
      path,
    });
  }
}

export class InvalidArgumentError extends ConfigurationError {
  readonly code: string = 'INVALID_ARGUMENT';
}

export class InvalidDomainError extends InvalidArgumentError {
  readonly code: string = 'INVALID_DOMAIN';

  static create(domain: string, operation?: string): InvalidDomainError {
    return new InvalidDomainError(`"${domain}" is not a valid hostname`, { domain, operation });
  }
}

export class TermsNotAcceptedError extends InvalidArgumentError {
  readonly code: string = 'TERMS_NOT_ACCEPTED';

  static create(domain: string): TermsNotAcceptedError {
    return new TermsNotAcceptedError(
      `Cannot issue a certificate for ${domain}: the certificate authority's terms of service were not accepted`,
      { domain, operation: 'issue' },
    );
  }
}

export class EmptySecretError extends InvalidArgumentError {
  readonly code: string = 'EMPTY_SECRET';

  static forProvider(providerId: string): EmptySecretError {
    return new EmptySecretError(`API token for ${providerId} cannot be empty`, {
      providerId,
      operation: 'credentials.save',
    });
  }
}

export class CredentialNotFoundError extends ConfigurationError {
  readonly code: string = 'CREDENTIAL_NOT_FOUND';

  static forProvider(providerId: string, path: string): CredentialNotFoundError {
    return new CredentialNotFoundError(
      `No credentials stored for ${providerId} (expected ${path}). Run "certkeeper credentials ${providerId}" first.`,
      { providerId, path, operation: 'credentials.load' },
    );
  }
}

export class AlreadyExistsError extends ConfigurationError {
  readonly code: string = 'ALREADY_EXISTS';

  static credential(providerId: string, path: string): AlreadyExistsError {
    return new AlreadyExistsError(
      `Credentials for ${providerId} already exist at ${path}; pass the overwrite flag to replace them`,
      { providerId, path, operation: 'credentials.save' },
    );
  }
}

export class MalformedCredentialError extends ConfigurationError {
  readonly code: string = 'MALFORMED_CREDENTIAL';

  static missingSecret(providerId: string, path: string, key: string): MalformedCredentialError {
    return new MalformedCredentialError(`Credential file ${path} has no "${key}" entry`, {
      providerId,
      path,
      operation: 'credentials.load',
    });
  }
}

export class AccountNotFoundError extends ConfigurationError {
  readonly code: string = 'ACCOUNT_NOT_FOUND';

  static at(path: string): AccountNotFoundError {
    return new AccountNotFoundError(
      `No registered ACME account found at ${path}; issue a certificate first to register one`,
      { path },
    );
  }

  static malformed(path: string): AccountNotFoundError {
    return new AccountNotFoundError(`ACME account file ${path} is malformed`, { path });
  }
}

export class CertificateNotFoundError extends ConfigurationError {
  readonly code: string = 'CERTIFICATE_NOT_FOUND';

  static forDomain(domain: string, path: string): CertificateNotFoundError {
    return new CertificateNotFoundError(
      `No certificate stored for ${domain} (expected ${path}); issue one before renewing`,
      { domain, path, operation: 'renew' },
    );
  }
}

/** The DNS challenge could not be verified in time. */
export class ValidationError extends LifecycleError {
  readonly code: string = 'VALIDATION_ERROR';
  readonly category: ErrorCategory = 'validation';
}

export class ValidationTimeoutError extends ValidationError {
  readonly code: string = 'VALIDATION_TIMEOUT';

  static after(domain: string, operation: string, timeoutMs: number, polls: number): ValidationTimeoutError {
    return new ValidationTimeoutError(
      `Validation of ${domain} did not complete within ${Math.round(timeoutMs / 1000)}s (${operation}, ${polls} status checks)`,
      { domain, operation, timeoutMs, polls },
    );
  }
}

/**
 * The certificate authority rejected a request: policy, rate limit, failed
 * domain ownership check, or an authority that stayed unreachable after retries.
 */
export class AuthorityError extends LifecycleError {
  readonly code: string = 'AUTHORITY_ERROR';
  readonly category: ErrorCategory = 'authority';

  /** RFC 8555 problem type URN, when the authority sent one */
  get problemType(): string | undefined {
    const value = this.context.problemType;
    return typeof value === 'string' ? value : undefined;
  }

  get status(): number | undefined {
    const value = this.context.status;
    return typeof value === 'number' ? value : undefined;
  }

  static challengeRejected(domain: string, operation: string, detail: string): AuthorityError {
    return new AuthorityError(`Certificate authority rejected the DNS-01 challenge for ${domain}: ${detail}`, {
      domain,
      operation,
      step: 'checkValidation',
    });
  }

  static emptyCertificate(domain: string, operation: string): AuthorityError {
    return new AuthorityError(`Certificate authority returned an empty certificate or key for ${domain}`, {
      domain,
      operation,
      step: 'finalize',
    });
  }
}

/** The DNS provider's API refused or failed a record operation. */
export class DnsProviderError extends LifecycleError {
  readonly code: string = 'DNS_PROVIDER_ERROR';
  readonly category: ErrorCategory = 'dns';

  /** HTTP status of the failed API call; read by the retry policy */
  get statusCode(): number | undefined {
    const value = this.context.statusCode;
    return typeof value === 'number' ? value : undefined;
  }

  static zoneNotFound(providerId: string, domain: string): DnsProviderError {
    return new DnsProviderError(`${providerId}: no DNS zone found for ${domain}`, { providerId, domain });
  }
}

/** Filesystem failures. */
export class IOError extends LifecycleError {
  readonly code: string = 'IO_ERROR';
  readonly category: ErrorCategory = 'io';

  static wrap(action: string, path: string, cause: unknown, context: ErrorContext = {}): IOError {
    const reason = errorMessage(cause);
    return new IOError(`Failed to ${action} ${path}: ${reason}`, { ...context, path }, { cause });
  }
}

export class ConfigWriteError extends IOError {
  readonly code: string = 'CONFIG_WRITE_FAILED';

  static create(path: string, cause: unknown, domain?: string): ConfigWriteError {
    const reason = errorMessage(cause);
    return new ConfigWriteError(
      `Failed to write configuration ${path}: ${reason}`,
      { path, domain, operation: 'apply' },
      { cause },
    );
  }
}

export class LockTimeoutError extends IOError {
  readonly code: string = 'LOCK_TIMEOUT';

  static waiting(lockPath: string, timeoutMs: number): LockTimeoutError {
    return new LockTimeoutError(`Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`, {
      path: lockPath,
      timeoutMs,
    });
  }
}

/**
 * The current certificate is still valid for longer than the renewal
 * threshold. Raised before any call to the authority.
 */
export class NotDueForRenewalError extends LifecycleError {
  readonly code: string = 'NOT_DUE_FOR_RENEWAL';
  readonly category: ErrorCategory = 'lifecycle';

  constructor(
    domain: string,
    readonly expiresAt: Date,
    readonly thresholdDays: number,
    readonly remainingDays: number,
  ) {
    super(
      `Certificate for ${domain} is not due for renewal: ${remainingDays} days left, renewal starts at ${thresholdDays} days`,
      { domain, operation: 'renew', expiresAt: expiresAt.toISOString(), thresholdDays, remainingDays },
    );
  }
}

export class OperationCancelledError extends LifecycleError {
  readonly code: string = 'CANCELLED';
  readonly category: ErrorCategory = 'lifecycle';

  static create(context: ErrorContext = {}): OperationCancelledError {
    return new OperationCancelledError('Operation cancelled', context);
  }
}

/** A failure outside the known categories, wrapped to carry the domain and operation. */
export class UnexpectedError extends LifecycleError {
  readonly code: string = 'UNEXPECTED_ERROR';
  readonly category: ErrorCategory = 'lifecycle';
}

export { CredentialNotFoundError as NotFoundError };

export function isLifecycleError(error: unknown): error is LifecycleError {
  return error instanceof LifecycleError;
}
