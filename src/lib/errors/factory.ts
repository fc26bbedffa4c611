import {
  AcmeError,
  ACME_ERROR,
  AccountDoesNotExistError,
  BadCSRError,
  BadNonceError,
  CAAError,
  CompoundError,
  ConnectionError,
  DNSError,
  IncorrectResponseError,
  InvalidContactError,
  MalformedError,
  OrderNotReadyError,
  RateLimitedError,
  RejectedIdentifierError,
  ServerInternalError,
  UnauthorizedError,
  UserActionRequiredError,
} from './acme-errors.js';

type Ctor = new (detail?: string, status?: number) => AcmeError;

const FACTORY: Record<string, Ctor> = {
  [ACME_ERROR.accountDoesNotExist]: AccountDoesNotExistError,
  [ACME_ERROR.badCSR]: BadCSRError,
  [ACME_ERROR.badNonce]: BadNonceError,
  [ACME_ERROR.caa]: CAAError,
  [ACME_ERROR.compound]: CompoundError,
  [ACME_ERROR.connection]: ConnectionError,
  [ACME_ERROR.dns]: DNSError,
  [ACME_ERROR.incorrectResponse]: IncorrectResponseError,
  [ACME_ERROR.invalidContact]: InvalidContactError,
  [ACME_ERROR.malformed]: MalformedError,
  [ACME_ERROR.orderNotReady]: OrderNotReadyError,
  [ACME_ERROR.rejectedIdentifier]: RejectedIdentifierError,
  [ACME_ERROR.serverInternal]: ServerInternalError,
  [ACME_ERROR.unauthorized]: UnauthorizedError,
  [ACME_ERROR.userActionRequired]: UserActionRequiredError,
};

interface Problem {
  type?: unknown;
  detail?: unknown;
  title?: unknown;
  status?: unknown;
  instance?: unknown;
  subproblems?: unknown;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Map an RFC 7807 problem document onto a typed AcmeError.
 *
 * @param problem - parsed response body
 * @param httpStatus - status of the HTTP response, used when the document has none
 * @param retryAfter - Retry-After header value, if any
 */
export function createErrorFromProblem(
  problem: unknown,
  httpStatus?: number,
  retryAfter?: string,
): AcmeError {
  if (!problem || typeof problem !== 'object') {
    return new AcmeError(
      httpStatus ? `Unexpected response from ACME server (HTTP ${httpStatus})` : 'Unknown error shape',
      httpStatus,
    );
  }

  const p: Problem = problem;
  const type = asString(p.type) ?? ACME_ERROR.serverInternal;
  const detail = asString(p.detail) ?? asString(p.title) ?? 'Unknown error';
  const status = typeof p.status === 'number' ? p.status : httpStatus;

  let err: AcmeError;
  if (type === ACME_ERROR.rateLimited) {
    const retryAt = retryAfter ? parseRetryAfter(retryAfter) : undefined;
    err = new RateLimitedError(detail, status ?? 429, retryAt);
  } else {
    const ctor = FACTORY[type];
    if (ctor) {
      err = new ctor(detail, status);
    } else {
      err = new AcmeError(detail, status, type);
    }
  }

  const instance = asString(p.instance);
  if (instance) {
    err.instance = instance;
  }

  if (Array.isArray(p.subproblems)) {
    for (const sub of p.subproblems) {
      err.addSubproblem(createErrorFromProblem(sub));
    }
  }

  return err;
}

function parseRetryAfter(value: string): Date | undefined {
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return new Date(Date.now() + seconds * 1000);
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
