/**
 * ACME server errors (RFC 8555 Section 6.7)
 *
 * Problem documents (RFC 7807) returned by the certificate authority are
 * mapped onto these classes by `createErrorFromProblem`.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.7
 */

const prefix = 'urn:ietf:params:acme:error:';

export const ACME_ERROR = {
  accountDoesNotExist: `${prefix}accountDoesNotExist`,
  badCSR: `${prefix}badCSR`,
  badNonce: `${prefix}badNonce`,
  caa: `${prefix}caa`,
  compound: `${prefix}compound`,
  connection: `${prefix}connection`,
  dns: `${prefix}dns`,
  incorrectResponse: `${prefix}incorrectResponse`,
  invalidContact: `${prefix}invalidContact`,
  malformed: `${prefix}malformed`,
  orderNotReady: `${prefix}orderNotReady`,
  rateLimited: `${prefix}rateLimited`,
  rejectedIdentifier: `${prefix}rejectedIdentifier`,
  serverInternal: `${prefix}serverInternal`,
  unauthorized: `${prefix}unauthorized`,
  userActionRequired: `${prefix}userActionRequired`,
} as const;

export type AcmeErrorType = (typeof ACME_ERROR)[keyof typeof ACME_ERROR];

/**
 * Base ACME error carrying the problem type URN and HTTP status
 */
export class AcmeError extends Error {
  type: string;
  detail: string;
  status?: number;
  instance?: string;
  subproblems?: AcmeError[];

  constructor(detail: string, status?: number, type: string = ACME_ERROR.serverInternal) {
    super(detail);
    this.name = this.constructor.name;
    this.detail = detail;
    this.status = status;
    this.type = type;
  }

  /** RFC 7807 representation */
  toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = { type: this.type, detail: this.detail };
    if (this.status !== undefined) result.status = this.status;
    if (this.instance) result.instance = this.instance;
    if (this.subproblems && this.subproblems.length > 0) {
      result.subproblems = this.subproblems.map((p) => p.toJSON());
    }
    return result;
  }

  addSubproblem(error: AcmeError): this {
    if (!this.subproblems) {
      this.subproblems = [];
    }
    this.subproblems.push(error);
    return this;
  }
}

export class AccountDoesNotExistError extends AcmeError {
  constructor(detail = 'The request specified an account that does not exist', status = 400) {
    super(detail, status, ACME_ERROR.accountDoesNotExist);
  }
}

export class BadCSRError extends AcmeError {
  constructor(detail = 'The CSR is unacceptable', status = 400) {
    super(detail, status, ACME_ERROR.badCSR);
  }
}

/** Retried once by the nonce manager with a fresh nonce */
export class BadNonceError extends AcmeError {
  constructor(detail = 'The client sent an unacceptable anti-replay nonce', status = 400) {
    super(detail, status, ACME_ERROR.badNonce);
  }
}

export class CAAError extends AcmeError {
  constructor(detail = 'CAA records forbid the CA from issuing a certificate', status = 403) {
    super(detail, status, ACME_ERROR.caa);
  }
}

export class CompoundError extends AcmeError {
  constructor(detail = 'Specific error conditions are indicated in the subproblems', status = 400) {
    super(detail, status, ACME_ERROR.compound);
  }
}

export class ConnectionError extends AcmeError {
  constructor(detail = 'The server could not connect to the validation target', status = 400) {
    super(detail, status, ACME_ERROR.connection);
  }
}

export class DNSError extends AcmeError {
  constructor(detail = 'There was a problem with a DNS query during validation', status = 400) {
    super(detail, status, ACME_ERROR.dns);
  }
}

export class IncorrectResponseError extends AcmeError {
  constructor(detail = 'The challenge response did not match what the server expected', status = 403) {
    super(detail, status, ACME_ERROR.incorrectResponse);
  }
}

export class InvalidContactError extends AcmeError {
  constructor(detail = 'A contact URL for an account was invalid', status = 400) {
    super(detail, status, ACME_ERROR.invalidContact);
  }
}

export class MalformedError extends AcmeError {
  constructor(detail = 'The request message was malformed', status = 400) {
    super(detail, status, ACME_ERROR.malformed);
  }
}

export class OrderNotReadyError extends AcmeError {
  constructor(detail = 'The request attempted to finalize an order that is not ready', status = 403) {
    super(detail, status, ACME_ERROR.orderNotReady);
  }
}

export class RateLimitedError extends AcmeError {
  retryAfter?: Date;

  constructor(detail = 'The request exceeds a rate limit', status = 429, retryAfter?: Date) {
    super(detail, status, ACME_ERROR.rateLimited);
    this.retryAfter = retryAfter;
  }
}

export class RejectedIdentifierError extends AcmeError {
  constructor(detail = 'The server will not issue certificates for the identifier', status = 400) {
    super(detail, status, ACME_ERROR.rejectedIdentifier);
  }
}

export class ServerInternalError extends AcmeError {
  constructor(detail = 'The server experienced an internal error', status = 500) {
    super(detail, status, ACME_ERROR.serverInternal);
  }
}

export class UnauthorizedError extends AcmeError {
  constructor(detail = 'The client lacks sufficient authorization', status = 403) {
    super(detail, status, ACME_ERROR.unauthorized);
  }
}

export class UserActionRequiredError extends AcmeError {
  constructor(detail = 'Visit the instance URL and take actions specified there', status = 403) {
    super(detail, status, ACME_ERROR.userActionRequired);
  }
}
