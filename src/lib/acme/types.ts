/**
 * RFC 8555 resource types and status constants
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1
 */

/**
 * Order status: pending -> ready -> processing -> valid, or invalid
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.3
 */
export const ORDER_STATUS = {
  PENDING: 'pending',
  READY: 'ready',
  PROCESSING: 'processing',
  VALID: 'valid',
  INVALID: 'invalid',
} as const;

export type AcmeOrderStatus = (typeof ORDER_STATUS)[keyof typeof ORDER_STATUS];

/**
 * Authorization status: pending -> (valid|invalid) -> (expired|deactivated|revoked)
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.1.4
 */
export const AUTHORIZATION_STATUS = {
  PENDING: 'pending',
  VALID: 'valid',
  INVALID: 'invalid',
  DEACTIVATED: 'deactivated',
  EXPIRED: 'expired',
  REVOKED: 'revoked',
} as const;

export type AcmeAuthorizationStatus = (typeof AUTHORIZATION_STATUS)[keyof typeof AUTHORIZATION_STATUS];

export const CHALLENGE_STATUS = {
  PENDING: 'pending',
  PROCESSING: 'processing',
  VALID: 'valid',
  INVALID: 'invalid',
} as const;

export type AcmeChallengeStatus = (typeof CHALLENGE_STATUS)[keyof typeof CHALLENGE_STATUS];

export const DNS_01 = 'dns-01';

export interface AcmeDirectory {
  newNonce: string;
  newAccount: string;
  newOrder: string;
  revokeCert?: string;
  keyChange?: string;
  meta?: {
    termsOfService?: string;
    website?: string;
    caaIdentities?: string[];
    externalAccountRequired?: boolean;
  };
}

export interface AcmeIdentifier {
  type: string;
  value: string;
}

export interface AcmeChallenge {
  type: string;
  url: string;
  status: AcmeChallengeStatus;
  token: string;
  validated?: string;
  /** Problem document when validation failed */
  error?: unknown;
}

export interface AcmeAuthorization {
  identifier: AcmeIdentifier;
  status: AcmeAuthorizationStatus;
  expires?: string;
  challenges: AcmeChallenge[];
  wildcard?: boolean;
}

export interface AcmeOrder {
  status: AcmeOrderStatus;
  expires?: string;
  identifiers: AcmeIdentifier[];
  authorizations: string[];
  finalize: string;
  certificate?: string;
  /** Order URL from the Location header (set by the client) */
  url: string;
  error?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAcmeOrder(value: unknown): value is Omit<AcmeOrder, 'url'> {
  return (
    isRecord(value) &&
    typeof value.status === 'string' &&
    typeof value.finalize === 'string' &&
    Array.isArray(value.authorizations) &&
    value.authorizations.every((url) => typeof url === 'string')
  );
}

export function isAcmeChallenge(value: unknown): value is AcmeChallenge {
  return (
    isRecord(value) &&
    typeof value.type === 'string' &&
    typeof value.url === 'string' &&
    typeof value.status === 'string' &&
    typeof value.token === 'string'
  );
}

export function isAcmeAuthorization(value: unknown): value is AcmeAuthorization {
  return (
    isRecord(value) &&
    typeof value.status === 'string' &&
    isRecord(value.identifier) &&
    typeof value.identifier.value === 'string' &&
    Array.isArray(value.challenges) &&
    value.challenges.every(isAcmeChallenge)
  );
}
