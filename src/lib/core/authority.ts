/**
 * Boundary between the issuance workflow and a certificate authority.
 * CertificateClient only talks to this interface; AcmeAuthority implements it
 * over RFC 8555 and tests substitute an in-memory double.
 */

export interface AccountRequest {
  contactEmail?: string;
  termsOfServiceAgreed: boolean;
  /** Only load a stored account; fail instead of registering a new one */
  reuseOnly?: boolean;
}

export interface AuthorityAccount {
  accountUrl: string;
  contact: string[];
}

/** One pending order for a single DNS identifier, with its dns-01 challenge */
export interface AuthorityOrder {
  domain: string;
  orderUrl: string;
  authorizationUrl: string;
  challengeUrl: string;
  token: string;
  /** `_acme-challenge.<domain>` */
  recordName: string;
  /** base64url(SHA-256(keyAuthorization)) */
  recordValue: string;
}

export type ValidationStatus =
  | { state: 'pending' }
  | { state: 'valid' }
  | { state: 'invalid'; detail: string };

export interface IssuedCertificate {
  chainPem: string;
  privateKeyPem: string;
}

export interface CertificateAuthorityClient {
  ensureAccount(request: AccountRequest): Promise<AuthorityAccount>;
  createOrder(account: AuthorityAccount, domain: string): Promise<AuthorityOrder>;
  submitChallenge(account: AuthorityAccount, order: AuthorityOrder): Promise<void>;
  checkValidation(account: AuthorityAccount, order: AuthorityOrder): Promise<ValidationStatus>;
  finalize(account: AuthorityAccount, order: AuthorityOrder, options?: { signal?: AbortSignal }): Promise<IssuedCertificate>;
}
