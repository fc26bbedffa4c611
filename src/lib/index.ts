/**
 * certkeeper library exports
 */

// Certificate workflow
export {
  CertificateClient,
  DEFAULT_POLL_CONFIG,
  type CertificateClientOptions,
  type IssueOptions,
  type PollConfig,
  type RenewOptions,
} from './core/certificate-client.js';
export {
  CertificateRepository,
  domainDirectoryName,
  readValidity,
  type CertificateRecord,
} from './core/certificate-repository.js';
export type {
  AccountRequest,
  AuthorityAccount,
  AuthorityOrder,
  CertificateAuthorityClient,
  IssuedCertificate,
  ValidationStatus,
} from './core/authority.js';

// Credentials
export {
  CredentialStore,
  formatCredentialFile,
  parseCredentialFile,
  secretKeyFor,
  type Credential,
  type SaveCredentialOptions,
} from './credentials/credential-store.js';
export { withFileLock, type FileLockOptions } from './credentials/file-lock.js';

// DNS challenges
export {
  DnsChallengeProvider,
  type ChallengeProvider,
  type ChallengeRequest,
  type DnsChallengeProviderOptions,
} from './challenges/challenge-provider.js';
export { CloudflareProvider, CLOUDFLARE_API_BASE_URL, type CloudflareProviderOptions } from './challenges/cloudflare.js';
export {
  ChallengeProviderRegistry,
  createDefaultRegistry,
  type ProviderFactory,
  type ProviderFactoryOptions,
} from './challenges/registry.js';

// Configuration sync
export { ConfigSynchronizer, type ConfigSynchronizerOptions, type SyncResult } from './sync/config-synchronizer.js';
export { formatValue, parseDefinition, upsertEnv, type ConfigEntry, type UpsertResult } from './sync/env-file.js';

// ACME
export { AcmeAuthority, type AcmeAuthorityOptions } from './acme/acme-authority.js';
export { AcmeAccount, type AcmeAccountRegistrationPayload } from './acme/acme-account.js';
export { AcmeClient } from './acme/acme-client.js';
export { AccountStore, type StoredAccount } from './acme/account-store.js';
export { createCsr, exportPrivateKeyPem, generateKeyPair } from './acme/csr.js';
export { letsencrypt, DEFAULT_DIRECTORY_URL, type AcmeDirectoryEntry } from './acme/directory.js';
export { NonceManager, type NonceManagerOptions } from './acme/nonce-manager.js';
export { AcmeRequestSigner, detectJwsAlgorithm, type AccountKeys } from './acme/request-signer.js';
export * from './acme/types.js';

// Errors
export * from './errors/lifecycle-errors.js';
export * from './errors/acme-errors.js';
export { createErrorFromProblem } from './errors/factory.js';

// Configuration, transport and utilities
export { resolveConfig, type ConfigOverrides, type Env, type LifecycleConfig } from './config.js';
export * from './constants/defaults.js';
export { HttpClient, headerValue, type HttpMethod, type HttpResponse, type HttpRequestOptions } from './transport/http-client.js';
export { withRetry, isRetryableError, calculateRetryDelay, sleep, DEFAULT_RETRY_CONFIG, type RetryConfig } from './transport/retry.js';
export { setLogger, type WarnLogger } from './utils/debug.js';
export { isValidHostname, isValidEmail, normalizeDomain, challengeRecordName } from './utils/domain.js';
