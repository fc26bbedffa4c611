import { AcmeError } from '../errors/acme-errors.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { AccountNotFoundError, InvalidArgumentError } from '../errors/lifecycle-errors.js';
import type {
  AccountRequest,
  AuthorityAccount,
  AuthorityOrder,
  CertificateAuthorityClient,
  IssuedCertificate,
  ValidationStatus,
} from '../core/authority.js';
import type { HttpClient } from '../transport/http-client.js';
import { isRetryableError } from '../transport/retry.js';
import { debugAcme } from '../utils/debug.js';
import { challengeRecordName } from '../utils/domain.js';
import { AcmeAccount } from './acme-account.js';
import { AcmeClient } from './acme-client.js';
import { AccountStore, generateAccountKeys, importAccountKeys } from './account-store.js';
import { createCsr, exportPrivateKeyPem, generateKeyPair } from './csr.js';
import { AUTHORIZATION_STATUS, CHALLENGE_STATUS, DNS_01, ORDER_STATUS } from './types.js';

export interface AcmeAuthorityOptions {
  directoryUrl: string;
  accountKeyPath: string;
  http?: HttpClient;
  /** Poll interval while waiting for a finalized order */
  orderPollIntervalMs?: number;
}

/**
 * CertificateAuthorityClient over RFC 8555.
 *
 * Holds the account session for the process lifetime. Certificate keys are
 * generated once per order and kept while a finalize can still be retried,
 * so a retried finalize signs the same CSR key.
 */
export class AcmeAuthority implements CertificateAuthorityClient {
  private readonly client: AcmeClient;
  private readonly store: AccountStore;
  private readonly orderPollIntervalMs?: number;
  private account?: AcmeAccount;
  private readonly certificateKeys = new Map<string, CryptoKeyPair>();

  constructor(private readonly opts: AcmeAuthorityOptions) {
    this.client = new AcmeClient(opts.directoryUrl, opts.http);
    this.store = new AccountStore(opts.accountKeyPath);
    this.orderPollIntervalMs = opts.orderPollIntervalMs;
  }

  async ensureAccount(request: AccountRequest): Promise<AuthorityAccount> {
    const stored = await this.store.load(this.opts.directoryUrl);

    if (stored) {
      const keys = await importAccountKeys(stored);
      this.account = new AcmeAccount(this.client, keys, stored.kid);
      debugAcme('reusing account %s', stored.kid);
      return { accountUrl: stored.kid, contact: stored.contact };
    }

    if (request.reuseOnly) {
      throw AccountNotFoundError.at(this.store.location);
    }
    if (!request.contactEmail) {
      throw new InvalidArgumentError('A contact email is required to register an ACME account', {
        operation: 'ensureAccount',
      });
    }
    if (request.termsOfServiceAgreed !== true) {
      throw new InvalidArgumentError('Registering an ACME account requires accepting the terms of service', {
        operation: 'ensureAccount',
      });
    }

    const keys = await generateAccountKeys();
    const account = new AcmeAccount(this.client, keys);
    const { accountUrl } = await account.register({
      contact: request.contactEmail,
      termsOfServiceAgreed: true,
    });

    const contact = [`mailto:${request.contactEmail}`];
    await this.store.save(keys, {
      kid: accountUrl,
      contact,
      directoryUrl: this.opts.directoryUrl,
      createdAt: new Date().toISOString(),
    });
    this.account = account;
    return { accountUrl, contact };
  }

  async createOrder(account: AuthorityAccount, domain: string): Promise<AuthorityOrder> {
    const session = this.session(account);
    const order = await session.createOrder([domain]);

    const authorizationUrl = order.authorizations[0];
    if (!authorizationUrl) {
      throw new AcmeError(`Order ${order.url} has no authorizations`);
    }

    const authz = await session.getAuthorization(authorizationUrl);
    const challenge = authz.challenges.find((c) => c.type === DNS_01);
    if (!challenge) {
      throw new AcmeError(`Authorization for ${domain} offers no ${DNS_01} challenge`);
    }

    return {
      domain,
      orderUrl: order.url,
      authorizationUrl,
      challengeUrl: challenge.url,
      token: challenge.token,
      recordName: challengeRecordName(domain),
      recordValue: await session.dns01Value(challenge.token),
    };
  }

  async submitChallenge(account: AuthorityAccount, order: AuthorityOrder): Promise<void> {
    await this.session(account).acceptChallenge(order.challengeUrl);
  }

  async checkValidation(account: AuthorityAccount, order: AuthorityOrder): Promise<ValidationStatus> {
    const authz = await this.session(account).getAuthorization(order.authorizationUrl);

    if (authz.status === AUTHORIZATION_STATUS.VALID) {
      return { state: 'valid' };
    }
    if (authz.status === AUTHORIZATION_STATUS.PENDING) {
      return { state: 'pending' };
    }

    const challenge = authz.challenges.find((c) => c.url === order.challengeUrl);
    const detail =
      challenge?.status === CHALLENGE_STATUS.INVALID && challenge.error
        ? createErrorFromProblem(challenge.error).detail
        : `authorization is ${authz.status}`;
    return { state: 'invalid', detail };
  }

  async finalize(
    account: AuthorityAccount,
    order: AuthorityOrder,
    options: { signal?: AbortSignal } = {},
  ): Promise<IssuedCertificate> {
    const session = this.session(account);

    let keys = this.certificateKeys.get(order.orderUrl);
    if (!keys) {
      keys = await generateKeyPair();
      this.certificateKeys.set(order.orderUrl, keys);
    }

    try {
      const waitOptions = { intervalMs: this.orderPollIntervalMs, signal: options.signal };
      let current = await session.getOrder(order.orderUrl);
      if (current.status !== ORDER_STATUS.VALID) {
        current = await session.waitOrder(current, [ORDER_STATUS.READY, ORDER_STATUS.VALID], waitOptions);
      }
      if (current.status === ORDER_STATUS.READY) {
        const csr = await createCsr([order.domain], keys);
        current = await session.finalize(current, csr.derBase64Url);
        current = await session.waitOrder(current, [ORDER_STATUS.VALID], waitOptions);
      }

      const chainPem = await session.downloadCertificate(current);
      const privateKeyPem = await exportPrivateKeyPem(keys.privateKey);
      this.certificateKeys.delete(order.orderUrl);
      return { chainPem, privateKeyPem };
    } catch (err) {
      if (!isRetryableError(err)) {
        this.certificateKeys.delete(order.orderUrl);
      }
      throw err;
    }
  }

  private session(account: AuthorityAccount): AcmeAccount {
    if (!this.account || this.account.kid !== account.accountUrl) {
      throw new AccountNotFoundError(`No active ACME session for account ${account.accountUrl}`, {
        accountUrl: account.accountUrl,
      });
    }
    return this.account;
  }
}
