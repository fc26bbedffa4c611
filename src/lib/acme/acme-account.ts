/**
 * RFC 8555 account-bound operations
 *
 * Registration, orders, authorizations, challenges, finalization and
 * certificate download. Every request is signed by the account key through
 * AcmeRequestSigner; error responses are mapped to typed AcmeError subclasses.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7
 */

import { ORDER_POLL_INTERVAL_MS, ORDER_POLL_MAX_ATTEMPTS } from '../constants/defaults.js';
import { AcmeError } from '../errors/acme-errors.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { headerValue, type HttpResponse } from '../transport/http-client.js';
import { sleep } from '../transport/retry.js';
import { debugAcme } from '../utils/debug.js';
import type { AcmeClient } from './acme-client.js';
import { AcmeRequestSigner, type AccountKeys } from './request-signer.js';
import {
  ORDER_STATUS,
  isAcmeAuthorization,
  isAcmeChallenge,
  isAcmeOrder,
  type AcmeAuthorization,
  type AcmeChallenge,
  type AcmeOrder,
  type AcmeOrderStatus,
} from './types.js';

/**
 * termsOfServiceAgreed is the literal `true` so that agreement is always an
 * explicit decision at the call site.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.3
 */
export interface AcmeAccountRegistrationPayload {
  /** Contact email addresses, with or without `mailto:` */
  contact: string[] | string;
  termsOfServiceAgreed: true;
}

export interface WaitOrderOptions {
  intervalMs?: number;
  maxAttempts?: number;
  signal?: AbortSignal;
}

function problemFrom(res: HttpResponse): AcmeError {
  return createErrorFromProblem(res.body, res.statusCode, headerValue(res.headers, 'retry-after'));
}

export class AcmeAccount {
  private readonly client: AcmeClient;
  private readonly signer: AcmeRequestSigner;

  constructor(client: AcmeClient, keys: AccountKeys, kid = '') {
    this.client = client;
    this.signer = new AcmeRequestSigner(client, keys, kid);
  }

  get kid(): string {
    return this.signer.kid;
  }

  get keys(): AccountKeys {
    return this.signer.keys;
  }

  /**
   * Create the account (or look up the existing one for this key: servers
   * answer 200 instead of 201) and remember its URL as `kid`.
   */
  async register({ contact, termsOfServiceAgreed }: AcmeAccountRegistrationPayload): Promise<{ accountUrl: string }> {
    const directory = await this.client.getDirectory();
    const contacts = Array.isArray(contact) ? contact : [contact];
    const payload = {
      contact: contacts.map((email) => (email.startsWith('mailto:') ? email : `mailto:${email}`)),
      termsOfServiceAgreed,
    };

    const res = await this.signer.signedPost(directory.newAccount, payload, true);
    if (res.statusCode !== 200 && res.statusCode !== 201) {
      throw problemFrom(res);
    }

    const accountUrl = headerValue(res.headers, 'location');
    if (!accountUrl) {
      throw new AcmeError('Account response has no Location header', res.statusCode);
    }

    this.signer.kid = accountUrl;
    debugAcme('account %s (HTTP %d)', accountUrl, res.statusCode);
    return { accountUrl };
  }

  /** @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.4 */
  async createOrder(identifiers: string[]): Promise<AcmeOrder> {
    const directory = await this.client.getDirectory();
    const payload = {
      identifiers: identifiers.map((value) => ({ type: 'dns', value })),
    };

    const res = await this.signer.signedPost(directory.newOrder, payload);
    if (res.statusCode !== 201) {
      throw problemFrom(res);
    }

    const url = headerValue(res.headers, 'location');
    if (!isAcmeOrder(res.body) || !url) {
      throw new AcmeError('Malformed order response', res.statusCode);
    }

    debugAcme('order %s status=%s', url, res.body.status);
    return { ...res.body, url };
  }

  async getOrder(orderUrl: string): Promise<AcmeOrder> {
    const res = await this.signer.signedPost(orderUrl, null);
    if (res.statusCode !== 200) {
      throw problemFrom(res);
    }
    if (!isAcmeOrder(res.body)) {
      throw new AcmeError('Malformed order response', res.statusCode);
    }
    return { ...res.body, url: orderUrl };
  }

  async getAuthorization(authzUrl: string): Promise<AcmeAuthorization> {
    const res = await this.signer.signedPost(authzUrl, null);
    if (res.statusCode !== 200) {
      throw problemFrom(res);
    }
    if (!isAcmeAuthorization(res.body)) {
      throw new AcmeError('Malformed authorization response', res.statusCode);
    }
    return res.body;
  }

  /**
   * Tell the server the challenge is ready to be validated.
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.5.1
   */
  async acceptChallenge(challengeUrl: string): Promise<AcmeChallenge> {
    const res = await this.signer.signedPost(challengeUrl, {});
    if (res.statusCode !== 200) {
      throw problemFrom(res);
    }
    if (!isAcmeChallenge(res.body)) {
      throw new AcmeError('Malformed challenge response', res.statusCode);
    }
    return res.body;
  }

  keyAuthorization(token: string): Promise<string> {
    return this.signer.keyAuthorization(token);
  }

  dns01Value(token: string): Promise<string> {
    return this.signer.dns01Value(token);
  }

  /** @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.4 */
  async finalize(order: AcmeOrder, csrDerBase64Url: string): Promise<AcmeOrder> {
    const res = await this.signer.signedPost(order.finalize, { csr: csrDerBase64Url });
    if (res.statusCode !== 200) {
      throw problemFrom(res);
    }
    if (!isAcmeOrder(res.body)) {
      throw new AcmeError('Malformed order response', res.statusCode);
    }
    return { ...res.body, url: order.url };
  }

  /**
   * Poll the order until it reaches one of the target statuses. An order
   * that turns `invalid` (and is not a target) fails with its problem.
   */
  async waitOrder(
    order: AcmeOrder,
    targetStatuses: AcmeOrderStatus[],
    options: WaitOrderOptions = {},
  ): Promise<AcmeOrder> {
    const intervalMs = options.intervalMs ?? ORDER_POLL_INTERVAL_MS;
    const maxAttempts = options.maxAttempts ?? ORDER_POLL_MAX_ATTEMPTS;
    let current = order;

    for (let attempt = 0; !targetStatuses.includes(current.status); attempt++) {
      if (current.status === ORDER_STATUS.INVALID) {
        throw current.error ? createErrorFromProblem(current.error) : new AcmeError(`Order ${order.url} is invalid`);
      }
      if (attempt >= maxAttempts) {
        throw new AcmeError(
          `Order ${order.url} still ${current.status} after ${maxAttempts} polls (want ${targetStatuses.join('|')})`,
        );
      }

      await sleep(intervalMs, options.signal);
      current = await this.getOrder(order.url);
      debugAcme('order %s status=%s', order.url, current.status);
    }

    return current;
  }

  /**
   * PEM chain (application/pem-certificate-chain), leaf first.
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.4.2
   */
  async downloadCertificate(order: AcmeOrder): Promise<string> {
    if (!order.certificate) {
      throw new AcmeError(`Order ${order.url} has no certificate URL`);
    }

    const res = await this.signer.signedPost(order.certificate, null);
    if (res.statusCode !== 200) {
      throw problemFrom(res);
    }

    if (typeof res.body === 'string') return res.body;
    if (Buffer.isBuffer(res.body)) return res.body.toString('utf8');
    throw new AcmeError('Unexpected certificate response body', res.statusCode);
  }
}
