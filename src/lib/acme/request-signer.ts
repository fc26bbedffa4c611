/**
 * JWS request signing
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.2
 * @see https://datatracker.ietf.org/doc/html/rfc7515
 */

import * as jose from 'jose';

import type { HttpResponse } from '../transport/http-client.js';
import type { AcmeClient } from './acme-client.js';

/**
 * Account key pair. Used only to authenticate to the authority, never for a
 * certificate.
 */
export interface AccountKeys {
  privateKey: CryptoKey;
  publicKey: CryptoKey;
}

export type SignedPayload = Record<string, unknown> | string | null;

/**
 * JWS algorithm for a public key: ES256/384/512 by curve, RS256 for RSA.
 */
export async function detectJwsAlgorithm(publicKey: CryptoKey): Promise<string> {
  const jwk = await jose.exportJWK(publicKey);

  if (jwk.kty === 'EC') {
    switch (jwk.crv) {
      case 'P-256':
        return 'ES256';
      case 'P-384':
        return 'ES384';
      case 'P-521':
        return 'ES512';
      default:
        throw new Error(`Unsupported EC curve: ${jwk.crv}`);
    }
  }

  if (jwk.kty === 'RSA') {
    return 'RS256';
  }

  throw new Error(`Unsupported key type: ${jwk.kty}`);
}

export class AcmeRequestSigner {
  public readonly keys: AccountKeys;
  public kid: string;

  private readonly client: AcmeClient;
  private jwsAlgorithm: string | null = null;

  constructor(client: AcmeClient, keys: AccountKeys, kid = '') {
    this.client = client;
    this.keys = keys;
    this.kid = kid;
  }

  /**
   * Signed POST with nonce handling. A `null` payload is POST-as-GET (empty
   * payload). The `jwk` header is used when forced (newAccount) or when no
   * account URL is known yet, `kid` otherwise.
   */
  async signedPost(url: string, payload: SignedPayload, forceJwk = false): Promise<HttpResponse> {
    const nonceManager = await this.client.getNonceManager();
    const alg = await this.getAlgorithm();

    return nonceManager.withNonceRetry(async (nonce) => {
      const protectedHeader: jose.JWSHeaderParameters = { alg, nonce, url };

      if (forceJwk || !this.kid) {
        protectedHeader.jwk = await jose.exportJWK(this.keys.publicKey);
      } else {
        protectedHeader.kid = this.kid;
      }

      const encodedPayload =
        payload === null
          ? new Uint8Array(0)
          : new TextEncoder().encode(typeof payload === 'string' ? payload : JSON.stringify(payload));

      const jws = await new jose.FlattenedSign(encodedPayload)
        .setProtectedHeader(protectedHeader)
        .sign(this.keys.privateKey);

      return this.client.getHttp().post(url, jws, {
        'Content-Type': 'application/jose+json',
      });
    });
  }

  /**
   * token || '.' || base64url(JWK thumbprint of the account key)
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-8.1
   */
  async keyAuthorization(token: string): Promise<string> {
    const jwk = await jose.exportJWK(this.keys.publicKey);
    const thumbprint = await jose.calculateJwkThumbprint(jwk, 'sha256');
    return `${token}.${thumbprint}`;
  }

  /**
   * TXT record value for dns-01: base64url(SHA-256(keyAuthorization))
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-8.4
   */
  async dns01Value(token: string): Promise<string> {
    const keyAuthorization = await this.keyAuthorization(token);
    const digest = await crypto.subtle.digest('SHA-256', new TextEncoder().encode(keyAuthorization));
    return jose.base64url.encode(new Uint8Array(digest));
  }

  private async getAlgorithm(): Promise<string> {
    if (!this.jwsAlgorithm) {
      this.jwsAlgorithm = await detectJwsAlgorithm(this.keys.publicKey);
    }
    return this.jwsAlgorithm;
  }
}
