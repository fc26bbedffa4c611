import { ACME_ERROR, type HttpMethod, type HttpRequestOptions, type HttpResponse } from '../../src/index.js';

export const ACME_BASE = 'https://acme.test';

export interface SignedRequest {
  path: string;
  header: Record<string, unknown>;
  /** null for POST-as-GET */
  payload: unknown;
}

interface Problem {
  type: string;
  detail: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeSegment(segment: unknown): unknown {
  if (typeof segment !== 'string' || segment === '') return null;
  return JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
}

/**
 * Single-account, single-order ACME server answering through a stubbed
 * HttpClient. Accepting the dns-01 challenge validates it immediately unless
 * `challengeProblem` is set.
 */
export class FakeAcmeServer {
  readonly directoryUrl = `${ACME_BASE}/directory`;
  readonly requests: SignedRequest[] = [];
  /** Problem returned for the next new-order request */
  orderProblem?: Problem;
  /** The authorization turns invalid with this problem on its challenge */
  challengeProblem?: Problem;
  /** Problem returned for the next finalize request */
  finalizeProblem?: Problem;
  /** Answer the next signed request with badNonce */
  badNonceOnce = false;

  private nonce = 0;
  private domain = '';
  private authzStatus: 'pending' | 'valid' | 'invalid' = 'pending';
  private finalized: 'no' | 'processing' | 'valid' = 'no';

  constructor(private readonly chainPem: string) {}

  paths(): string[] {
    return this.requests.map((request) => request.path);
  }

  async handle(method: HttpMethod, url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const path = url.slice(ACME_BASE.length);

    if (method === 'GET' && path === '/directory') {
      return this.json(200, {
        newNonce: `${ACME_BASE}/new-nonce`,
        newAccount: `${ACME_BASE}/new-account`,
        newOrder: `${ACME_BASE}/new-order`,
      });
    }
    if (method === 'HEAD' && path === '/new-nonce') {
      return { statusCode: 200, headers: this.headers(), body: undefined };
    }
    if (method !== 'POST' || !isRecord(options.body)) {
      return this.problem(404, { type: ACME_ERROR.malformed, detail: `no route for ${method} ${path}` });
    }

    const header = decodeSegment(options.body.protected);
    this.requests.push({
      path,
      header: isRecord(header) ? header : {},
      payload: decodeSegment(options.body.payload),
    });

    if (this.badNonceOnce) {
      this.badNonceOnce = false;
      return this.problem(400, { type: ACME_ERROR.badNonce, detail: 'JWS has an invalid anti-replay nonce' });
    }

    return this.route(path);
  }

  private route(path: string): HttpResponse {
    const payload = this.requests[this.requests.length - 1]?.payload;

    switch (path) {
      case '/new-account':
        return this.json(201, { status: 'valid' }, `${ACME_BASE}/acct/1`);

      case '/new-order': {
        if (this.orderProblem) {
          const problem = this.orderProblem;
          this.orderProblem = undefined;
          return this.problem(400, problem);
        }
        const identifiers = isRecord(payload) && Array.isArray(payload.identifiers) ? payload.identifiers : [];
        const [first] = identifiers;
        this.domain = isRecord(first) && typeof first.value === 'string' ? first.value : '';
        return this.json(201, this.order(), `${ACME_BASE}/order/1`);
      }

      case '/authz/1':
        return this.json(200, this.authorization());

      case '/chall/1':
        this.authzStatus = this.challengeProblem ? 'invalid' : 'valid';
        return this.json(200, this.challenge('processing'));

      case '/order/1':
        if (this.finalized === 'processing') this.finalized = 'valid';
        return this.json(200, this.order());

      case '/order/1/finalize':
        if (!isRecord(payload) || typeof payload.csr !== 'string') {
          return this.problem(400, { type: ACME_ERROR.badCSR, detail: 'missing csr' });
        }
        if (this.finalizeProblem) {
          const problem = this.finalizeProblem;
          this.finalizeProblem = undefined;
          return this.problem(400, problem);
        }
        this.finalized = 'processing';
        return this.json(200, this.order());

      case '/cert/1':
        return {
          statusCode: 200,
          headers: this.headers('application/pem-certificate-chain'),
          body: this.chainPem,
        };

      default:
        return this.problem(404, { type: ACME_ERROR.malformed, detail: `no route for POST ${path}` });
    }
  }

  private order(): Record<string, unknown> {
    let status = 'pending';
    if (this.finalized !== 'no') status = this.finalized;
    else if (this.authzStatus === 'valid') status = 'ready';
    else if (this.authzStatus === 'invalid') status = 'invalid';

    return {
      status,
      identifiers: [{ type: 'dns', value: this.domain }],
      authorizations: [`${ACME_BASE}/authz/1`],
      finalize: `${ACME_BASE}/order/1/finalize`,
      ...(status === 'valid' ? { certificate: `${ACME_BASE}/cert/1` } : {}),
    };
  }

  private authorization(): Record<string, unknown> {
    const challengeStatus =
      this.authzStatus === 'valid' ? 'valid' : this.authzStatus === 'invalid' ? 'invalid' : 'pending';
    return {
      identifier: { type: 'dns', value: this.domain.replace(/^\*\./, '') },
      status: this.authzStatus,
      challenges: [
        { type: 'http-01', url: `${ACME_BASE}/chall/0`, status: 'pending', token: 'http-token' },
        this.challenge(challengeStatus),
      ],
    };
  }

  private challenge(status: string): Record<string, unknown> {
    return {
      type: 'dns-01',
      url: `${ACME_BASE}/chall/1`,
      status,
      token: 'dns-token',
      ...(status === 'invalid' && this.challengeProblem ? { error: this.challengeProblem } : {}),
    };
  }

  private headers(contentType = 'application/json', location?: string): Record<string, string> {
    return {
      'content-type': contentType,
      'replay-nonce': `nonce-${++this.nonce}`,
      ...(location ? { location } : {}),
    };
  }

  private json(statusCode: number, body: unknown, location?: string): HttpResponse {
    return { statusCode, headers: this.headers('application/json', location), body };
  }

  private problem(statusCode: number, problem: Problem): HttpResponse {
    return {
      statusCode,
      headers: this.headers('application/problem+json'),
      body: { ...problem, status: statusCode },
    };
  }
}
