import { request, type Dispatcher } from 'undici';
import { debugHttp } from '../utils/debug.js';
import { errorMessage } from '../utils/fs.js';
import { buildUserAgent } from '../utils/user-agent.js';

export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string | string[] | undefined>;

export interface HttpResponse {
  statusCode: number;
  headers: HttpHeaders;
  /** JSON for json / problem+json, text for text and PEM chains, Buffer otherwise */
  body: unknown;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

/** First value of a response header, case-insensitive. */
export function headerValue(headers: HttpHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return Array.isArray(value) ? value[0] : value;
    }
  }
  return undefined;
}

/**
 * Shared HTTP transport for the ACME authority and DNS provider APIs.
 *
 * Injects the User-Agent, serializes object bodies as JSON and parses the
 * response body by content type. Network failures are rethrown as-is (undici
 * errors carry a `code` the retry policy understands); HTTP error statuses are
 * returned, not thrown.
 */
export class HttpClient {
  private static userAgent = buildUserAgent();

  async request(method: HttpMethod, url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const headers = this.ensureUserAgent({ ...options.headers });
    const body = this.serializeBody(options.body, headers);
    debugHttp('%s %s init headers=%j', method, url, redactHeaders(headers));
    const start = Date.now();

    try {
      const res = await request(url, { method, headers, body, signal: options.signal });
      debugHttp(
        '%s %s response status=%d durationMs=%d content-type=%s',
        method,
        url,
        res.statusCode,
        Date.now() - start,
        res.headers['content-type'],
      );

      const data = method === 'HEAD' ? undefined : await this.parseResponseBody(res.headers, res.body);
      if (method === 'HEAD') {
        await res.body.dump();
      }
      return { statusCode: res.statusCode, headers: res.headers, body: data };
    } catch (err) {
      debugHttp('%s %s network error: %s', method, url, errorMessage(err));
      throw err;
    }
  }

  get(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.request('GET', url, { headers });
  }

  head(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.request('HEAD', url, { headers });
  }

  post(url: string, body: unknown, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.request('POST', url, { headers, body });
  }

  private ensureUserAgent(headers: Record<string, string>): Record<string, string> {
    const hasUA = Object.keys(headers).some((k) => k.toLowerCase() === 'user-agent');
    if (!hasUA) {
      headers['User-Agent'] = HttpClient.userAgent;
    }
    return headers;
  }

  private serializeBody(body: unknown, headers: Record<string, string>): string | Uint8Array | undefined {
    if (body === undefined || body === null) return undefined;
    if (typeof body === 'string' || body instanceof Uint8Array) return body;

    const hasContentType = Object.keys(headers).some((k) => k.toLowerCase() === 'content-type');
    if (!hasContentType) {
      headers['Content-Type'] = 'application/json';
    }
    return JSON.stringify(body);
  }

  private async parseResponseBody(headers: HttpHeaders, body: Dispatcher.ResponseData['body']): Promise<unknown> {
    const ct = headerValue(headers, 'content-type')?.toLowerCase() ?? '';

    if (ct.includes('application/json') || ct.includes('application/problem+json')) {
      const text = await body.text();
      return text.length > 0 ? JSON.parse(text) : null;
    }
    if (ct.startsWith('text/') || ct.includes('application/pem-certificate-chain')) {
      return body.text();
    }
    const buf = await body.arrayBuffer();
    return Buffer.from(buf);
  }
}

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    out[key] = key.toLowerCase() === 'authorization' ? '<redacted>' : value;
  }
  return out;
}
