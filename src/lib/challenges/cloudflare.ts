import { DNS_TXT_TTL_SECONDS } from '../constants/defaults.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { DnsProviderError, isLifecycleError } from '../errors/lifecycle-errors.js';
import { HttpClient, type HttpMethod } from '../transport/http-client.js';
import { withRetry, type RetryConfig } from '../transport/retry.js';
import { debugChallenge } from '../utils/debug.js';
import { errorMessage } from '../utils/fs.js';
import { baseDomain } from '../utils/domain.js';
import { DnsChallengeProvider, type ChallengeRequest, type DnsChallengeProviderOptions } from './challenge-provider.js';

export const CLOUDFLARE_API_BASE_URL = 'https://api.cloudflare.com/client/v4';

export interface CloudflareProviderOptions extends DnsChallengeProviderOptions {
  credentials: CredentialStore;
  http?: HttpClient;
  apiBaseUrl?: string;
  ttlSeconds?: number;
  retry?: Partial<RetryConfig>;
}

interface CloudflareRecord {
  id: string;
  name: string;
  content: string;
}

interface CloudflareEnvelope {
  success: boolean;
  errors: { code?: number; message?: string }[];
  result: unknown;
}

function isEnvelope(value: unknown): value is CloudflareEnvelope {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    typeof value.success === 'boolean' &&
    'errors' in value &&
    Array.isArray(value.errors) &&
    'result' in value
  );
}

function isRecordList(value: unknown): value is CloudflareRecord[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item: unknown) =>
        typeof item === 'object' &&
        item !== null &&
        'id' in item &&
        typeof item.id === 'string' &&
        'name' in item &&
        typeof item.name === 'string' &&
        'content' in item &&
        typeof item.content === 'string',
    )
  );
}

function isZoneList(value: unknown): value is { id: string; name: string }[] {
  return (
    Array.isArray(value) &&
    value.every(
      (item: unknown) =>
        typeof item === 'object' &&
        item !== null &&
        'id' in item &&
        typeof item.id === 'string' &&
        'name' in item &&
        typeof item.name === 'string',
    )
  );
}

/** Cloudflare returns TXT content with or without surrounding quotes */
function unquote(content: string): string {
  return content.replace(/^"(.*)"$/, '$1');
}

/**
 * dns-01 over the Cloudflare v4 API with a scoped API token (Zone:DNS:Edit).
 *
 * The token is read from the CredentialStore under the provider id
 * `cloudflare` on first use. The zone is found by walking the domain's labels
 * from the most to the least specific name.
 */
export class CloudflareProvider extends DnsChallengeProvider {
  readonly id = 'cloudflare';

  private readonly credentials: CredentialStore;
  private readonly http: HttpClient;
  private readonly apiBaseUrl: string;
  private readonly ttlSeconds: number;
  private readonly retry: Partial<RetryConfig>;
  private readonly zones = new Map<string, string>();
  private token?: string;

  constructor(options: CloudflareProviderOptions) {
    super(options);
    this.credentials = options.credentials;
    this.http = options.http ?? new HttpClient();
    this.apiBaseUrl = options.apiBaseUrl ?? CLOUDFLARE_API_BASE_URL;
    this.ttlSeconds = options.ttlSeconds ?? DNS_TXT_TTL_SECONDS;
    this.retry = options.retry ?? {};
  }

  protected async upsertTxtRecord(request: ChallengeRequest, signal?: AbortSignal): Promise<void> {
    const zoneId = await this.findZone(request.domain, signal);
    const existing = await this.listTxtRecords(zoneId, request.recordName, signal);
    const body = { type: 'TXT', name: request.recordName, content: request.recordValue, ttl: this.ttlSeconds };

    const [first, ...duplicates] = existing;
    if (first) {
      debugChallenge('cloudflare: updating %s (%s)', request.recordName, first.id);
      await this.api('PUT', `/zones/${zoneId}/dns_records/${first.id}`, body, signal);
    } else {
      debugChallenge('cloudflare: creating %s', request.recordName);
      await this.api('POST', `/zones/${zoneId}/dns_records`, body, signal);
    }

    for (const record of duplicates) {
      await this.api('DELETE', `/zones/${zoneId}/dns_records/${record.id}`, undefined, signal);
    }
  }

  protected async removeTxtRecord(request: ChallengeRequest): Promise<void> {
    const zoneId = await this.findZone(request.domain);
    const records = await this.listTxtRecords(zoneId, request.recordName);

    for (const record of records) {
      if (unquote(record.content) !== request.recordValue) continue;
      await this.api('DELETE', `/zones/${zoneId}/dns_records/${record.id}`);
    }
  }

  private async findZone(domain: string, signal?: AbortSignal): Promise<string> {
    const name = baseDomain(domain);
    const cached = this.zones.get(name);
    if (cached) return cached;

    const labels = name.split('.');
    for (let i = 0; i < labels.length - 1; i++) {
      const candidate = labels.slice(i).join('.');
      const result = await this.api('GET', `/zones?name=${encodeURIComponent(candidate)}`, undefined, signal);
      if (!isZoneList(result)) {
        throw new DnsProviderError('cloudflare: unexpected zone list response', { domain, operation: 'findZone' });
      }

      const zone = result.find((z) => z.name === candidate);
      if (zone) {
        debugChallenge('cloudflare: zone for %s is %s (%s)', domain, candidate, zone.id);
        this.zones.set(name, zone.id);
        return zone.id;
      }
    }

    throw DnsProviderError.zoneNotFound(this.id, domain);
  }

  private async listTxtRecords(zoneId: string, recordName: string, signal?: AbortSignal): Promise<CloudflareRecord[]> {
    const query = `type=TXT&name=${encodeURIComponent(recordName)}`;
    const result = await this.api('GET', `/zones/${zoneId}/dns_records?${query}`, undefined, signal);
    if (!isRecordList(result)) {
      throw new DnsProviderError('cloudflare: unexpected DNS record list response', { recordName });
    }
    return result;
  }

  private async getToken(): Promise<string> {
    if (!this.token) {
      const credential = await this.credentials.load(this.id);
      this.token = credential.secret;
    }
    return this.token;
  }

  /**
   * One API call with retry of transient failures. Returns the envelope's
   * `result`; HTTP errors and `success: false` raise DnsProviderError.
   */
  private async api(method: HttpMethod, path: string, body?: unknown, signal?: AbortSignal): Promise<unknown> {
    const token = await this.getToken();
    const url = `${this.apiBaseUrl}${path}`;

    try {
      return await withRetry(
        async () => {
          const res = await this.http.request(method, url, {
            headers: { Authorization: `Bearer ${token}` },
            body,
            signal,
          });

          const envelope = isEnvelope(res.body) ? res.body : undefined;
          if (res.statusCode >= 400 || !envelope || !envelope.success) {
            const reason =
              envelope?.errors.map((e) => `${e.code ?? '?'} ${e.message ?? ''}`.trim()).join('; ') ||
              `HTTP ${res.statusCode}`;
            throw new DnsProviderError(`cloudflare: ${method} ${path} failed: ${reason}`, {
              statusCode: res.statusCode,
              method,
              path,
            });
          }
          return envelope.result;
        },
        this.retry,
        `cloudflare ${method} ${path}`,
        signal,
      );
    } catch (err) {
      if (isLifecycleError(err)) throw err;
      throw new DnsProviderError(
        `cloudflare: ${method} ${path} failed: ${errorMessage(err)}`,
        { method, path },
        { cause: err },
      );
    }
  }
}
