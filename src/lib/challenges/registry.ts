import type { CredentialStore } from '../credentials/credential-store.js';
import { ConfigurationError } from '../errors/lifecycle-errors.js';
import type { HttpClient } from '../transport/http-client.js';
import type { RetryConfig } from '../transport/retry.js';
import type { ChallengeProvider } from './challenge-provider.js';
import { CloudflareProvider } from './cloudflare.js';

export interface ProviderFactoryOptions {
  credentials: CredentialStore;
  propagationDelayMs?: number;
  http?: HttpClient;
  retry?: Partial<RetryConfig>;
}

export type ProviderFactory = (options: ProviderFactoryOptions) => ChallengeProvider;

/**
 * Maps provider ids to factories. New DNS vendors register here; the
 * certificate workflow only sees the ChallengeProvider interface.
 */
export class ChallengeProviderRegistry {
  private readonly factories = new Map<string, ProviderFactory>();

  register(id: string, factory: ProviderFactory): this {
    this.factories.set(id, factory);
    return this;
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  ids(): string[] {
    return [...this.factories.keys()].sort();
  }

  create(id: string, options: ProviderFactoryOptions): ChallengeProvider {
    const factory = this.factories.get(id);
    if (!factory) {
      throw new ConfigurationError(`Unknown DNS provider "${id}" (available: ${this.ids().join(', ')})`, {
        providerId: id,
      });
    }
    return factory(options);
  }
}

export function createDefaultRegistry(): ChallengeProviderRegistry {
  return new ChallengeProviderRegistry().register('cloudflare', (options) => new CloudflareProvider(options));
}
