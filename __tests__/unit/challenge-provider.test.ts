import { afterEach, describe, expect, it } from '@jest/globals';

import {
  DnsChallengeProvider,
  OperationCancelledError,
  createDefaultRegistry,
  CloudflareProvider,
  ConfigurationError,
  CredentialStore,
  setLogger,
  type ChallengeRequest,
} from '../../src/index.js';

const request: ChallengeRequest = {
  domain: 'example.org',
  token: 'test-token',
  recordName: '_acme-challenge.example.org',
  recordValue: 'test-record-value',
};

class MemoryProvider extends DnsChallengeProvider {
  readonly id = 'memory';
  readonly records = new Map<string, string>();
  removeError?: Error;

  protected async upsertTxtRecord(req: ChallengeRequest): Promise<void> {
    this.records.set(req.recordName, req.recordValue);
  }

  protected async removeTxtRecord(req: ChallengeRequest): Promise<void> {
    if (this.removeError) throw this.removeError;
    this.records.delete(req.recordName);
  }
}

describe('DnsChallengeProvider', () => {
  afterEach(() => {
    setLogger(undefined);
  });

  it('publishes and removes the record', async () => {
    const provider = new MemoryProvider({ propagationDelayMs: 0 });

    await provider.publish(request);
    expect(provider.records.get('_acme-challenge.example.org')).toBe('test-record-value');

    await provider.cleanup(request);
    expect(provider.records.size).toBe(0);
  });

  it('waits for propagation after publishing', async () => {
    const provider = new MemoryProvider({ propagationDelayMs: 30 });
    const started = Date.now();

    await provider.publish(request);

    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
  });

  it('stops waiting when the signal aborts', async () => {
    const provider = new MemoryProvider({ propagationDelayMs: 60_000 });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 5);

    await expect(provider.publish(request, controller.signal)).rejects.toBeInstanceOf(OperationCancelledError);
    expect(provider.records.size).toBe(1);
  });

  it('turns a cleanup failure into a warning', async () => {
    const warnings: string[] = [];
    setLogger((message) => warnings.push(message));
    const provider = new MemoryProvider({ propagationDelayMs: 0 });
    provider.removeError = new Error('record is locked');

    await expect(provider.cleanup(request)).resolves.toBeUndefined();
    expect(warnings).toEqual(['WARN: memory: failed to remove _acme-challenge.example.org: record is locked']);
  });
});

describe('ChallengeProviderRegistry', () => {
  const credentials = new CredentialStore('/nonexistent/secrets');

  it('creates the Cloudflare provider by default', () => {
    const registry = createDefaultRegistry();

    expect(registry.ids()).toEqual(['cloudflare']);
    expect(registry.create('cloudflare', { credentials })).toBeInstanceOf(CloudflareProvider);
  });

  it('accepts additional providers', () => {
    const registry = createDefaultRegistry().register('memory', () => new MemoryProvider());

    expect(registry.has('memory')).toBe(true);
    expect(registry.create('memory', { credentials }).id).toBe('memory');
  });

  it('names the available providers for an unknown id', () => {
    expect(() => createDefaultRegistry().create('route53', { credentials })).toThrow(
      new ConfigurationError('Unknown DNS provider "route53" (available: cloudflare)'),
    );
  });
});
