import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { readFile, stat, writeFile } from 'fs/promises';
import { join } from 'path';

import {
  AlreadyExistsError,
  CredentialNotFoundError,
  CredentialStore,
  EmptySecretError,
  InvalidArgumentError,
  MalformedCredentialError,
  NotFoundError,
  formatCredentialFile,
  parseCredentialFile,
  secretKeyFor,
} from '../../src/index.js';
import { makeTempDir, removeTempDir } from '../helpers/tmp.js';

describe('CredentialStore', () => {
  let dir: string;
  let store: CredentialStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new CredentialStore(join(dir, 'secrets'), { retryIntervalMs: 5 });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('saves a token that can be loaded back', async () => {
    const path = await store.save('cloudflare', 'test-secret');

    expect(path).toBe(join(dir, 'secrets', 'cloudflare.ini'));
    const credential = await store.load('cloudflare');
    expect(credential.providerId).toBe('cloudflare');
    expect(credential.secret).toBe('test-secret');
    expect(credential.createdAt.getTime()).toBeGreaterThan(0);
  });

  it('restricts the file to its owner', async () => {
    const path = await store.save('cloudflare', 'test-secret');

    expect((await stat(path)).mode & 0o777).toBe(0o600);
    expect((await stat(join(dir, 'secrets'))).mode & 0o777).toBe(0o700);
  });

  it('writes the provider key in the file', async () => {
    const path = await store.save('cloudflare', 'test-secret');
    const lines = (await readFile(path, 'utf8')).split('\n');

    expect(lines[0]).toBe('# cloudflare API credentials');
    expect(lines[2]).toBe('provider = cloudflare');
    expect(lines[4]).toBe('dns_cloudflare_api_token = test-secret');
    expect(lines[5]).toBe('');
  });

  it('trims surrounding whitespace from the token', async () => {
    await store.save('cloudflare', '  test-secret \n');

    expect((await store.load('cloudflare')).secret).toBe('test-secret');
  });

  it('rejects an empty token without creating a file', async () => {
    await expect(store.save('cloudflare', '   ')).rejects.toBeInstanceOf(EmptySecretError);
    await expect(store.exists('cloudflare')).resolves.toBe(false);
  });

  it('leaves an existing file untouched unless overwrite is set', async () => {
    const path = await store.save('cloudflare', 'test-secret');
    const before = await readFile(path);

    const error = await store.save('cloudflare', 'test-secret-2').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AlreadyExistsError);
    expect(await readFile(path)).toEqual(before);
    expect((await store.load('cloudflare')).secret).toBe('test-secret');
  });

  it('replaces the token with overwrite', async () => {
    await store.save('cloudflare', 'test-secret');
    await store.save('cloudflare', 'test-secret-2', { overwrite: true });

    expect((await store.load('cloudflare')).secret).toBe('test-secret-2');
  });

  it('releases its lock after writing', async () => {
    const path = await store.save('cloudflare', 'test-secret');

    await expect(stat(`${path}.lock`)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('reports a provider without credentials', async () => {
    const error = await store.load('cloudflare').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CredentialNotFoundError);
    expect(error).toBeInstanceOf(NotFoundError);
    await expect(store.load('cloudflare')).rejects.toThrow('Run "certkeeper credentials cloudflare" first.');
  });

  it('reports a file without the token entry', async () => {
    await store.save('cloudflare', 'test-secret');
    await writeFile(store.pathFor('cloudflare'), 'provider = cloudflare\n');

    await expect(store.load('cloudflare')).rejects.toBeInstanceOf(MalformedCredentialError);
  });

  it('rejects provider ids that are not plain names', async () => {
    await expect(store.save('../cloudflare', 'test-secret')).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(() => store.pathFor('Cloud Flare')).toThrow(InvalidArgumentError);
  });

  it('keeps providers apart', async () => {
    await store.save('cloudflare', 'test-secret');
    await store.save('hetzner-dns', 'test-secret-hetzner');

    expect((await store.load('hetzner-dns')).secret).toBe('test-secret-hetzner');
    expect((await store.load('cloudflare')).secret).toBe('test-secret');
  });
});

describe('credential file format', () => {
  it('derives the secret key from the provider id', () => {
    expect(secretKeyFor('cloudflare')).toBe('dns_cloudflare_api_token');
    expect(secretKeyFor('hetzner-dns')).toBe('dns_hetzner_dns_api_token');
  });

  it('parses what it formats', () => {
    const text = formatCredentialFile({
      providerId: 'cloudflare',
      secret: 'test-secret',
      createdAt: new Date('2026-10-18T00:00:00.000Z'),
    });
    const entries = parseCredentialFile(text);

    expect(entries.get('provider')).toBe('cloudflare');
    expect(entries.get('created')).toBe('2026-10-18T00:00:00.000Z');
    expect(entries.get('dns_cloudflare_api_token')).toBe('test-secret');
    expect(entries.size).toBe(3);
  });

  it('skips comments, blanks and lines without a key', () => {
    const entries = parseCredentialFile('# note = ignored\n\n= nothing\r\nkey=value = with equals\n');

    expect([...entries]).toEqual([['key', 'value = with equals']]);
  });
});
