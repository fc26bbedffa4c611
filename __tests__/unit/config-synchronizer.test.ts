import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { chmod, readFile, stat, writeFile } from 'fs/promises';
import { join } from 'path';

import {
  ConfigSynchronizer,
  ConfigWriteError,
  InvalidArgumentError,
  type CertificateRecord,
} from '../../src/index.js';
import { makeTempDir, removeTempDir } from '../helpers/tmp.js';

describe('ConfigSynchronizer', () => {
  let dir: string;
  let envFile: string;
  let record: CertificateRecord;

  const fresh = [
    'SSL_MODE=commercial',
    'COMMERCIAL_CERT_PATH=./certs/live/example.org/fullchain.pem',
    'COMMERCIAL_KEY_PATH=./certs/live/example.org/privkey.pem',
    'SERVER_HOSTNAME=example.org',
    '',
  ].join('\n');

  beforeEach(async () => {
    dir = await makeTempDir();
    envFile = join(dir, '.env');
    record = {
      domain: 'example.org',
      chainPath: join(dir, 'certs', 'live', 'example.org', 'fullchain.pem'),
      keyPath: join(dir, 'certs', 'live', 'example.org', 'privkey.pem'),
      issuedAt: new Date('2026-10-18T00:00:00Z'),
      expiresAt: new Date('2027-01-16T00:00:00Z'),
    };
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('creates the file with paths relative to it', async () => {
    const result = await new ConfigSynchronizer({ envFile }).apply(record);

    expect(result).toEqual({
      path: envFile,
      changed: true,
      updated: [],
      appended: ['SSL_MODE', 'COMMERCIAL_CERT_PATH', 'COMMERCIAL_KEY_PATH', 'SERVER_HOSTNAME'],
    });
    expect(await readFile(envFile, 'utf8')).toBe(fresh);
  });

  it('leaves the file byte-identical when applied again', async () => {
    const sync = new ConfigSynchronizer({ envFile });
    await sync.apply(record);
    const before = await readFile(envFile);
    const mtime = (await stat(envFile)).mtimeMs;

    const result = await sync.apply(record);

    expect(result).toEqual({ path: envFile, changed: false, updated: [], appended: [] });
    expect(await readFile(envFile)).toEqual(before);
    expect((await stat(envFile)).mtimeMs).toBe(mtime);
  });

  it('updates an existing file without duplicating keys', async () => {
    await writeFile(envFile, 'APP_PORT=8080\nSSL_MODE=self-signed\nSSL_MODE=none\n# trailing comment\n');

    const result = await new ConfigSynchronizer({ envFile }).apply(record);

    expect(result.updated).toEqual(['SSL_MODE']);
    expect(await readFile(envFile, 'utf8')).toBe(
      [
        'APP_PORT=8080',
        'SSL_MODE=commercial',
        '# trailing comment',
        'COMMERCIAL_CERT_PATH=./certs/live/example.org/fullchain.pem',
        'COMMERCIAL_KEY_PATH=./certs/live/example.org/privkey.pem',
        'SERVER_HOSTNAME=example.org',
        '',
      ].join('\n'),
    );
  });

  it('starts from the template and keeps its permissions', async () => {
    const templateFile = join(dir, '.env.example');
    await writeFile(templateFile, 'APP_PORT=8080\nSSL_MODE=self-signed\n');
    await chmod(templateFile, 0o640);

    await new ConfigSynchronizer({ envFile, templateFile }).apply(record);

    expect(await readFile(envFile, 'utf8')).toBe(
      [
        'APP_PORT=8080',
        'SSL_MODE=commercial',
        'COMMERCIAL_CERT_PATH=./certs/live/example.org/fullchain.pem',
        'COMMERCIAL_KEY_PATH=./certs/live/example.org/privkey.pem',
        'SERVER_HOSTNAME=example.org',
        '',
      ].join('\n'),
    );
    expect((await stat(envFile)).mode & 0o777).toBe(0o640);
    expect(await readFile(templateFile, 'utf8')).toBe('APP_PORT=8080\nSSL_MODE=self-signed\n');
  });

  it('keeps the mode of an existing file', async () => {
    await writeFile(envFile, 'APP_PORT=8080\n');
    await chmod(envFile, 0o600);

    await new ConfigSynchronizer({ envFile }).apply(record);

    expect((await stat(envFile)).mode & 0o777).toBe(0o600);
  });

  it('writes absolute paths for certificates outside its directory', async () => {
    const outside = {
      ...record,
      chainPath: '/etc/ssl/example.org/fullchain.pem',
      keyPath: '/etc/ssl/example.org/privkey.pem',
    };

    await new ConfigSynchronizer({ envFile }).apply(outside);

    const content = await readFile(envFile, 'utf8');
    expect(content).toContain('COMMERCIAL_CERT_PATH=/etc/ssl/example.org/fullchain.pem\n');
    expect(content).toContain('COMMERCIAL_KEY_PATH=/etc/ssl/example.org/privkey.pem\n');
  });

  it('writes the base name of a wildcard certificate as the hostname', async () => {
    const wildcard: CertificateRecord = {
      ...record,
      domain: '*.example.org',
      chainPath: join(dir, 'certs', 'live', '_wildcard.example.org', 'fullchain.pem'),
      keyPath: join(dir, 'certs', 'live', '_wildcard.example.org', 'privkey.pem'),
    };

    await new ConfigSynchronizer({ envFile }).apply(wildcard);

    expect(await readFile(envFile, 'utf8')).toBe(
      [
        'SSL_MODE=commercial',
        'COMMERCIAL_CERT_PATH=./certs/live/_wildcard.example.org/fullchain.pem',
        'COMMERCIAL_KEY_PATH=./certs/live/_wildcard.example.org/privkey.pem',
        'SERVER_HOSTNAME=example.org',
        '',
      ].join('\n'),
    );
  });

  it('adds extra entries after the certificate settings', async () => {
    await new ConfigSynchronizer({ envFile }).apply(record, [{ key: 'SSL_RENEWED_AT', value: '2026-10-18' }]);

    expect(await readFile(envFile, 'utf8')).toBe(`${fresh}SSL_RENEWED_AT=2026-10-18\n`);
  });

  it('refuses values that would break the file', async () => {
    const sync = new ConfigSynchronizer({ envFile });

    await expect(sync.apply(record, [{ key: 'NOTE', value: 'two\nlines' }])).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
    await expect(sync.apply(record, [{ key: 'BAD-KEY', value: 'x' }])).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(stat(envFile)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('reports a file it cannot write as ConfigWriteError', async () => {
    const blocker = join(dir, 'not-a-directory');
    await writeFile(blocker, '');
    const target = join(blocker, '.env');

    const error = await new ConfigSynchronizer({ envFile: target })
      .apply(record)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigWriteError);
    if (!(error instanceof ConfigWriteError)) return;
    expect(error.domain).toBe('example.org');
    expect(error.message.startsWith(`Failed to write configuration ${target}: `)).toBe(true);
  });
});
