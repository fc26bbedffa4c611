import { mkdir, readFile, stat } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';

import { SSL_MODE_COMMERCIAL } from '../constants/defaults.js';
import type { CertificateRecord } from '../core/certificate-repository.js';
import { ConfigWriteError, InvalidArgumentError } from '../errors/lifecycle-errors.js';
import { debugConfig } from '../utils/debug.js';
import { baseDomain } from '../utils/domain.js';
import { isErrnoException, writeFileAtomic } from '../utils/fs.js';
import { ENV_KEY, upsertEnv, type ConfigEntry } from './env-file.js';

export interface SyncResult {
  path: string;
  changed: boolean;
  updated: string[];
  appended: string[];
}

export interface ConfigSynchronizerOptions {
  /** Target configuration file */
  envFile: string;
  /** Copied when the target does not exist yet */
  templateFile?: string;
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw err;
  }
}

/**
 * Writes the certificate settings of a CertificateRecord into the server's
 * env file. Applying the same record twice leaves the file byte-identical.
 */
export class ConfigSynchronizer {
  private readonly envFile: string;
  private readonly templateFile?: string;

  constructor(options: ConfigSynchronizerOptions) {
    this.envFile = resolve(options.envFile);
    this.templateFile = options.templateFile ? resolve(options.templateFile) : undefined;
  }

  get path(): string {
    return this.envFile;
  }

  /**
   * SSL_MODE, COMMERCIAL_CERT_PATH, COMMERCIAL_KEY_PATH and SERVER_HOSTNAME,
   * followed by the extra entries. A wildcard record advertises its base name.
   */
  entriesFor(record: CertificateRecord, extra: ConfigEntry[] = []): ConfigEntry[] {
    return [
      { key: 'SSL_MODE', value: SSL_MODE_COMMERCIAL },
      { key: 'COMMERCIAL_CERT_PATH', value: this.displayPath(record.chainPath) },
      { key: 'COMMERCIAL_KEY_PATH', value: this.displayPath(record.keyPath) },
      { key: 'SERVER_HOSTNAME', value: baseDomain(record.domain) },
      ...extra,
    ];
  }

  async apply(record: CertificateRecord, extra: ConfigEntry[] = []): Promise<SyncResult> {
    const entries = this.entriesFor(record, extra);
    for (const { key, value } of entries) {
      if (!ENV_KEY.test(key)) {
        throw new InvalidArgumentError(`Invalid configuration key "${key}"`, {
          domain: record.domain,
          operation: 'apply',
        });
      }
      if (/[\r\n]/.test(value)) {
        throw new InvalidArgumentError(`Value of ${key} must not contain a line break`, {
          domain: record.domain,
          operation: 'apply',
        });
      }
    }

    try {
      const existing = await readIfExists(this.envFile);
      const base = existing ?? (this.templateFile ? await readIfExists(this.templateFile) : null) ?? '';
      const result = upsertEnv(base, entries);

      if (existing !== null && result.content === existing) {
        debugConfig('%s already up to date', this.envFile);
        return { path: this.envFile, changed: false, updated: [], appended: [] };
      }

      const mode = await this.targetMode();
      await mkdir(dirname(this.envFile), { recursive: true });
      await writeFileAtomic(this.envFile, result.content, mode);

      debugConfig(
        '%s written: updated=%j appended=%j%s',
        this.envFile,
        result.updated,
        result.appended,
        existing === null ? ' (created)' : '',
      );
      return { path: this.envFile, changed: true, updated: result.updated, appended: result.appended };
    } catch (err) {
      throw ConfigWriteError.create(this.envFile, err, record.domain);
    }
  }

  /** `./relative` for files under the config file's directory, absolute otherwise */
  private displayPath(path: string): string {
    const rel = relative(dirname(this.envFile), resolve(path));
    if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
      return resolve(path);
    }
    return `./${rel.split(sep).join('/')}`;
  }

  private async targetMode(): Promise<number> {
    for (const candidate of [this.envFile, this.templateFile]) {
      if (!candidate) continue;
      try {
        return (await stat(candidate)).mode & 0o777;
      } catch (err) {
        if (!(isErrnoException(err) && err.code === 'ENOENT')) throw err;
      }
    }
    return 0o644;
  }
}
