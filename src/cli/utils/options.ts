import { letsencrypt } from '../../lib/acme/directory.js';
import type { ConfigOverrides } from '../../lib/config.js';
import { InvalidArgumentError } from '../../lib/errors/lifecycle-errors.js';

/** Flags shared by issue and renew */
export interface CommonOptions {
  staging?: boolean;
  directory?: string;
  provider?: string;
  propagationSeconds?: string;
  timeoutSeconds?: string;
  envFile?: string;
  /** false with --no-apply */
  apply: boolean;
}

export function parseNumberFlag(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new InvalidArgumentError(`${flag} expects a non-negative number, got "${raw}"`, { flag });
  }
  return value;
}

export function resolveDirectoryUrl(options: Pick<CommonOptions, 'staging' | 'directory'>): string | undefined {
  if (options.staging && options.directory) {
    throw new InvalidArgumentError('--staging and --directory cannot be combined');
  }
  if (options.staging) return letsencrypt.staging.directoryUrl;
  if (options.directory) {
    try {
      new URL(options.directory);
    } catch {
      throw new InvalidArgumentError(`--directory expects a URL, got "${options.directory}"`);
    }
    return options.directory;
  }
  return undefined;
}

/** CLI flags as config overrides; flags not given leave env and defaults in charge */
export function overridesFrom(options: CommonOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const directoryUrl = resolveDirectoryUrl(options);
  if (directoryUrl) overrides.directoryUrl = directoryUrl;
  if (options.provider) overrides.dnsProvider = options.provider;
  if (options.envFile) overrides.envFile = options.envFile;
  if (options.propagationSeconds !== undefined) {
    overrides.propagationDelayMs = parseNumberFlag('--propagation-seconds', options.propagationSeconds) * 1000;
  }
  if (options.timeoutSeconds !== undefined) {
    overrides.validationTimeoutMs = parseNumberFlag('--timeout-seconds', options.timeoutSeconds) * 1000;
  }

  return overrides;
}
