import { join, resolve } from 'path';

import { DEFAULT_DIRECTORY_URL } from './acme/directory.js';
import {
  DEFAULT_DNS_PROVIDER,
  PROPAGATION_DELAY_MS,
  RENEWAL_THRESHOLD_DAYS,
  VALIDATION_TIMEOUT_MS,
} from './constants/defaults.js';
import { DEFAULT_POLL_CONFIG, type PollConfig } from './core/certificate-client.js';
import { ConfigurationError } from './errors/lifecycle-errors.js';
import { DEFAULT_RETRY_CONFIG, type RetryConfig } from './transport/retry.js';
import { debugConfig } from './utils/debug.js';

/**
 * Every path and setting the components need. Built once per invocation and
 * passed to each component's constructor.
 */
export interface LifecycleConfig {
  baseDir: string;
  credentialsDir: string;
  certificatesDir: string;
  accountKeyPath: string;
  envFile: string;
  envTemplate: string;
  directoryUrl: string;
  dnsProvider: string;
  propagationDelayMs: number;
  renewalThresholdDays: number;
  validationTimeoutMs: number;
  poll: PollConfig;
  retry: RetryConfig;
}

export type ConfigOverrides = Partial<Omit<LifecycleConfig, 'poll' | 'retry'>> & {
  poll?: Partial<PollConfig>;
  retry?: Partial<RetryConfig>;
};

export type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

/** Non-negative number from an env var; `scale` converts units (seconds to ms). */
function numberFromEnv(env: Env, name: string, scale = 1): number | undefined {
  const raw = nonEmpty(env[name]);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw ConfigurationError.invalidSetting(name, raw, 'a non-negative number');
  }
  return value * scale;
}

/**
 * Explicit overrides win over CERTKEEPER_* environment variables, which win
 * over the defaults. Derived paths follow the directory they live in.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): LifecycleConfig {
  const baseDir = resolve(overrides.baseDir ?? nonEmpty(env.CERTKEEPER_HOME) ?? process.cwd());
  const certificatesDir = resolve(
    baseDir,
    overrides.certificatesDir ?? nonEmpty(env.CERTKEEPER_CERTS_DIR) ?? 'certs',
  );

  const config: LifecycleConfig = {
    baseDir,
    credentialsDir: resolve(baseDir, overrides.credentialsDir ?? nonEmpty(env.CERTKEEPER_SECRETS_DIR) ?? 'secrets'),
    certificatesDir,
    accountKeyPath: resolve(
      baseDir,
      overrides.accountKeyPath ??
        nonEmpty(env.CERTKEEPER_ACCOUNT_KEY) ??
        join(certificatesDir, 'account', 'account-key.json'),
    ),
    envFile: resolve(baseDir, overrides.envFile ?? nonEmpty(env.CERTKEEPER_ENV_FILE) ?? '.env'),
    envTemplate: resolve(baseDir, overrides.envTemplate ?? nonEmpty(env.CERTKEEPER_ENV_TEMPLATE) ?? '.env.example'),
    directoryUrl: overrides.directoryUrl ?? nonEmpty(env.CERTKEEPER_DIRECTORY_URL) ?? DEFAULT_DIRECTORY_URL,
    dnsProvider: overrides.dnsProvider ?? nonEmpty(env.CERTKEEPER_DNS_PROVIDER) ?? DEFAULT_DNS_PROVIDER,
    propagationDelayMs:
      overrides.propagationDelayMs ?? numberFromEnv(env, 'CERTKEEPER_PROPAGATION_SECONDS', 1000) ?? PROPAGATION_DELAY_MS,
    renewalThresholdDays:
      overrides.renewalThresholdDays ?? numberFromEnv(env, 'CERTKEEPER_RENEWAL_DAYS') ?? RENEWAL_THRESHOLD_DAYS,
    validationTimeoutMs:
      overrides.validationTimeoutMs ??
      numberFromEnv(env, 'CERTKEEPER_VALIDATION_TIMEOUT_SECONDS', 1000) ??
      VALIDATION_TIMEOUT_MS,
    poll: { ...DEFAULT_POLL_CONFIG, ...overrides.poll },
    retry: { ...DEFAULT_RETRY_CONFIG, ...overrides.retry },
  };

  debugConfig('resolved config %O', config);
  return config;
}
