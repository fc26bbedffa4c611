import { AcmeAuthority } from '../lib/acme/acme-authority.js';
import type { ChallengeProvider } from '../lib/challenges/challenge-provider.js';
import { createDefaultRegistry } from '../lib/challenges/registry.js';
import type { LifecycleConfig } from '../lib/config.js';
import type { CertificateAuthorityClient } from '../lib/core/authority.js';
import { CertificateClient } from '../lib/core/certificate-client.js';
import { CertificateRepository } from '../lib/core/certificate-repository.js';
import { CredentialStore } from '../lib/credentials/credential-store.js';
import { ConfigSynchronizer } from '../lib/sync/config-synchronizer.js';

/** The wired components one CLI invocation works with */
export interface Lifecycle {
  config: LifecycleConfig;
  credentials: CredentialStore;
  challenges: ChallengeProvider;
  authority: CertificateAuthorityClient;
  repository: CertificateRepository;
  client: CertificateClient;
  synchronizer: ConfigSynchronizer;
}

export type LifecycleFactory = (config: LifecycleConfig) => Lifecycle;

export function createLifecycle(config: LifecycleConfig): Lifecycle {
  const credentials = new CredentialStore(config.credentialsDir);
  const challenges = createDefaultRegistry().create(config.dnsProvider, {
    credentials,
    propagationDelayMs: config.propagationDelayMs,
    retry: config.retry,
  });
  const authority = new AcmeAuthority({
    directoryUrl: config.directoryUrl,
    accountKeyPath: config.accountKeyPath,
  });
  const repository = new CertificateRepository(config.certificatesDir);

  return {
    config,
    credentials,
    challenges,
    authority,
    repository,
    client: new CertificateClient({
      authority,
      challenges,
      repository,
      renewalThresholdDays: config.renewalThresholdDays,
      validationTimeoutMs: config.validationTimeoutMs,
      poll: config.poll,
      retry: config.retry,
    }),
    synchronizer: new ConfigSynchronizer({ envFile: config.envFile, templateFile: config.envTemplate }),
  };
}
