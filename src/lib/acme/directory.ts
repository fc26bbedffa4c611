// ACME directory URLs of the supported certificate authority

export interface AcmeDirectoryEntry {
  directoryUrl: string;
  name: string;
  environment: 'staging' | 'production';
}

/**
 * Let's Encrypt endpoints. Staging issues untrusted certificates under far
 * higher rate limits and is the place to test a new setup.
 */
export const letsencrypt = {
  production: {
    directoryUrl: 'https://acme-v02.api.letsencrypt.org/directory',
    name: "Let's Encrypt",
    environment: 'production',
  },
  staging: {
    directoryUrl: 'https://acme-staging-v02.api.letsencrypt.org/directory',
    name: "Let's Encrypt Staging",
    environment: 'staging',
  },
} as const satisfies Record<'production' | 'staging', AcmeDirectoryEntry>;

export const DEFAULT_DIRECTORY_URL = letsencrypt.production.directoryUrl;
