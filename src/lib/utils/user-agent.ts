import { readFileSync } from 'fs';
import { join } from 'path';

export interface PackageInfo {
  name: string;
  version: string;
}

let cachedPkg: PackageInfo | null = null;

function readPackageJson(path: string): Partial<PackageInfo> {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (typeof raw !== 'object' || raw === null) return {};
  return {
    name: 'name' in raw && typeof raw.name === 'string' ? raw.name : undefined,
    version: 'version' in raw && typeof raw.version === 'string' ? raw.version : undefined,
  };
}

/**
 * Package name and version from the package.json three levels up, which is
 * the project root both from src/lib/utils and from dist/lib/utils.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = { name: 'certkeeper', version: '0.0.0-dev' };
  try {
    const pkg = readPackageJson(join(__dirname, '..', '..', '..', 'package.json'));
    cachedPkg = { name: pkg.name ?? defaults.name, version: pkg.version ?? defaults.version };
  } catch {
    cachedPkg = defaults;
  }
  return cachedPkg;
}

/** User-Agent sent on every ACME and DNS API request */
export function buildUserAgent(): string {
  const { name, version } = getPackageInfo();
  return `${name}/${version} (Node/${process.version.replace(/^v/, '')})`;
}
