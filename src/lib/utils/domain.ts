const LABEL = /^(?!-)[a-z0-9-]{1,63}(?<!-)$/i;

/** Lower-case and strip a trailing root dot. */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * RFC 1123 hostname check: at least two labels, 63 characters per label,
 * 253 in total, no leading or trailing hyphen, non-numeric top-level label.
 * A single leading `*.` is accepted for wildcard names.
 */
export function isValidHostname(domain: string): boolean {
  if (domain.length === 0 || domain.length > 253) return false;

  const name = domain.startsWith('*.') ? domain.slice(2) : domain;
  const labels = name.split('.');
  if (labels.length < 2) return false;
  if (!labels.every((label) => LABEL.test(label))) return false;

  return !/^\d+$/.test(labels[labels.length - 1]);
}

export function isValidEmail(email: string): boolean {
  return /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(email);
}

/** `_acme-challenge.<domain>`; a wildcard validates against its base name. */
export function challengeRecordName(domain: string): string {
  return `_acme-challenge.${domain.replace(/^\*\./, '')}`;
}

/** Hostname without a wildcard prefix */
export function baseDomain(domain: string): string {
  return domain.replace(/^\*\./, '');
}
