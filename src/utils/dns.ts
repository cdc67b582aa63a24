/**
 * Helpers for DNS names and record content
 */
import { isIPv4, isIPv6 } from 'net';

const LABEL_PATTERN = /^(?!-)[a-z0-9_-]{1,63}(?<!-)$/i;

/**
 * Lowercase and strip a trailing dot
 */
export function normalizeHostname(hostname: string): string {
  const lower = hostname.trim().toLowerCase();
  return lower.endsWith('.') ? lower.slice(0, -1) : lower;
}

/**
 * Normalize and drop duplicates; first occurrence wins
 */
export function dedupeDomains(domains: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const domain of domains) {
    const normalized = normalizeHostname(domain);
    if (normalized.length > 0 && !seen.has(normalized)) {
      seen.add(normalized);
      result.push(normalized);
    }
  }
  return result;
}

/**
 * A dot-separated hostname; a trailing dot is accepted
 */
export function isHostname(value: string): boolean {
  const host = value.endsWith('.') ? value.slice(0, -1) : value;
  if (host.length === 0 || host.length > 253) {
    return false;
  }
  return host.split('.').every((label) => LABEL_PATTERN.test(label));
}

/**
 * A record name relative to its domain: '' (apex), '*', '*.label…' or labels
 */
export function isRecordName(name: string): boolean {
  if (name === '' || name === '*') {
    return true;
  }
  const rest = name.startsWith('*.') ? name.slice(2) : name;
  return isHostname(rest) && !rest.endsWith('.');
}

export { isIPv4, isIPv6 };

/**
 * Turn a fully qualified name into one relative to `domain` ('' for the apex)
 */
export function toRelativeName(fqdn: string, domain: string): string {
  const name = normalizeHostname(fqdn);
  const zone = normalizeHostname(domain);

  if (name === zone || name === '@') {
    return '';
  }
  if (name.endsWith(`.${zone}`)) {
    return name.slice(0, -(zone.length + 1));
  }
  return name;
}

/**
 * Ensure a relative name carries the zone suffix
 */
export function toFqdn(name: string, domain: string): string {
  const zone = normalizeHostname(domain);
  const normalized = normalizeHostname(name);

  if (normalized === '' || normalized === '@' || normalized === zone) {
    return zone;
  }
  if (normalized.endsWith(`.${zone}`)) {
    return normalized;
  }
  return `${normalized}.${zone}`;
}

/**
 * Strip one pair of surrounding double quotes from TXT content
 */
export function unquoteTxt(content: string): string {
  const trimmed = content.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}
