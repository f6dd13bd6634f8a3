/** Name used for the zone apex in relative record names */
export const APEX = '@';

/**
 * Normalize a configured zone name.
 *
 * Examples:
 * - `Example.COM` → `example.com`
 * - `example.com.` → `example.com`
 * - `https://example.com/` → `example.com`
 */
export function cleanDomain(input: string): string {
  let domain = input.trim().toLowerCase();

  if (domain.includes('://')) {
    try {
      domain = new URL(domain).hostname;
    } catch {
      // Not a parseable URL: strip the scheme by hand
      domain = domain.split('://')[1] ?? domain;
    }
  }

  domain = domain.split('/')[0] ?? domain;

  if (domain.endsWith('.')) {
    domain = domain.slice(0, -1);
  }

  return domain;
}

/**
 * Convert a relative record name to a fully qualified one.
 *
 * E.g. "www" in "example.com" → "www.example.com"
 *      "@" or "" in "example.com" → "example.com"
 */
export function toFqdn(name: string, domain: string): string {
  if (!name || name === APEX) return domain;
  return `${name}.${domain}`;
}

/**
 * Convert a fully qualified name (with or without trailing dot) to the
 * relative form used throughout the updater.
 *
 * E.g. "www.example.com." with domain "example.com" → "www"
 *      "example.com" with domain "example.com" → "@"
 */
export function toRelativeName(fqdn: string, domain: string): string {
  let name = fqdn.toLowerCase();
  if (name.endsWith('.')) name = name.slice(0, -1);

  if (name === domain) return APEX;

  const suffix = `.${domain}`;
  if (name.endsWith(suffix)) return name.slice(0, -suffix.length);
  return name;
}

/** Canonical form of a relative name for comparisons */
export function normalizeRecordName(name: string): string {
  const lower = name.trim().toLowerCase();
  return lower === '' ? APEX : lower;
}
