import type { DnsProvider } from './provider.js';

/** Credential material for one DNS target. Which fields apply depends on the provider. */
export interface ProviderCredentials {
  accessKey?: string;
  secretKey?: string;
  /** Bearer token, used instead of the key pair by providers that accept one */
  token?: string;
}

/**
 * Attach credentials to an adapter right before use. Providers that accept a
 * bearer token get the token alone when one is configured.
 */
export function applyCredentials(
  provider: DnsProvider,
  credentials: ProviderCredentials
): void {
  if (provider.acceptsToken && credentials.token) {
    provider.setCredentials(credentials.token);
    return;
  }
  provider.setCredentials(
    credentials.accessKey ?? '',
    credentials.secretKey ?? ''
  );
}

/**
 * Mask a secret for log output.
 *
 * E.g. "AKIDabcdefgh1234" → "AKID***1234"
 *      "short" → "***rt"
 */
export function maskCredential(credential: string | undefined): string {
  if (!credential) return '(unset)';
  if (credential.length <= 8) {
    if (credential.length < 2) return '***';
    return `***${credential.slice(-2)}`;
  }
  return `${credential.slice(0, 4)}***${credential.slice(-4)}`;
}
