import { describe, it, expect } from 'vitest';
import { applyCredentials, maskCredential } from '../src/credentials.js';
import type { DnsProvider } from '../src/provider.js';

function recordingProvider(acceptsToken: boolean) {
  const calls: string[][] = [];
  const provider: DnsProvider = {
    name: 'fake',
    acceptsToken,
    missingRecordPolicy: 'error',
    setCredentials(primary, secondary) {
      calls.push(secondary === undefined ? [primary] : [primary, secondary]);
    },
    getRecords: () => Promise.resolve([]),
    updateRecord: () => Promise.resolve('unchanged'),
  };
  return { provider, calls };
}

describe('applyCredentials', () => {
  it('passes the token alone to providers that accept one', () => {
    const { provider, calls } = recordingProvider(true);

    applyCredentials(provider, { accessKey: 'k', secretKey: 's', token: 'test-token' });

    expect(calls).toEqual([['test-token']]);
  });

  it('falls back to the key pair without a token', () => {
    const { provider, calls } = recordingProvider(true);

    applyCredentials(provider, { accessKey: 'user@example.com', secretKey: 'test-key' });

    expect(calls).toEqual([['user@example.com', 'test-key']]);
  });

  it('ignores the token for key-pair providers', () => {
    const { provider, calls } = recordingProvider(false);

    applyCredentials(provider, { accessKey: 'k', secretKey: 's', token: 'test-token' });

    expect(calls).toEqual([['k', 's']]);
  });

  it('passes empty strings for missing fields', () => {
    const { provider, calls } = recordingProvider(false);

    applyCredentials(provider, {});

    expect(calls).toEqual([['', '']]);
  });
});

describe('maskCredential', () => {
  it('keeps four characters at each end of long secrets', () => {
    expect(maskCredential('AKIDabcdefgh1234')).toBe('AKID***1234');
  });

  it('keeps only the last two characters of short secrets', () => {
    expect(maskCredential('short')).toBe('***rt');
    expect(maskCredential('12345678')).toBe('***78');
  });

  it('hides single characters entirely', () => {
    expect(maskCredential('x')).toBe('***');
  });

  it('marks missing values', () => {
    expect(maskCredential(undefined)).toBe('(unset)');
    expect(maskCredential('')).toBe('(unset)');
  });
});
