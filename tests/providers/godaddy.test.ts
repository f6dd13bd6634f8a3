import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { godaddy } from '../../src/providers/godaddy.js';
import {
  AuthenticationError,
  ProviderApiError,
  RecordNotFoundError,
  ZoneNotFoundError,
} from '../../src/errors.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

function okJson<T>(data: T) {
  return {
    ok: true,
    status: 200,
    text: () => Promise.resolve(JSON.stringify(data)),
  };
}

function okEmpty() {
  return {
    ok: true,
    status: 200,
    text: () => Promise.resolve(''),
  };
}

function apiError(status: number, body: unknown) {
  return {
    ok: false,
    status,
    text: () => Promise.resolve(JSON.stringify(body)),
  };
}

function createProvider(options: Parameters<typeof godaddy>[0] = {}) {
  const provider = godaddy(options);
  provider.setCredentials('test-key', 'test-secret');
  return provider;
}

describe('godaddy', () => {
  it('requires a key and secret before calling the API', async () => {
    const provider = godaddy();
    provider.setCredentials('test-key');

    await expect(provider.getRecords('example.com')).rejects.toThrow(
      'GoDaddy: apiKey and apiSecret are required'
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('getRecords lists every record with the sso-key header', async () => {
    mockFetch.mockResolvedValueOnce(
      okJson([
        { data: '1.1.1.1', name: '@', ttl: 600, type: 'A' },
        { data: 'example.com', name: 'WWW', type: 'cname' },
      ])
    );

    const records = await createProvider().getRecords('example.com');

    expect(records).toEqual([
      { id: 'A/@', name: '@', type: 'A', value: '1.1.1.1', ttl: 600 },
      { id: 'CNAME/www', name: 'www', type: 'CNAME', value: 'example.com', ttl: 600 },
    ]);

    const [url, init] = mockFetch.mock.calls[0]!;
    expect(url).toBe('https://api.godaddy.com/v1/domains/example.com/records');
    expect(init.headers.Authorization).toBe('sso-key test-key:test-secret');
    expect(init.headers.Accept).toBe('application/json');
  });

  describe('updateRecord', () => {
    const change = { domain: 'example.com', name: 'www', type: 'A', value: '2.2.2.2', ttl: 600 };

    it('replaces an existing record set', async () => {
      mockFetch
        .mockResolvedValueOnce(okJson([{ data: '1.1.1.1', name: 'www', ttl: 600, type: 'A' }]))
        .mockResolvedValueOnce(okEmpty());

      await expect(createProvider().updateRecord(change)).resolves.toBe('updated');

      expect(mockFetch.mock.calls[0]![0]).toBe(
        'https://api.godaddy.com/v1/domains/example.com/records/A/www'
      );
      const [url, init] = mockFetch.mock.calls[1]!;
      expect(url).toBe('https://api.godaddy.com/v1/domains/example.com/records/A/www');
      expect(init.method).toBe('PUT');
      expect(JSON.parse(init.body)).toEqual([{ data: '2.2.2.2', ttl: 600 }]);
    });

    it('does not write when value and TTL already match', async () => {
      mockFetch.mockResolvedValueOnce(
        okJson([{ data: '2.2.2.2', name: 'www', ttl: 600, type: 'A' }])
      );

      await expect(createProvider().updateRecord(change)).resolves.toBe('unchanged');
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('collapses a multi-value set to the new address', async () => {
      mockFetch
        .mockResolvedValueOnce(
          okJson([
            { data: '2.2.2.2', name: 'www', ttl: 600, type: 'A' },
            { data: '3.3.3.3', name: 'www', ttl: 600, type: 'A' },
          ])
        )
        .mockResolvedValueOnce(okEmpty());

      await expect(createProvider().updateRecord(change)).resolves.toBe('updated');
      expect(JSON.parse(mockFetch.mock.calls[1]![1].body)).toEqual([{ data: '2.2.2.2', ttl: 600 }]);
    });

    it('creates a missing apex record by default', async () => {
      mockFetch.mockResolvedValueOnce(okJson([])).mockResolvedValueOnce(okEmpty());

      await expect(createProvider().updateRecord({ ...change, name: '@' })).resolves.toBe(
        'created'
      );
      expect(mockFetch.mock.calls[1]![0]).toBe(
        'https://api.godaddy.com/v1/domains/example.com/records/A/%40'
      );
    });

    it('refuses to create a record when the policy is "error"', async () => {
      mockFetch.mockResolvedValueOnce(okJson([]));

      await expect(
        createProvider({ missingRecordPolicy: 'error' }).updateRecord(change)
      ).rejects.toBeInstanceOf(RecordNotFoundError);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });
  });

  describe('errors', () => {
    it('maps 401 to AuthenticationError', async () => {
      mockFetch.mockResolvedValueOnce(
        apiError(401, { code: 'UNABLE_TO_AUTHENTICATE', message: 'Unauthorized' })
      );

      await expect(createProvider().getRecords('example.com')).rejects.toThrow(
        new AuthenticationError(
          'GoDaddy: unauthorized (HTTP 401): Unauthorized (code: UNABLE_TO_AUTHENTICATE)'
        )
      );
    });

    it('maps UNKNOWN_DOMAIN to ZoneNotFoundError', async () => {
      mockFetch.mockResolvedValueOnce(
        apiError(404, { code: 'UNKNOWN_DOMAIN', message: 'The given domain is not registered' })
      );

      await expect(createProvider().getRecords('example.com')).rejects.toBeInstanceOf(
        ZoneNotFoundError
      );
    });

    it('includes field errors in the message', async () => {
      mockFetch
        .mockResolvedValueOnce(okJson([]))
        .mockResolvedValueOnce(
          apiError(422, {
            code: 'INVALID_BODY',
            message: 'Request body is invalid',
            fields: [{ path: 'records[0].data', message: 'is not a valid IPv4 address' }],
          })
        );

      const err = await createProvider()
        .updateRecord({ domain: 'example.com', name: 'www', type: 'A', value: 'bad', ttl: 600 })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ProviderApiError);
      expect(err).toHaveProperty(
        'message',
        'GoDaddy: API error 422: Request body is invalid (code: INVALID_BODY) [records[0].data: is not a valid IPv4 address]'
      );
    });
  });
});
