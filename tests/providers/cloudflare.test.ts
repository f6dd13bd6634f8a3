import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { cloudflare } from '../../src/providers/cloudflare.js';
import {
  AuthenticationError,
  ProviderApiError,
  RecordNotFoundError,
  TransientNetworkError,
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

function cfResponse<T>(result: T, resultInfo?: { page: number; total_pages: number }) {
  return {
    ok: true,
    status: 200,
    text: () =>
      Promise.resolve(
        JSON.stringify({ success: true, errors: [], result, result_info: resultInfo })
      ),
  };
}

function cfError(status: number, body: string) {
  return {
    ok: false,
    status,
    text: () => Promise.resolve(body),
  };
}

const zone = cfResponse([{ id: 'z1', name: 'example.com' }]);

function createProvider(options: Parameters<typeof cloudflare>[0] = {}) {
  const provider = cloudflare(options);
  provider.setCredentials('test-token');
  return provider;
}

describe('cloudflare', () => {
  it('requires a token before calling the API', async () => {
    await expect(cloudflare().getRecords('example.com')).rejects.toThrow(
      'Cloudflare: apiToken is required'
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('accepts a bearer token in place of a key pair', () => {
    expect(cloudflare().acceptsToken).toBe(true);
  });

  describe('getRecords', () => {
    it('resolves the zone and lists records with relative names', async () => {
      mockFetch.mockResolvedValueOnce(zone).mockResolvedValueOnce(
        cfResponse(
          [
            { id: 'r1', type: 'A', name: 'example.com', content: '1.1.1.1', ttl: 1 },
            { id: 'r2', type: 'A', name: 'www.example.com', content: '1.1.1.1', ttl: 300 },
          ],
          { page: 1, total_pages: 1 }
        )
      );

      const records = await createProvider().getRecords('example.com');

      expect(records).toEqual([
        { id: 'r1', name: '@', type: 'A', value: '1.1.1.1', ttl: 1 },
        { id: 'r2', name: 'www', type: 'A', value: '1.1.1.1', ttl: 300 },
      ]);
      expect(mockFetch.mock.calls[0]![0]).toBe(
        'https://api.cloudflare.com/client/v4/zones?name=example.com'
      );
      expect(mockFetch.mock.calls[1]![0]).toBe(
        'https://api.cloudflare.com/client/v4/zones/z1/dns_records?page=1&per_page=100'
      );

      const [, init] = mockFetch.mock.calls[0]!;
      expect(init.headers.Authorization).toBe('Bearer test-token');
      expect(init.headers['Content-Type']).toBe('application/json');
    });

    it('uses the global API key when given an email and key', async () => {
      mockFetch.mockResolvedValueOnce(zone).mockResolvedValueOnce(cfResponse([]));

      const provider = cloudflare();
      provider.setCredentials('admin@example.com', 'test-global-key');
      await provider.getRecords('example.com');

      const [, init] = mockFetch.mock.calls[0]!;
      expect(init.headers['X-Auth-Email']).toBe('admin@example.com');
      expect(init.headers['X-Auth-Key']).toBe('test-global-key');
      expect(init.headers.Authorization).toBeUndefined();
    });

    it('follows pagination', async () => {
      mockFetch
        .mockResolvedValueOnce(zone)
        .mockResolvedValueOnce(
          cfResponse([{ id: 'r1', type: 'A', name: 'a.example.com', content: '1.1.1.1' }], {
            page: 1,
            total_pages: 2,
          })
        )
        .mockResolvedValueOnce(
          cfResponse([{ id: 'r2', type: 'A', name: 'b.example.com', content: '1.1.1.1' }], {
            page: 2,
            total_pages: 2,
          })
        );

      const records = await createProvider().getRecords('example.com');

      expect(records.map((r) => r.name)).toEqual(['a', 'b']);
      expect(mockFetch.mock.calls[2]![0]).toBe(
        'https://api.cloudflare.com/client/v4/zones/z1/dns_records?page=2&per_page=100'
      );
    });

    it('caches the zone id', async () => {
      mockFetch
        .mockResolvedValueOnce(zone)
        .mockResolvedValueOnce(cfResponse([]))
        .mockResolvedValueOnce(cfResponse([]));

      const provider = createProvider();
      await provider.getRecords('example.com');
      await provider.getRecords('example.com');

      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('throws ZoneNotFoundError for an unknown zone', async () => {
      mockFetch.mockResolvedValueOnce(cfResponse([]));

      await expect(createProvider().getRecords('example.com')).rejects.toThrow(
        new ZoneNotFoundError('Cloudflare', 'example.com')
      );
    });
  });

  describe('updateRecord', () => {
    const change = { domain: 'example.com', name: 'www', type: 'A', value: '2.2.2.2', ttl: 300 };

    it('updates an existing record with PUT', async () => {
      mockFetch
        .mockResolvedValueOnce(zone)
        .mockResolvedValueOnce(
          cfResponse([{ id: 'r2', type: 'A', name: 'www.example.com', content: '1.1.1.1', ttl: 300 }])
        )
        .mockResolvedValueOnce(cfResponse({ id: 'r2' }));

      await expect(createProvider().updateRecord(change)).resolves.toBe('updated');

      expect(mockFetch.mock.calls[1]![0]).toBe(
        'https://api.cloudflare.com/client/v4/zones/z1/dns_records?page=1&per_page=100&name=www.example.com&type=A'
      );
      const [url, init] = mockFetch.mock.calls[2]!;
      expect(url).toBe('https://api.cloudflare.com/client/v4/zones/z1/dns_records/r2');
      expect(init.method).toBe('PUT');
      expect(JSON.parse(init.body)).toEqual({
        type: 'A',
        name: 'www.example.com',
        content: '2.2.2.2',
        ttl: 300,
      });
    });

    it('does not write when value and TTL already match', async () => {
      mockFetch
        .mockResolvedValueOnce(zone)
        .mockResolvedValueOnce(
          cfResponse([{ id: 'r2', type: 'A', name: 'www.example.com', content: '2.2.2.2', ttl: 300 }])
        );

      await expect(createProvider().updateRecord(change)).resolves.toBe('unchanged');
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('throws RecordNotFoundError for a missing record by default', async () => {
      mockFetch.mockResolvedValueOnce(zone).mockResolvedValueOnce(cfResponse([]));

      await expect(createProvider().updateRecord(change)).rejects.toBeInstanceOf(
        RecordNotFoundError
      );
    });

    it('creates a missing record when the policy is "create"', async () => {
      mockFetch
        .mockResolvedValueOnce(zone)
        .mockResolvedValueOnce(cfResponse([]))
        .mockResolvedValueOnce(cfResponse({ id: 'new' }));

      await expect(
        createProvider({ missingRecordPolicy: 'create' }).updateRecord(change)
      ).resolves.toBe('created');

      const [url, init] = mockFetch.mock.calls[2]!;
      expect(url).toBe('https://api.cloudflare.com/client/v4/zones/z1/dns_records');
      expect(init.method).toBe('POST');
    });
  });

  describe('errors', () => {
    it('maps credential error codes to AuthenticationError', async () => {
      mockFetch.mockResolvedValueOnce(
        cfError(
          400,
          JSON.stringify({ success: false, errors: [{ code: 9109, message: 'Invalid access token' }] })
        )
      );

      await expect(createProvider().getRecords('example.com')).rejects.toThrow(
        new AuthenticationError('Cloudflare: Invalid access token (code: 9109)')
      );
    });

    it('treats success: false on a 200 as an API error', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: true,
        status: 200,
        text: () =>
          Promise.resolve(
            JSON.stringify({ success: false, errors: [{ code: 1004, message: 'DNS Validation Error' }] })
          ),
      });

      const err = await createProvider().getRecords('example.com').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ProviderApiError);
      expect(err).toHaveProperty(
        'message',
        'Cloudflare: API error 400: DNS Validation Error (code: 1004)'
      );
    });

    it('maps rate limiting to TransientNetworkError', async () => {
      mockFetch.mockResolvedValueOnce(cfError(429, 'Too Many Requests'));

      await expect(createProvider().getRecords('example.com')).rejects.toThrow(
        new TransientNetworkError('Cloudflare: API error 429: Too Many Requests')
      );
    });

    it('retries the zone lookup after a failure', async () => {
      mockFetch
        .mockResolvedValueOnce(cfError(500, 'oops'))
        .mockResolvedValueOnce(zone)
        .mockResolvedValueOnce(cfResponse([]));

      const provider = createProvider();
      await expect(provider.getRecords('example.com')).rejects.toBeInstanceOf(
        TransientNetworkError
      );
      await expect(provider.getRecords('example.com')).resolves.toEqual([]);
    });
  });
});
