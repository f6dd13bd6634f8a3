import { z } from 'zod';
import { normalizeRecordName } from '../domain.js';
import { AuthenticationError, RecordNotFoundError, ZoneNotFoundError } from '../errors.js';
import { parseBody, sendRequest, statusError, tryParseBody } from '../http.js';
import type {
  DnsProvider,
  ObservedRecord,
  ProviderOptions,
  RecordChange,
  WriteOutcome,
} from '../provider.js';
import { godaddyAuthorization } from '../signing.js';

const GODADDY_API = 'https://api.godaddy.com/v1';

const recordsSchema = z.array(
  z.object({
    data: z.string(),
    name: z.string(),
    ttl: z.number().default(600),
    type: z.string(),
  })
);

const errorSchema = z.object({
  code: z.string(),
  message: z.string().default(''),
  fields: z
    .array(z.object({ path: z.string().default(''), message: z.string().default('') }))
    .default([]),
});

/**
 * Create a GoDaddy provider adapter.
 *
 * Records are addressed by (type, name) instead of an id. The record set is
 * read first, then replaced with a PUT, which GoDaddy treats as an upsert, so
 * the default `create` policy needs no separate create call.
 */
export function godaddy(options: ProviderOptions = {}): DnsProvider {
  const endpoint = options.endpoint ?? GODADDY_API;

  let apiKey = '';
  let apiSecret = '';

  async function apiFetch(
    method: string,
    path: string,
    domain: string,
    body?: unknown,
    signal?: AbortSignal
  ): Promise<string> {
    if (!apiKey || !apiSecret) {
      throw new AuthenticationError('GoDaddy: apiKey and apiSecret are required');
    }

    const res = await sendRequest({
      provider: 'GoDaddy',
      url: `${endpoint}${path}`,
      method,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        Authorization: godaddyAuthorization(apiKey, apiSecret),
      },
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      signal,
    });

    if (res.ok) return res.body;

    const error = tryParseBody(errorSchema, res.body);
    if (error?.code === 'UNKNOWN_DOMAIN' || (res.status === 404 && !error)) {
      throw new ZoneNotFoundError('GoDaddy', domain);
    }

    const detail = error
      ? `${error.message} (code: ${error.code})${error.fields
          .map((f) => ` [${f.path}: ${f.message}]`)
          .join('')}`
      : res.body;
    throw statusError('GoDaddy', res.status, detail, error?.code);
  }

  const provider: DnsProvider = {
    name: 'godaddy',
    acceptsToken: false,
    missingRecordPolicy: options.missingRecordPolicy ?? 'create',

    setCredentials(primary: string, secondary = ''): void {
      apiKey = primary;
      apiSecret = secondary;
    },

    async getRecords(domain: string, signal?: AbortSignal): Promise<ObservedRecord[]> {
      const body = await apiFetch(
        'GET',
        `/domains/${encodeURIComponent(domain)}/records`,
        domain,
        undefined,
        signal
      );

      return parseBody('GoDaddy', recordsSchema, body).map((r) => {
        const name = normalizeRecordName(r.name);
        const type = r.type.toUpperCase();
        return { id: `${type}/${name}`, name, type, value: r.data, ttl: r.ttl };
      });
    },

    async updateRecord(change: RecordChange, signal?: AbortSignal): Promise<WriteOutcome> {
      const name = normalizeRecordName(change.name);
      const type = change.type.toUpperCase();
      const path = `/domains/${encodeURIComponent(change.domain)}/records/${encodeURIComponent(type)}/${encodeURIComponent(name)}`;

      const current = parseBody(
        'GoDaddy',
        recordsSchema,
        await apiFetch('GET', path, change.domain, undefined, signal)
      );
      const existing = current[0];

      if (!existing) {
        if (provider.missingRecordPolicy === 'error') {
          throw new RecordNotFoundError('GoDaddy', change.domain, name, type);
        }
      } else if (
        current.length === 1 &&
        existing.data === change.value &&
        existing.ttl === change.ttl
      ) {
        return 'unchanged';
      }

      await apiFetch(
        'PUT',
        path,
        change.domain,
        [{ data: change.value, ttl: change.ttl }],
        signal
      );
      return existing ? 'updated' : 'created';
    },
  };

  return provider;
}
