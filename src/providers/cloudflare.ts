import { z } from 'zod';
import { normalizeRecordName, toFqdn, toRelativeName } from '../domain.js';
import {
  AuthenticationError,
  RecordNotFoundError,
  ZoneNotFoundError,
} from '../errors.js';
import { parseBody, sendRequest, statusError, tryParseBody } from '../http.js';
import type {
  DnsProvider,
  ObservedRecord,
  ProviderOptions,
  RecordChange,
  WriteOutcome,
} from '../provider.js';
import { bearerAuthorization } from '../signing.js';

const CF_API = 'https://api.cloudflare.com/client/v4';
const PAGE_SIZE = 100;

/** Cloudflare error codes for a bad or under-privileged credential */
const AUTH_ERROR_CODES = new Set([9103, 9106, 9109, 10000]);

const errorsSchema = z
  .array(z.object({ code: z.number(), message: z.string() }))
  .default([]);

const envelopeSchema = z.object({
  success: z.boolean(),
  errors: errorsSchema,
});

const zonesSchema = envelopeSchema.extend({
  result: z.array(z.object({ id: z.string(), name: z.string() })),
});

const recordSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string(),
  content: z.string(),
  ttl: z.number().default(1),
});

const recordsSchema = envelopeSchema.extend({
  result: z.array(recordSchema),
  result_info: z
    .object({ page: z.number(), total_pages: z.number() })
    .optional(),
});

function formatErrors(errors: { code: number; message: string }[]): string {
  if (errors.length === 0) return 'unknown error';
  return errors.map((e) => `${e.message} (code: ${e.code})`).join(', ');
}

/**
 * Create a Cloudflare provider adapter.
 *
 * Uses Cloudflare API v4. `setCredentials(token)` authenticates with an API
 * token; `setCredentials(email, globalKey)` with the legacy global API key.
 */
export function cloudflare(options: ProviderOptions = {}): DnsProvider {
  const endpoint = options.endpoint ?? CF_API;

  let primary = '';
  let secondary = '';
  const zoneIdPromises = new Map<string, Promise<string>>();

  async function cfFetch(
    path: string,
    init: { method?: string; body?: unknown; signal?: AbortSignal } = {}
  ): Promise<string> {
    if (!primary) {
      throw new AuthenticationError('Cloudflare: apiToken is required');
    }

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (secondary) {
      headers['X-Auth-Email'] = primary;
      headers['X-Auth-Key'] = secondary;
    } else {
      headers.Authorization = bearerAuthorization(primary);
    }

    const res = await sendRequest({
      provider: 'Cloudflare',
      url: `${endpoint}${path}`,
      method: init.method ?? 'GET',
      headers,
      ...(init.body !== undefined ? { body: JSON.stringify(init.body) } : {}),
      signal: init.signal,
    });

    const envelope = tryParseBody(envelopeSchema, res.body);
    if (res.ok && envelope?.success !== false) return res.body;

    const errors = envelope?.errors ?? [];
    const detail = envelope ? formatErrors(errors) : res.body;
    if (errors.some((e) => AUTH_ERROR_CODES.has(e.code))) {
      throw new AuthenticationError(`Cloudflare: ${detail}`);
    }
    throw statusError('Cloudflare', res.ok ? 400 : res.status, detail);
  }

  async function lookupZoneId(domain: string, signal?: AbortSignal): Promise<string> {
    const body = await cfFetch(`/zones?name=${encodeURIComponent(domain)}`, { signal });
    const zone = parseBody('Cloudflare', zonesSchema, body).result[0];
    if (!zone) throw new ZoneNotFoundError('Cloudflare', domain);
    return zone.id;
  }

  function getZoneId(domain: string, signal?: AbortSignal): Promise<string> {
    let promise = zoneIdPromises.get(domain);
    if (!promise) {
      promise = lookupZoneId(domain, signal).catch((err: unknown) => {
        zoneIdPromises.delete(domain);
        throw err;
      });
      zoneIdPromises.set(domain, promise);
    }
    return promise;
  }

  async function listRecords(
    domain: string,
    zoneId: string,
    filter: string,
    signal?: AbortSignal
  ): Promise<ObservedRecord[]> {
    const records: ObservedRecord[] = [];
    let page = 1;

    while (true) {
      const body = await cfFetch(
        `/zones/${zoneId}/dns_records?page=${page}&per_page=${PAGE_SIZE}${filter}`,
        { signal }
      );
      const data = parseBody('Cloudflare', recordsSchema, body);

      for (const r of data.result) {
        records.push({
          id: r.id,
          name: toRelativeName(r.name, domain),
          type: r.type.toUpperCase(),
          value: r.content,
          ttl: r.ttl,
        });
      }

      const info = data.result_info;
      if (!info || page >= info.total_pages) break;
      page++;
    }

    return records;
  }

  const provider: DnsProvider = {
    name: 'cloudflare',
    acceptsToken: true,
    missingRecordPolicy: options.missingRecordPolicy ?? 'error',

    setCredentials(first: string, second = ''): void {
      primary = first;
      secondary = second;
      zoneIdPromises.clear();
    },

    async getRecords(domain: string, signal?: AbortSignal): Promise<ObservedRecord[]> {
      const zoneId = await getZoneId(domain, signal);
      return listRecords(domain, zoneId, '', signal);
    },

    async updateRecord(change: RecordChange, signal?: AbortSignal): Promise<WriteOutcome> {
      const name = normalizeRecordName(change.name);
      const type = change.type.toUpperCase();
      const fqdn = toFqdn(name, change.domain);

      const zoneId = await getZoneId(change.domain, signal);
      const existing = (
        await listRecords(
          change.domain,
          zoneId,
          `&name=${encodeURIComponent(fqdn)}&type=${encodeURIComponent(type)}`,
          signal
        )
      ).find((r) => r.name === name && r.type === type);

      const record = { type, name: fqdn, content: change.value, ttl: change.ttl };

      if (existing) {
        if (existing.value === change.value && existing.ttl === change.ttl) {
          return 'unchanged';
        }
        await cfFetch(`/zones/${zoneId}/dns_records/${existing.id}`, {
          method: 'PUT',
          body: record,
          signal,
        });
        return 'updated';
      }

      if (provider.missingRecordPolicy === 'error') {
        throw new RecordNotFoundError('Cloudflare', change.domain, name, type);
      }

      await cfFetch(`/zones/${zoneId}/dns_records`, {
        method: 'POST',
        body: record,
        signal,
      });
      return 'created';
    },
  };

  return provider;
}
