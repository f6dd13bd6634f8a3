import { z } from 'zod';
import { cleanDomain, normalizeRecordName, toFqdn, toRelativeName } from '../domain.js';
import { AuthenticationError, RecordNotFoundError, ZoneNotFoundError } from '../errors.js';
import { parseBody, sendRequest, statusError, tryParseBody } from '../http.js';
import type {
  DnsProvider,
  ObservedRecord,
  ProviderOptions,
  RecordChange,
  WriteOutcome,
} from '../provider.js';
import { huaweiAuthorization, huaweiSdkDate } from '../signing.js';

export interface HuaweiOptions extends ProviderOptions {
  /** Clock used for X-Sdk-Date */
  now?: () => Date;
}

const HUAWEI_API = 'https://dns.myhuaweicloud.com';
const CONTENT_TYPE = 'application/json';
const PAGE_SIZE = 500;

const zoneListSchema = z.object({
  zones: z.array(z.object({ id: z.string(), name: z.string() })).default([]),
});

const recordsetSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string(),
  records: z.array(z.string()).default([]),
  ttl: z.number().default(300),
});

const recordsetListSchema = z.object({
  recordsets: z.array(recordsetSchema).default([]),
  metadata: z.object({ total_count: z.number() }).optional(),
});

const errorSchema = z.union([
  z.object({ error_code: z.string(), error_msg: z.string() }),
  z.object({ code: z.string(), message: z.string() }),
]);

function errorDetail(body: string): { code?: string; detail: string } {
  const error = tryParseBody(errorSchema, body);
  if (!error) return { detail: body };
  return 'error_code' in error
    ? { code: error.error_code, detail: `${error.error_code} - ${error.error_msg}` }
    : { code: error.code, detail: `${error.code} - ${error.message}` };
}

/**
 * Create a Huawei Cloud DNS provider adapter.
 *
 * Uses the DNS v2 REST API with SDK-HMAC-SHA256 request signing. Zone ids
 * are looked up once per domain and cached until credentials change.
 */
export function huawei(options: HuaweiOptions = {}): DnsProvider {
  const endpoint = options.endpoint ?? HUAWEI_API;
  const host = new URL(endpoint).host;
  const now = options.now ?? (() => new Date());

  let accessKey = '';
  let secretKey = '';
  const zoneIds = new Map<string, string>();

  async function apiFetch(
    method: string,
    path: string,
    query: Record<string, string>,
    body: unknown,
    signal?: AbortSignal
  ): Promise<string> {
    if (!accessKey || !secretKey) {
      throw new AuthenticationError('Huawei: accessKey and secretKey are required');
    }

    const payload = body === undefined ? '' : JSON.stringify(body);
    const sdkDate = huaweiSdkDate(now());
    const search = new URLSearchParams(query).toString();

    const res = await sendRequest({
      provider: 'Huawei',
      url: `${endpoint}${path}${search ? `?${search}` : ''}`,
      method,
      headers: {
        'Content-Type': CONTENT_TYPE,
        'X-Sdk-Date': sdkDate,
        Authorization: huaweiAuthorization({
          accessKey,
          secretKey,
          method,
          path,
          query,
          host,
          contentType: CONTENT_TYPE,
          payload,
          sdkDate,
        }),
      },
      ...(payload ? { body: payload } : {}),
      signal,
    });

    if (!res.ok) {
      const { code, detail } = errorDetail(res.body);
      if (code?.startsWith('APIGW.03')) {
        throw new AuthenticationError(`Huawei: ${detail}`);
      }
      throw statusError('Huawei', res.status, detail, code);
    }

    return res.body;
  }

  async function getZoneId(domain: string, signal?: AbortSignal): Promise<string> {
    const cached = zoneIds.get(domain);
    if (cached) return cached;

    const body = await apiFetch(
      'GET',
      '/v2/zones',
      { name: domain, type: 'public' },
      undefined,
      signal
    );
    const zone = parseBody('Huawei', zoneListSchema, body).zones.find(
      (candidate) => cleanDomain(candidate.name) === domain
    );
    if (!zone) throw new ZoneNotFoundError('Huawei', domain);

    zoneIds.set(domain, zone.id);
    return zone.id;
  }

  async function listRecordsets(
    domain: string,
    zoneId: string,
    filter: Record<string, string>,
    signal?: AbortSignal
  ): Promise<ObservedRecord[]> {
    const records: ObservedRecord[] = [];
    let offset = 0;

    while (true) {
      const body = await apiFetch(
        'GET',
        `/v2/zones/${zoneId}/recordsets`,
        { limit: String(PAGE_SIZE), offset: String(offset), ...filter },
        undefined,
        signal
      );
      const data = parseBody('Huawei', recordsetListSchema, body);

      for (const set of data.recordsets) {
        records.push({
          id: set.id,
          name: toRelativeName(set.name, domain),
          type: set.type.toUpperCase(),
          value: set.records[0] ?? '',
          ttl: set.ttl,
        });
      }

      offset += data.recordsets.length;
      const total = data.metadata?.total_count ?? offset;
      if (data.recordsets.length === 0 || offset >= total) break;
    }

    return records;
  }

  const provider: DnsProvider = {
    name: 'huawei',
    acceptsToken: false,
    missingRecordPolicy: options.missingRecordPolicy ?? 'error',

    setCredentials(primary: string, secondary = ''): void {
      accessKey = primary;
      secretKey = secondary;
      zoneIds.clear();
    },

    async getRecords(domain: string, signal?: AbortSignal): Promise<ObservedRecord[]> {
      const zoneId = await getZoneId(domain, signal);
      return listRecordsets(domain, zoneId, {}, signal);
    },

    async updateRecord(change: RecordChange, signal?: AbortSignal): Promise<WriteOutcome> {
      const name = normalizeRecordName(change.name);
      const type = change.type.toUpperCase();
      const fqdn = `${toFqdn(name, change.domain)}.`;

      const zoneId = await getZoneId(change.domain, signal);
      const existing = (
        await listRecordsets(change.domain, zoneId, { name: fqdn, type }, signal)
      ).find((r) => r.name === name && r.type === type);

      if (existing) {
        if (existing.value === change.value && existing.ttl === change.ttl) {
          return 'unchanged';
        }
        await apiFetch(
          'PUT',
          `/v2/zones/${zoneId}/recordsets/${existing.id}`,
          {},
          { name: fqdn, type, records: [change.value], ttl: change.ttl },
          signal
        );
        return 'updated';
      }

      if (provider.missingRecordPolicy === 'error') {
        throw new RecordNotFoundError('Huawei', change.domain, name, type);
      }

      await apiFetch(
        'POST',
        `/v2/zones/${zoneId}/recordsets`,
        {},
        { name: fqdn, type, records: [change.value], ttl: change.ttl },
        signal
      );
      return 'created';
    },
  };

  return provider;
}
