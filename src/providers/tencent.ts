import { z } from 'zod';
import { normalizeRecordName } from '../domain.js';
import {
  AuthenticationError,
  ProviderApiError,
  RecordNotFoundError,
  TransientNetworkError,
  ZoneNotFoundError,
} from '../errors.js';
import { parseBody, sendRequest, statusError } from '../http.js';
import type {
  DnsProvider,
  ObservedRecord,
  ProviderOptions,
  RecordChange,
  WriteOutcome,
} from '../provider.js';
import { tencentAuthorization } from '../signing.js';

export interface TencentOptions extends ProviderOptions {
  /** Sent as X-TC-Region when set; DNSPod does not require one */
  region?: string;
  /** Clock used for X-TC-Timestamp */
  now?: () => Date;
}

const TENCENT_HOST = 'dnspod.tencentcloudapi.com';
const SERVICE = 'dnspod';
const API_VERSION = '2021-03-23';
const CONTENT_TYPE = 'application/json; charset=utf-8';
const PAGE_SIZE = 3000;
/** DNSPod's name for the default resolution line */
const DEFAULT_LINE = '默认';

const recordSchema = z.object({
  RecordId: z.number(),
  Name: z.string(),
  Type: z.string(),
  Value: z.string(),
  TTL: z.number().default(600),
});

const responseSchema = z.object({
  Response: z
    .object({
      Error: z.object({ Code: z.string(), Message: z.string() }).optional(),
    })
    .passthrough(),
});

const recordListSchema = z.object({
  Response: z.object({
    RecordCountInfo: z.object({ TotalCount: z.number() }).optional(),
    RecordList: z.array(recordSchema).default([]),
  }),
});

type TencentRecord = z.infer<typeof recordSchema>;

/** DescribeRecordList reports an empty zone as this error code */
const NO_RECORDS = 'ResourceNotFound.NoDataOfRecord';

function toObserved(record: TencentRecord): ObservedRecord {
  return {
    id: String(record.RecordId),
    name: normalizeRecordName(record.Name),
    type: record.Type.toUpperCase(),
    value: record.Value,
    ttl: record.TTL,
  };
}

class TencentApiError extends ProviderApiError {}

/**
 * Create a Tencent Cloud DNSPod provider adapter.
 *
 * Uses Tencent Cloud API 3.0 with TC3-HMAC-SHA256 signing. Missing records
 * raise `RecordNotFoundError` unless `missingRecordPolicy` is `create`,
 * in which case CreateRecord adds them.
 */
export function tencent(options: TencentOptions = {}): DnsProvider {
  const endpoint = options.endpoint ?? `https://${TENCENT_HOST}`;
  const host = new URL(endpoint).host;
  const now = options.now ?? (() => new Date());

  let secretId = '';
  let secretKey = '';

  async function call(
    action: string,
    params: Record<string, unknown>,
    domain: string,
    signal?: AbortSignal
  ): Promise<string> {
    if (!secretId || !secretKey) {
      throw new AuthenticationError('Tencent: secretId and secretKey are required');
    }

    const payload = JSON.stringify(params);
    const timestamp = Math.floor(now().getTime() / 1000);

    const headers: Record<string, string> = {
      'Content-Type': CONTENT_TYPE,
      Host: host,
      Authorization: tencentAuthorization({
        secretId,
        secretKey,
        service: SERVICE,
        host,
        contentType: CONTENT_TYPE,
        payload,
        timestamp,
      }),
      'X-TC-Action': action,
      'X-TC-Version': API_VERSION,
      'X-TC-Timestamp': String(timestamp),
    };
    if (options.region) headers['X-TC-Region'] = options.region;

    const res = await sendRequest({
      provider: 'Tencent',
      url: `${endpoint}/`,
      method: 'POST',
      headers,
      body: payload,
      signal,
    });

    if (!res.ok) throw statusError('Tencent', res.status, res.body);

    const error = parseBody('Tencent', responseSchema, res.body).Response.Error;
    if (!error) return res.body;

    const detail = `${error.Code} - ${error.Message}`;
    if (error.Code.startsWith('AuthFailure')) {
      throw new AuthenticationError(`Tencent: ${detail}`);
    }
    if (
      error.Code === 'InvalidParameterValue.DomainNotExists' ||
      error.Code === 'ResourceNotFound.NoDataOfDomain'
    ) {
      throw new ZoneNotFoundError('Tencent', domain);
    }
    if (
      error.Code.startsWith('RequestLimitExceeded') ||
      error.Code.startsWith('InternalError')
    ) {
      throw new TransientNetworkError(`Tencent: ${detail}`);
    }
    throw new TencentApiError(`Tencent: ${detail}`, undefined, error.Code);
  }

  async function describe(
    domain: string,
    filter: Record<string, string>,
    signal?: AbortSignal
  ): Promise<TencentRecord[]> {
    const records: TencentRecord[] = [];
    let offset = 0;

    while (true) {
      let body: string;
      try {
        body = await call(
          'DescribeRecordList',
          { Domain: domain, Offset: offset, Limit: PAGE_SIZE, ...filter },
          domain,
          signal
        );
      } catch (err) {
        if (err instanceof TencentApiError && err.code === NO_RECORDS) break;
        throw err;
      }

      const data = parseBody('Tencent', recordListSchema, body).Response;
      records.push(...data.RecordList);
      offset += data.RecordList.length;

      const total = data.RecordCountInfo?.TotalCount ?? records.length;
      if (data.RecordList.length === 0 || offset >= total) break;
    }

    return records;
  }

  const provider: DnsProvider = {
    name: 'tencent',
    acceptsToken: false,
    missingRecordPolicy: options.missingRecordPolicy ?? 'error',

    setCredentials(primary: string, secondary = ''): void {
      secretId = primary;
      secretKey = secondary;
    },

    async getRecords(domain: string, signal?: AbortSignal): Promise<ObservedRecord[]> {
      return (await describe(domain, {}, signal)).map(toObserved);
    },

    async updateRecord(change: RecordChange, signal?: AbortSignal): Promise<WriteOutcome> {
      const name = normalizeRecordName(change.name);
      const type = change.type.toUpperCase();

      const candidates = await describe(
        change.domain,
        { Subdomain: name, RecordType: type },
        signal
      );
      const existing = candidates
        .map(toObserved)
        .find((r) => r.name === name && r.type === type);

      const fields = {
        Domain: change.domain,
        SubDomain: name,
        RecordType: type,
        RecordLine: DEFAULT_LINE,
        Value: change.value,
        TTL: change.ttl,
      };

      if (existing) {
        if (existing.value === change.value && existing.ttl === change.ttl) {
          return 'unchanged';
        }
        await call(
          'ModifyRecord',
          { ...fields, RecordId: Number(existing.id) },
          change.domain,
          signal
        );
        return 'updated';
      }

      if (provider.missingRecordPolicy === 'error') {
        throw new RecordNotFoundError('Tencent', change.domain, name, type);
      }

      await call('CreateRecord', fields, change.domain, signal);
      return 'created';
    },
  };

  return provider;
}
