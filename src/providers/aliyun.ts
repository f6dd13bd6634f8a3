import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { normalizeRecordName } from '../domain.js';
import {
  AuthenticationError,
  ProviderApiError,
  TransientNetworkError,
  ZoneNotFoundError,
  RecordNotFoundError,
} from '../errors.js';
import { parseBody, sendRequest, tryParseBody } from '../http.js';
import type {
  DnsProvider,
  ObservedRecord,
  ProviderOptions,
  RecordChange,
  WriteOutcome,
} from '../provider.js';
import { aliyunSignature, aliyunTimestamp } from '../signing.js';

export interface AliyunOptions extends ProviderOptions {
  /** Clock used for the Timestamp parameter */
  now?: () => Date;
  /** Source of SignatureNonce values */
  nonce?: () => string;
}

const ALIYUN_API = 'https://alidns.aliyuncs.com';
const API_VERSION = '2015-01-09';
const PAGE_SIZE = 500;

const recordSchema = z.object({
  RecordId: z.union([z.string(), z.number()]).transform(String),
  RR: z.string(),
  Type: z.string(),
  Value: z.string(),
  TTL: z.number().default(600),
});

const describeSchema = z.object({
  TotalCount: z.number().default(0),
  DomainRecords: z
    .object({ Record: z.array(recordSchema).default([]) })
    .default({ Record: [] }),
});

const errorSchema = z.object({
  Code: z.string(),
  Message: z.string().default(''),
});

const AUTH_CODES = [
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'IncompleteSignature',
  'Forbidden',
];

type AliyunRecord = z.infer<typeof recordSchema>;

function toObserved(record: AliyunRecord): ObservedRecord {
  return {
    id: record.RecordId,
    name: normalizeRecordName(record.RR),
    type: record.Type.toUpperCase(),
    value: record.Value,
    ttl: record.TTL,
  };
}

/**
 * Create an Aliyun (Alibaba Cloud DNS) provider adapter.
 *
 * Uses the RPC-style Alidns API with HMAC-SHA1 query signing. Records that
 * do not exist yet are added with AddDomainRecord unless
 * `missingRecordPolicy` is `error`.
 */
export function aliyun(options: AliyunOptions = {}): DnsProvider {
  const endpoint = options.endpoint ?? ALIYUN_API;
  const now = options.now ?? (() => new Date());
  const nonce = options.nonce ?? (() => randomUUID());

  let accessKeyId = '';
  let accessKeySecret = '';

  function signedParams(
    method: string,
    action: string,
    params: Record<string, string>
  ): Record<string, string> {
    const all: Record<string, string> = {
      Format: 'JSON',
      Version: API_VERSION,
      AccessKeyId: accessKeyId,
      SignatureMethod: 'HMAC-SHA1',
      SignatureVersion: '1.0',
      SignatureNonce: nonce(),
      Timestamp: aliyunTimestamp(now()),
      Action: action,
      ...params,
    };
    return { ...all, Signature: aliyunSignature(method, all, accessKeySecret) };
  }

  async function call(
    method: 'GET' | 'POST',
    action: string,
    params: Record<string, string>,
    domain: string,
    signal?: AbortSignal
  ): Promise<string> {
    if (!accessKeyId || !accessKeySecret) {
      throw new AuthenticationError('Aliyun: accessKeyId and accessKeySecret are required');
    }

    const query = new URLSearchParams(signedParams(method, action, params)).toString();
    const res = await sendRequest(
      method === 'GET'
        ? { provider: 'Aliyun', url: `${endpoint}/?${query}`, signal }
        : {
            provider: 'Aliyun',
            url: `${endpoint}/`,
            method: 'POST',
            headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
            body: query,
            signal,
          }
    );

    if (res.ok) return res.body;

    const error = tryParseBody(errorSchema, res.body);
    const code = error?.Code ?? '';
    const detail = error ? `${error.Code} - ${error.Message}` : res.body;

    if (AUTH_CODES.some((prefix) => code.startsWith(prefix))) {
      throw new AuthenticationError(`Aliyun: ${detail}`);
    }
    if (code.startsWith('InvalidDomainName')) {
      throw new ZoneNotFoundError('Aliyun', domain);
    }
    if (res.status === 401 || res.status === 403) {
      throw new AuthenticationError(`Aliyun: unauthorized (HTTP ${res.status}): ${detail}`);
    }
    if (code === 'Throttling' || code.startsWith('ServiceUnavailable') || res.status >= 500) {
      throw new TransientNetworkError(`Aliyun: API error ${res.status}: ${detail}`);
    }
    throw new ProviderApiError(`Aliyun: API error ${res.status}: ${detail}`, res.status, code);
  }

  async function describe(
    domain: string,
    filter: Record<string, string>,
    signal?: AbortSignal
  ): Promise<AliyunRecord[]> {
    const records: AliyunRecord[] = [];
    let page = 1;

    while (true) {
      const body = await call(
        'GET',
        'DescribeDomainRecords',
        {
          DomainName: domain,
          PageNumber: String(page),
          PageSize: String(PAGE_SIZE),
          ...filter,
        },
        domain,
        signal
      );
      const data = parseBody('Aliyun', describeSchema, body);
      records.push(...data.DomainRecords.Record);

      if (
        data.DomainRecords.Record.length < PAGE_SIZE ||
        records.length >= data.TotalCount
      ) {
        break;
      }
      page++;
    }

    return records;
  }

  const provider: DnsProvider = {
    name: 'aliyun',
    acceptsToken: false,
    missingRecordPolicy: options.missingRecordPolicy ?? 'create',

    setCredentials(primary: string, secondary = ''): void {
      accessKeyId = primary;
      accessKeySecret = secondary;
    },

    async getRecords(domain: string, signal?: AbortSignal): Promise<ObservedRecord[]> {
      return (await describe(domain, {}, signal)).map(toObserved);
    },

    async updateRecord(change: RecordChange, signal?: AbortSignal): Promise<WriteOutcome> {
      const name = normalizeRecordName(change.name);
      const type = change.type.toUpperCase();

      const candidates = await describe(
        change.domain,
        { RRKeyWord: name, Type: type },
        signal
      );
      const existing = candidates
        .map(toObserved)
        .find((r) => r.name === name && r.type === type);

      const fields = {
        RR: name,
        Type: type,
        Value: change.value,
        TTL: String(change.ttl),
      };

      if (existing) {
        // UpdateDomainRecord rejects a write that changes nothing
        if (existing.value === change.value && existing.ttl === change.ttl) {
          return 'unchanged';
        }
        await call(
          'POST',
          'UpdateDomainRecord',
          { RecordId: existing.id, ...fields },
          change.domain,
          signal
        );
        return 'updated';
      }

      if (provider.missingRecordPolicy === 'error') {
        throw new RecordNotFoundError('Aliyun', change.domain, name, type);
      }

      await call(
        'POST',
        'AddDomainRecord',
        { DomainName: change.domain, ...fields },
        change.domain,
        signal
      );
      return 'created';
    },
  };

  return provider;
}
