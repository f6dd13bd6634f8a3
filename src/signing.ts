import { createHash, createHmac } from 'node:crypto';

export function sha256Hex(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

export function hmacSha256(key: string | Buffer, data: string): Buffer {
  return createHmac('sha256', key).update(data, 'utf8').digest();
}

/**
 * RFC 3986 percent-encoding: unreserved characters stay, everything else
 * (including `!'()*`, which `encodeURIComponent` leaves alone) is escaped.
 */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/** Sorted, percent-encoded `key=value` pairs joined by `&` */
export function canonicalQueryString(
  params: Record<string, string>,
  exclude: readonly string[] = []
): string {
  return Object.keys(params)
    .filter((key) => !exclude.includes(key))
    .sort()
    .map((key) => `${percentEncode(key)}=${percentEncode(params[key] ?? '')}`)
    .join('&');
}

// Aliyun RPC signature v1 (HMAC-SHA1)

/** `2006-01-02T15:04:05Z` */
export function aliyunTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function aliyunStringToSign(
  method: string,
  params: Record<string, string>
): string {
  const query = canonicalQueryString(params, ['Signature']);
  return `${method.toUpperCase()}&${percentEncode('/')}&${percentEncode(query)}`;
}

export function aliyunSignature(
  method: string,
  params: Record<string, string>,
  accessKeySecret: string
): string {
  return createHmac('sha1', `${accessKeySecret}&`)
    .update(aliyunStringToSign(method, params), 'utf8')
    .digest('base64');
}

// Tencent Cloud API 3.0 (TC3-HMAC-SHA256)

export const TC3_ALGORITHM = 'TC3-HMAC-SHA256';

export interface TencentSignInput {
  secretId: string;
  secretKey: string;
  service: string;
  host: string;
  method?: string;
  path?: string;
  query?: string;
  contentType: string;
  payload: string;
  /** Unix seconds; also selects the UTC date of the credential scope */
  timestamp: number;
}

const TENCENT_SIGNED_HEADERS = 'content-type;host';

export function tencentCanonicalRequest(input: TencentSignInput): string {
  const canonicalHeaders =
    `content-type:${input.contentType.toLowerCase()}\n` +
    `host:${input.host.toLowerCase()}\n`;

  return [
    (input.method ?? 'POST').toUpperCase(),
    input.path ?? '/',
    input.query ?? '',
    canonicalHeaders,
    TENCENT_SIGNED_HEADERS,
    sha256Hex(input.payload),
  ].join('\n');
}

export function tencentAuthorization(input: TencentSignInput): string {
  const date = new Date(input.timestamp * 1000).toISOString().slice(0, 10);
  const credentialScope = `${date}/${input.service}/tc3_request`;

  const stringToSign = [
    TC3_ALGORITHM,
    String(input.timestamp),
    credentialScope,
    sha256Hex(tencentCanonicalRequest(input)),
  ].join('\n');

  const secretDate = hmacSha256(`TC3${input.secretKey}`, date);
  const secretService = hmacSha256(secretDate, input.service);
  const secretSigning = hmacSha256(secretService, 'tc3_request');
  const signature = hmacSha256(secretSigning, stringToSign).toString('hex');

  return (
    `${TC3_ALGORITHM} Credential=${input.secretId}/${credentialScope}, ` +
    `SignedHeaders=${TENCENT_SIGNED_HEADERS}, Signature=${signature}`
  );
}

// Huawei Cloud APIG signature (SDK-HMAC-SHA256)

export const HUAWEI_ALGORITHM = 'SDK-HMAC-SHA256';

export interface HuaweiSignInput {
  accessKey: string;
  secretKey: string;
  method: string;
  path: string;
  query?: Record<string, string>;
  host: string;
  contentType: string;
  payload: string;
  /** Value of the X-Sdk-Date header, see `huaweiSdkDate` */
  sdkDate: string;
}

const HUAWEI_SIGNED_HEADERS = 'content-type;host;x-sdk-date';

/** `20060102T150405Z` */
export function huaweiSdkDate(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/, 'Z')
    .replace(/[-:]/g, '');
}

/** The APIG canonical URI always ends in "/" */
function huaweiCanonicalUri(path: string): string {
  const encoded = path
    .split('/')
    .map((segment) => percentEncode(segment))
    .join('/');
  return encoded.endsWith('/') ? encoded : `${encoded}/`;
}

export function huaweiCanonicalRequest(input: HuaweiSignInput): string {
  const canonicalHeaders =
    `content-type:${input.contentType}\n` +
    `host:${input.host.toLowerCase()}\n` +
    `x-sdk-date:${input.sdkDate}\n`;

  return [
    input.method.toUpperCase(),
    huaweiCanonicalUri(input.path),
    canonicalQueryString(input.query ?? {}),
    canonicalHeaders,
    HUAWEI_SIGNED_HEADERS,
    sha256Hex(input.payload),
  ].join('\n');
}

export function huaweiAuthorization(input: HuaweiSignInput): string {
  const stringToSign = [
    HUAWEI_ALGORITHM,
    input.sdkDate,
    sha256Hex(huaweiCanonicalRequest(input)),
  ].join('\n');

  const signature = hmacSha256(input.secretKey, stringToSign).toString('hex');

  return (
    `${HUAWEI_ALGORITHM} Access=${input.accessKey}, ` +
    `SignedHeaders=${HUAWEI_SIGNED_HEADERS}, Signature=${signature}`
  );
}

// Header-only schemes

export function bearerAuthorization(token: string): string {
  return `Bearer ${token}`;
}

export function godaddyAuthorization(key: string, secret: string): string {
  return `sso-key ${key}:${secret}`;
}
