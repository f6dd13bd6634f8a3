/** A DNS record as currently stored by a provider */
export interface ObservedRecord {
  /** Provider-internal record identifier */
  id: string;
  /** Name relative to the domain, "@" for the apex */
  name: string;
  type: string;
  value: string;
  ttl: number;
}

/** A single record write requested from a provider */
export interface RecordChange {
  domain: string;
  /** Name relative to the domain, "@" for the apex */
  name: string;
  type: string;
  value: string;
  ttl: number;
}

export type WriteOutcome = 'created' | 'updated' | 'unchanged';

/**
 * What `updateRecord` does when the read-before-write finds no record with
 * the requested (name, type):
 * - `create`: add the record
 * - `error`: throw `RecordNotFoundError`
 */
export type MissingRecordPolicy = 'create' | 'error';

/** Interface for a DNS provider adapter */
export interface DnsProvider {
  /** Stable identifier used for dispatch */
  readonly name: string;
  /** True if `setCredentials(token)` alone is a valid credential */
  readonly acceptsToken: boolean;
  readonly missingRecordPolicy: MissingRecordPolicy;
  /** Store credential material; it is not validated until the first request */
  setCredentials(primary: string, secondary?: string): void;
  /** Get every record of a domain (empty when the zone has none) */
  getRecords(domain: string, signal?: AbortSignal): Promise<ObservedRecord[]>;
  /** Point one record at a new value */
  updateRecord(change: RecordChange, signal?: AbortSignal): Promise<WriteOutcome>;
}

export interface ProviderOptions {
  /** Override the API base URL */
  endpoint?: string;
  missingRecordPolicy?: MissingRecordPolicy;
}
