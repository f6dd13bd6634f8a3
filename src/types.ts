import type { ProviderCredentials } from './credentials.js';
import type { FileFormat } from './formats.js';
import type { MissingRecordPolicy, WriteOutcome } from './provider.js';

/** A record a DNS target wants pointed at the current IP */
export interface DesiredRecord {
  /** Name relative to the domain, "@" for the apex */
  name: string;
  type: string;
  ttl: number;
}

/** One independent DNS synchronization unit */
export interface DnsTarget {
  /** Label used in logs and error reports */
  name: string;
  /** Registered provider name, e.g. "cloudflare" */
  provider: string;
  credentials: ProviderCredentials;
  domain: string;
  records: DesiredRecord[];
  /** Overrides the provider's default behaviour for records that do not exist yet */
  missingRecordPolicy?: MissingRecordPolicy;
}

/** One independent file mutation unit */
export interface FileTarget {
  /** Label used in logs and error reports */
  name: string;
  path: string;
  format: FileFormat;
  /** "/"-delimited map keys leading to a scalar, e.g. "server/public_ip" */
  keyPath: string;
  backup: boolean;
}

export interface RetryPolicy {
  intervalSeconds: number;
  /** -1 for unbounded */
  maxAttempts: number;
}

export interface RecordResult {
  name: string;
  type: string;
  outcome: WriteOutcome | 'skipped';
}

/** Result of synchronizing one DNS target */
export interface DnsSyncResult {
  target: string;
  domain: string;
  records: RecordResult[];
  /** True if the initial record read failed and every record was written blindly */
  degraded: boolean;
}

/** Result of updating one file target */
export interface FileUpdateResult {
  target: string;
  path: string;
  status: 'updated' | 'unchanged';
  previous?: string;
  value: string;
  /** True if the current value could not be read as a string before writing */
  degraded: boolean;
  backupPath?: string;
}

export type TargetOutcome<T> =
  | { target: string; ok: true; attempts: number; result: T }
  | { target: string; ok: false; attempts: number; error: unknown };

/** Per-target outcome of one update cycle */
export interface CycleReport {
  ip: string;
  dns: TargetOutcome<DnsSyncResult>[];
  files: TargetOutcome<FileUpdateResult>[];
}
