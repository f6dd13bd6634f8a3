import { applyCredentials } from './credentials.js';
import { normalizeRecordName } from './domain.js';
import { DnsSyncError, errorMessage, isAbortError, type RecordFailure } from './errors.js';
import { errorMeta, silentLogger, type Logger } from './logger.js';
import type { ObservedRecord } from './provider.js';
import { createProviderRegistry, type ProviderRegistry } from './providers/index.js';
import type { DnsSyncResult, DnsTarget, RecordResult } from './types.js';

export interface SyncOptions {
  registry?: ProviderRegistry;
  logger?: Logger;
  signal?: AbortSignal;
}

function recordKey(name: string, type: string): string {
  return `${normalizeRecordName(name)} ${type.toUpperCase()}`;
}

/**
 * Bring every record of a DNS target up to date with `ip`.
 *
 * 1. Resolves the provider adapter and attaches credentials
 * 2. Reads the domain's records once (not once per record)
 * 3. Skips records that already hold `ip`, writes the rest
 * 4. Keeps going after a record fails and throws `DnsSyncError` naming every
 *    failed record at the end
 *
 * If the initial read fails the target is written blindly and the result
 * is flagged `degraded`.
 */
export async function syncDnsTarget(
  target: DnsTarget,
  ip: string,
  options: SyncOptions = {}
): Promise<DnsSyncResult> {
  const registry = options.registry ?? createProviderRegistry();
  const logger = (options.logger ?? silentLogger).child({ target: target.name });
  const { signal } = options;

  const provider = registry.create(target.provider, {
    missingRecordPolicy: target.missingRecordPolicy,
  });
  applyCredentials(provider, target.credentials);

  const current = new Map<string, string>();
  let degraded = false;

  signal?.throwIfAborted();
  try {
    const observed: ObservedRecord[] = await provider.getRecords(target.domain, signal);
    // First match wins when a provider returns duplicates
    for (const record of observed) {
      const key = recordKey(record.name, record.type);
      if (!current.has(key)) current.set(key, record.value);
    }
    logger.debug(`fetched ${observed.length} record(s) for ${target.domain}`);
  } catch (err) {
    if (isAbortError(err)) throw err;
    degraded = true;
    logger.warn(
      `could not read records of ${target.domain}, writing every record without comparison`,
      errorMeta(err)
    );
  }

  const records: RecordResult[] = [];
  const failures: RecordFailure[] = [];

  for (const desired of target.records) {
    const name = normalizeRecordName(desired.name);
    const type = desired.type.toUpperCase();

    if (current.get(recordKey(name, type)) === ip) {
      logger.debug(`${type} ${name} already points to ${ip}`);
      records.push({ name, type, outcome: 'skipped' });
      continue;
    }

    signal?.throwIfAborted();
    try {
      const outcome = await provider.updateRecord(
        { domain: target.domain, name, type, value: ip, ttl: desired.ttl },
        signal
      );
      logger.info(`${type} ${name}.${target.domain} ${outcome} -> ${ip}`);
      records.push({ name, type, outcome });
    } catch (err) {
      if (isAbortError(err)) throw err;
      logger.error(`${type} ${name}.${target.domain} failed: ${errorMessage(err)}`);
      failures.push({ name, type, error: err });
    }
  }

  if (failures.length > 0) {
    throw new DnsSyncError(target.name, failures);
  }

  return { target: target.name, domain: target.domain, records, degraded };
}

export type RecordCheck =
  | { name: string; type: string; status: 'found'; value: string }
  | { name: string; type: string; status: 'missing' };

export interface DnsCheckResult {
  target: string;
  provider: string;
  domain: string;
  records: RecordCheck[];
}

/**
 * Verify a target's credentials and report what each configured record
 * currently holds. Read-only; nothing is written.
 */
export async function checkDnsTarget(
  target: DnsTarget,
  options: SyncOptions = {}
): Promise<DnsCheckResult> {
  const registry = options.registry ?? createProviderRegistry();
  const provider = registry.create(target.provider, {
    missingRecordPolicy: target.missingRecordPolicy,
  });
  applyCredentials(provider, target.credentials);

  const observed = await provider.getRecords(target.domain, options.signal);

  const records = target.records.map((desired): RecordCheck => {
    const name = normalizeRecordName(desired.name);
    const type = desired.type.toUpperCase();
    const match = observed.find(
      (r) => recordKey(r.name, r.type) === recordKey(name, type)
    );
    return match
      ? { name, type, status: 'found', value: match.value }
      : { name, type, status: 'missing' };
  });

  return {
    target: target.name,
    provider: target.provider,
    domain: target.domain,
    records,
  };
}
