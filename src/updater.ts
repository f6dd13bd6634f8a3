import { errorMessage, isAbortError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { ProviderRegistry } from './providers/index.js';
import { RetryError, withRetry } from './retry.js';
import { syncDnsTarget } from './sync.js';
import type {
  CycleReport,
  DnsSyncResult,
  DnsTarget,
  FileTarget,
  FileUpdateResult,
  RetryPolicy,
  TargetOutcome,
} from './types.js';
import { updateFile } from './update-file.js';

export interface UpdaterOptions {
  registry?: ProviderRegistry;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface UpdatePlan {
  dnsTargets: DnsTarget[];
  fileTargets: FileTarget[];
  retry: RetryPolicy;
}

/** At least one target of a cycle failed; `report` holds every outcome. */
export class CycleError extends Error {
  constructor(readonly report: CycleReport) {
    const failed = [...report.dns, ...report.files].filter((o) => !o.ok);
    super(
      `${failed.length} target(s) failed: ${failed.map((o) => o.target).join(', ')}`
    );
    this.name = 'CycleError';
  }
}

async function runTargets<T, R>(
  kind: 'dns' | 'file',
  targets: T[],
  nameOf: (target: T) => string,
  run: (target: T, signal: AbortSignal | undefined) => Promise<R>,
  retry: RetryPolicy,
  options: UpdaterOptions
): Promise<TargetOutcome<R>[]> {
  const logger = options.logger ?? silentLogger;
  const outcomes: TargetOutcome<R>[] = [];

  // Sequential, in configuration order
  for (const target of targets) {
    const name = nameOf(target);
    const targetLogger = logger.child({ [kind]: name });

    try {
      const { value, attempts } = await withRetry(
        () => run(target, options.signal),
        { policy: retry, logger: targetLogger, signal: options.signal, label: name }
      );
      outcomes.push({ target: name, ok: true, attempts, result: value });
    } catch (err) {
      if (isAbortError(err)) throw err;
      if (!(err instanceof RetryError)) throw err;
      targetLogger.error(`${kind} target ${name} failed: ${errorMessage(err.lastError)}`);
      outcomes.push({ target: name, ok: false, attempts: err.attempts, error: err.lastError });
    }
  }

  return outcomes;
}

/** Synchronize every DNS target with `ip`, each under the retry policy. */
export function updateDns(
  ip: string,
  targets: DnsTarget[],
  retry: RetryPolicy,
  options: UpdaterOptions = {}
): Promise<TargetOutcome<DnsSyncResult>[]> {
  return runTargets(
    'dns',
    targets,
    (t) => t.name,
    (t, signal) =>
      syncDnsTarget(t, ip, { registry: options.registry, logger: options.logger, signal }),
    retry,
    options
  );
}

/** Write `ip` into every file target, each under the retry policy. */
export function updateFiles(
  ip: string,
  targets: FileTarget[],
  retry: RetryPolicy,
  options: UpdaterOptions = {}
): Promise<TargetOutcome<FileUpdateResult>[]> {
  return runTargets(
    'file',
    targets,
    (t) => t.name,
    (t, signal) => updateFile(t, ip, { logger: options.logger, signal }),
    retry,
    options
  );
}

/**
 * Run one update cycle: every DNS target, then every file target. A failed
 * target does not stop the others. Resolves with the report when all
 * targets succeed; rejects with `CycleError` carrying the same report
 * otherwise. Cancellation stops the cycle at the next suspension point.
 */
export async function updateAll(
  ip: string,
  plan: UpdatePlan,
  options: UpdaterOptions = {}
): Promise<CycleReport> {
  const logger = options.logger ?? silentLogger;
  logger.info(`update cycle started for ${ip}`, {
    dnsTargets: plan.dnsTargets.length,
    fileTargets: plan.fileTargets.length,
  });

  const dns = await updateDns(ip, plan.dnsTargets, plan.retry, options);
  const files = await updateFiles(ip, plan.fileTargets, plan.retry, options);
  const report: CycleReport = { ip, dns, files };

  if ([...dns, ...files].some((o) => !o.ok)) {
    throw new CycleError(report);
  }

  logger.info('update cycle finished');
  return report;
}
