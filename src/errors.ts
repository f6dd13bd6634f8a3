/**
 * Every failure the updater raises carries one of these kinds. Retry
 * decisions are made on the kind, never on the message text.
 */
export type ErrorKind =
  | 'provider-not-found'
  | 'authentication'
  | 'zone-not-found'
  | 'record-not-found'
  | 'transient'
  | 'provider-api'
  | 'invalid-path'
  | 'format'
  | 'file-not-found'
  | 'permission-denied'
  | 'aggregate';

const TERMINAL_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'provider-not-found',
  'authentication',
  'zone-not-found',
  'invalid-path',
  'format',
  'file-not-found',
  'permission-denied',
]);

export abstract class UpdaterError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }

  get retryable(): boolean {
    return !TERMINAL_KINDS.has(this.kind);
  }
}

export class ProviderNotFoundError extends UpdaterError {
  readonly kind = 'provider-not-found';

  constructor(readonly provider: string) {
    super(`DNS provider not found: ${provider}`);
  }
}

export class AuthenticationError extends UpdaterError {
  readonly kind = 'authentication';
}

export class ZoneNotFoundError extends UpdaterError {
  readonly kind = 'zone-not-found';

  constructor(
    readonly provider: string,
    readonly domain: string,
    options?: ErrorOptions
  ) {
    super(`${provider}: zone not found for domain "${domain}"`, options);
  }
}

export class RecordNotFoundError extends UpdaterError {
  readonly kind = 'record-not-found';

  constructor(
    readonly provider: string,
    readonly domain: string,
    readonly recordName: string,
    readonly recordType: string
  ) {
    super(
      `${provider}: no ${recordType} record "${recordName}" in "${domain}" and the provider is configured not to create it`
    );
  }
}

export class TransientNetworkError extends UpdaterError {
  readonly kind = 'transient';
}

/** Non-2xx response that is neither an auth failure nor transient. */
export class ProviderApiError extends UpdaterError {
  readonly kind = 'provider-api';

  constructor(
    message: string,
    readonly status?: number,
    readonly code?: string
  ) {
    super(message);
  }
}

export class InvalidPathError extends UpdaterError {
  readonly kind = 'invalid-path';

  constructor(
    readonly keyPath: string,
    reason: string
  ) {
    super(`invalid key path "${keyPath}": ${reason}`);
  }
}

export class FormatError extends UpdaterError {
  readonly kind = 'format';
}

export class FileAccessError extends UpdaterError {
  readonly kind: 'file-not-found' | 'permission-denied';

  constructor(
    kind: 'file-not-found' | 'permission-denied',
    readonly path: string,
    options?: ErrorOptions
  ) {
    super(
      kind === 'file-not-found'
        ? `file not found: ${path}`
        : `permission denied: ${path}`,
      options
    );
    this.kind = kind;
  }
}

export interface RecordFailure {
  name: string;
  type: string;
  error: unknown;
}

/** One or more records of a DNS target could not be brought up to date. */
export class DnsSyncError extends UpdaterError {
  readonly kind = 'aggregate';

  constructor(
    readonly target: string,
    readonly failures: RecordFailure[]
  ) {
    super(
      `${target}: ${failures.length} record(s) failed: ${failures
        .map((f) => `${f.type} ${f.name} (${errorMessage(f.error)})`)
        .join('; ')}`
    );
  }

  override get retryable(): boolean {
    return this.failures.some((f) => isRetryable(f.error));
  }
}

/** Caller-initiated cancellation; request timeouts surface as transient errors instead. */
export function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'AbortError'
  );
}

/**
 * Structural retry classification. Unknown errors, such as a `TypeError`
 * thrown by `fetch` on a dropped connection, are retryable; aborts are not.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof UpdaterError) return error.retryable;
  if (isAbortError(error)) return false;
  return true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
