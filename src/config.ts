import { readFile } from 'node:fs/promises';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import {
  DEFAULT_API_ENDPOINTS,
  DEFAULT_DETECTION_TIMEOUT,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RECORD_TTL,
  DEFAULT_RECORD_TYPE,
  DEFAULT_RETRY_INTERVAL,
  DEFAULT_WEB_ENDPOINTS,
} from './constants.js';
import { cleanDomain, normalizeRecordName } from './domain.js';
import { errorMessage } from './errors.js';
import { normalizeFormat, validateKeyPath } from './formats.js';
import { silentLogger, type LogLevel, type Logger } from './logger.js';
import { BUILTIN_PROVIDERS } from './providers/index.js';
import type { DnsTarget, FileTarget, RetryPolicy } from './types.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: ErrorOptions
  ) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join('\n  ')}` : message, options);
    this.name = 'ConfigError';
  }
}

const attemptsSchema = z
  .number()
  .int()
  .refine((n) => n === -1 || n >= 1, 'must be -1 (unbounded) or at least 1');

const retrySchema = z
  .object({
    interval: z.number().nonnegative().default(DEFAULT_RETRY_INTERVAL),
    max_attempts: attemptsSchema.optional(),
    // Older config files count retries after the first attempt; 0 means the default
    max_retries: z
      .number()
      .int()
      .min(-1)
      .transform((n) => (n === 0 ? DEFAULT_MAX_ATTEMPTS : n === -1 ? -1 : n + 1))
      .optional(),
  })
  .default({});

const loggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    file_path: z.string().min(1).optional(),
    pretty: z.boolean().default(false),
  })
  .default({});

const ipDetectionSchema = z
  .object({
    timeout: z.number().positive().default(DEFAULT_DETECTION_TIMEOUT),
    api_endpoints: z.array(z.string().url()).default([...DEFAULT_API_ENDPOINTS]),
    web_endpoints: z.array(z.string().url()).default([...DEFAULT_WEB_ENDPOINTS]),
  })
  .default({});

const recordSchema = z.object({
  name: z.string().min(1),
  type: z
    .string()
    .min(1)
    .default(DEFAULT_RECORD_TYPE)
    .transform((type) => type.toUpperCase()),
  ttl: z.number().int().positive().default(DEFAULT_RECORD_TTL),
});

const dnsUpdaterSchema = z
  .object({
    name: z.string().min(1),
    provider: z
      .string()
      .min(1)
      .transform((provider) => provider.trim().toLowerCase()),
    access_key: z.string().optional(),
    secret_key: z.string().optional(),
    token: z.string().optional(),
    domain: z.string().min(1),
    on_missing_record: z.enum(['create', 'error']).optional(),
    record: z.array(recordSchema).min(1),
  })
  .superRefine((updater, ctx) => {
    const seen = new Set<string>();
    for (const [i, record] of updater.record.entries()) {
      const key = `${normalizeRecordName(record.name)} ${record.type}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['record', i],
          message: `duplicate ${record.type} record "${record.name}"`,
        });
      }
      seen.add(key);
    }
  });

const fileUpdaterSchema = z
  .object({
    name: z.string().min(1),
    file_path: z.string().min(1),
    format: z.string().transform((format, ctx) => {
      try {
        return normalizeFormat(format);
      } catch (err) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) });
        return z.NEVER;
      }
    }),
    key_path: z.string().min(1),
    backup: z.boolean().default(false),
  })
  .superRefine((updater, ctx) => {
    try {
      validateKeyPath(updater.format, updater.key_path);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['key_path'],
        message: errorMessage(err),
      });
    }
  });

const configSchema = z.object({
  retry: retrySchema,
  logging: loggingSchema,
  ip_detection: ipDetectionSchema,
  dns_updater: z.array(dnsUpdaterSchema).default([]),
  file_updater: z.array(fileUpdaterSchema).default([]),
});

type RawConfig = z.infer<typeof configSchema>;

export interface LoggingConfig {
  level: LogLevel;
  filePath?: string;
  pretty: boolean;
}

export interface IpDetectionConfig {
  timeoutSeconds: number;
  apiEndpoints: string[];
  webEndpoints: string[];
}

export interface UpdaterConfig {
  retry: RetryPolicy;
  logging: LoggingConfig;
  ipDetection: IpDetectionConfig;
  dnsTargets: DnsTarget[];
  fileTargets: FileTarget[];
}

export interface ConfigOptions {
  /**
   * Applied to `access_key`, `secret_key` and `token`. A value the hook
   * rejects is kept as written, so plain-text credentials keep working.
   */
  decrypt?: (value: string) => string;
  /** Provider names accepted in `[[dns_updater]]`; defaults to the built-in adapters */
  providers?: readonly string[];
  logger?: Logger;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function decryptValue(
  value: string | undefined,
  field: string,
  options: ConfigOptions
): string | undefined {
  if (!value || !options.decrypt) return value;
  try {
    return options.decrypt(value);
  } catch (err) {
    (options.logger ?? silentLogger).debug(
      `${field} is not encrypted, using it as written: ${errorMessage(err)}`
    );
    return value;
  }
}

function toDnsTarget(
  updater: RawConfig['dns_updater'][number],
  options: ConfigOptions
): DnsTarget {
  return {
    name: updater.name,
    provider: updater.provider,
    credentials: {
      accessKey: decryptValue(updater.access_key, `${updater.name}.access_key`, options),
      secretKey: decryptValue(updater.secret_key, `${updater.name}.secret_key`, options),
      token: decryptValue(updater.token, `${updater.name}.token`, options),
    },
    domain: cleanDomain(updater.domain),
    records: updater.record.map((record) => ({
      name: normalizeRecordName(record.name),
      type: record.type,
      ttl: record.ttl,
    })),
    ...(updater.on_missing_record ? { missingRecordPolicy: updater.on_missing_record } : {}),
  };
}

/** Parse and validate TOML configuration text. Throws `ConfigError`. */
export function parseConfig(text: string, options: ConfigOptions = {}): UpdaterConfig {
  let document: unknown;
  try {
    document = parseToml(text);
  } catch (err) {
    throw new ConfigError(`invalid TOML: ${errorMessage(err)}`, [], { cause: err });
  }

  const parsed = configSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError('invalid configuration', formatIssues(parsed.error));
  }
  const raw = parsed.data;

  const providers: readonly string[] = options.providers ?? BUILTIN_PROVIDERS;
  const unknown = raw.dns_updater
    .filter((updater) => !providers.includes(updater.provider))
    .map((updater) => `dns_updater "${updater.name}": unknown provider "${updater.provider}"`);
  if (unknown.length > 0) {
    throw new ConfigError('invalid configuration', unknown);
  }

  return {
    retry: {
      intervalSeconds: raw.retry.interval,
      maxAttempts: raw.retry.max_attempts ?? raw.retry.max_retries ?? DEFAULT_MAX_ATTEMPTS,
    },
    logging: {
      level: raw.logging.level,
      ...(raw.logging.file_path ? { filePath: raw.logging.file_path } : {}),
      pretty: raw.logging.pretty,
    },
    ipDetection: {
      timeoutSeconds: raw.ip_detection.timeout,
      apiEndpoints: raw.ip_detection.api_endpoints,
      webEndpoints: raw.ip_detection.web_endpoints,
    },
    dnsTargets: raw.dns_updater.map((updater) => toDnsTarget(updater, options)),
    fileTargets: raw.file_updater.map((updater) => ({
      name: updater.name,
      path: updater.file_path,
      format: updater.format,
      keyPath: updater.key_path,
      backup: updater.backup,
    })),
  };
}

export async function loadConfig(
  path: string,
  options: ConfigOptions = {}
): Promise<UpdaterConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`cannot read config file ${path}: ${errorMessage(err)}`, [], {
      cause: err,
    });
  }
  return parseConfig(text, options);
}
