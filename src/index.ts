export { updateAll, updateDns, updateFiles, CycleError } from './updater.js';
export type { UpdatePlan, UpdaterOptions } from './updater.js';
export { syncDnsTarget, checkDnsTarget } from './sync.js';
export type { SyncOptions, DnsCheckResult, RecordCheck } from './sync.js';
export { updateFile, getFileValue, checkFileTarget, BACKUP_SUFFIX } from './update-file.js';
export type { FileUpdateOptions, FileCheckResult } from './update-file.js';
export { withRetry, attemptLimit, RetryError, UNBOUNDED_ATTEMPTS } from './retry.js';
export type { RetryOptions, RetryResult } from './retry.js';
export { detectPublicIp } from './detect-ip.js';
export type { DetectOptions } from './detect-ip.js';
export { parseConfig, loadConfig, ConfigError } from './config.js';
export type {
  UpdaterConfig,
  ConfigOptions,
  LoggingConfig,
  IpDetectionConfig,
} from './config.js';
export { applyCredentials, maskCredential } from './credentials.js';
export type { ProviderCredentials } from './credentials.js';
export { mergeIpWithMask } from './ip-mask.js';
export { writeFileAtomic } from './atomic-write.js';
export { FILE_FORMATS, normalizeFormat, codecFor, validateKeyPath } from './formats.js';
export type { FileFormat, DocumentCodec } from './formats.js';
export { getAtPath, setAtPath, parseKeyPath } from './document.js';
export type { DocumentMap, DocumentValue, DocumentScalar } from './document.js';
export { cleanDomain, toFqdn, toRelativeName, normalizeRecordName, APEX } from './domain.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions, LogLevel, LogMeta } from './logger.js';
export {
  createProviderRegistry,
  BUILTIN_PROVIDERS,
  aliyun,
  tencent,
  huawei,
  cloudflare,
  godaddy,
} from './providers/index.js';
export type {
  ProviderRegistry,
  ProviderFactory,
  BuiltinProvider,
  AliyunOptions,
  TencentOptions,
  HuaweiOptions,
} from './providers/index.js';
export {
  UpdaterError,
  ProviderNotFoundError,
  AuthenticationError,
  ZoneNotFoundError,
  RecordNotFoundError,
  TransientNetworkError,
  ProviderApiError,
  InvalidPathError,
  FormatError,
  FileAccessError,
  DnsSyncError,
  isRetryable,
  isAbortError,
} from './errors.js';
export type { ErrorKind, RecordFailure } from './errors.js';
export type {
  DnsProvider,
  ObservedRecord,
  RecordChange,
  WriteOutcome,
  MissingRecordPolicy,
  ProviderOptions,
} from './provider.js';
export type {
  DesiredRecord,
  DnsTarget,
  FileTarget,
  RetryPolicy,
  RecordResult,
  DnsSyncResult,
  FileUpdateResult,
  TargetOutcome,
  CycleReport,
} from './types.js';
export {
  VERSION,
  DEFAULT_API_ENDPOINTS,
  DEFAULT_WEB_ENDPOINTS,
  DEFAULT_CONFIG_PATH,
} from './constants.js';
