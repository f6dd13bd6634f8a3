import { ProviderNotFoundError } from '../errors.js';
import type { DnsProvider, MissingRecordPolicy } from '../provider.js';
import { aliyun } from './aliyun.js';
import { cloudflare } from './cloudflare.js';
import { godaddy } from './godaddy.js';
import { huawei } from './huawei.js';
import { tencent } from './tencent.js';

export type ProviderFactory = (options: {
  missingRecordPolicy?: MissingRecordPolicy;
}) => DnsProvider;

export interface ProviderRegistry {
  register(name: string, factory: ProviderFactory): void;
  has(name: string): boolean;
  names(): string[];
  /** Fresh adapter for one target; throws `ProviderNotFoundError` if unknown */
  create(name: string, options?: { missingRecordPolicy?: MissingRecordPolicy }): DnsProvider;
}

export const BUILTIN_PROVIDERS = [
  'aliyun',
  'tencent',
  'huawei',
  'cloudflare',
  'godaddy',
] as const;

export type BuiltinProvider = (typeof BUILTIN_PROVIDERS)[number];

/** Registry of adapter factories keyed by provider name */
export function createProviderRegistry(
  factories: Partial<Record<string, ProviderFactory>> = {}
): ProviderRegistry {
  const registered = new Map<string, ProviderFactory>([
    ['aliyun', aliyun],
    ['tencent', tencent],
    ['huawei', huawei],
    ['cloudflare', cloudflare],
    ['godaddy', godaddy],
  ]);

  for (const [name, factory] of Object.entries(factories)) {
    if (factory) registered.set(name, factory);
  }

  return {
    register(name, factory) {
      registered.set(name, factory);
    },

    has(name) {
      return registered.has(name);
    },

    names() {
      return [...registered.keys()];
    },

    create(name, options = {}) {
      const factory = registered.get(name);
      if (!factory) throw new ProviderNotFoundError(name);
      return factory(options);
    },
  };
}

export { aliyun, cloudflare, godaddy, huawei, tencent };
export type { AliyunOptions } from './aliyun.js';
export type { HuaweiOptions } from './huawei.js';
export type { TencentOptions } from './tencent.js';
