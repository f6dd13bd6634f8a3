import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, loadConfig, parseConfig } from '../src/config.js';

const fullConfig = `
[retry]
interval = 30
max_attempts = 5

[logging]
level = "debug"
file_path = "/tmp/ip-updater-test.log"

[ip_detection]
timeout = 10
api_endpoints = ["https://ip.example.com"]
web_endpoints = []

[[dns_updater]]
name = "home"
provider = "Cloudflare"
token = "test-token"
domain = "Example.COM."
on_missing_record = "create"

[[dns_updater.record]]
name = "@"
type = "a"
ttl = 300

[[dns_updater.record]]
name = "WWW"

[[file_updater]]
name = "app"
file_path = "/etc/app/config.yml"
format = "yml"
key_path = "server/public_ip"
backup = true
`;

describe('parseConfig', () => {
  it('maps every section onto the updater types', () => {
    expect(parseConfig(fullConfig)).toEqual({
      retry: { intervalSeconds: 30, maxAttempts: 5 },
      logging: { level: 'debug', filePath: '/tmp/ip-updater-test.log', pretty: false },
      ipDetection: {
        timeoutSeconds: 10,
        apiEndpoints: ['https://ip.example.com'],
        webEndpoints: [],
      },
      dnsTargets: [
        {
          name: 'home',
          provider: 'cloudflare',
          credentials: { accessKey: undefined, secretKey: undefined, token: 'test-token' },
          domain: 'example.com',
          records: [
            { name: '@', type: 'A', ttl: 300 },
            { name: 'www', type: 'A', ttl: 600 },
          ],
          missingRecordPolicy: 'create',
        },
      ],
      fileTargets: [
        {
          name: 'app',
          path: '/etc/app/config.yml',
          format: 'yaml',
          keyPath: 'server/public_ip',
          backup: true,
        },
      ],
    });
  });

  it('applies defaults to an empty file', () => {
    expect(parseConfig('')).toEqual({
      retry: { intervalSeconds: 60, maxAttempts: -1 },
      logging: { level: 'info', pretty: false },
      ipDetection: {
        timeoutSeconds: 30,
        apiEndpoints: [
          'https://api.ipify.org',
          'https://ipv4.icanhazip.com',
          'https://checkip.amazonaws.com',
        ],
        webEndpoints: ['https://ifconfig.me/ip', 'https://ipinfo.io/ip'],
      },
      dnsTargets: [],
      fileTargets: [],
    });
  });

  it('counts max_retries as retries after the first attempt', () => {
    expect(parseConfig('[retry]\nmax_retries = 3\n').retry.maxAttempts).toBe(4);
    expect(parseConfig('[retry]\nmax_retries = -1\n').retry.maxAttempts).toBe(-1);
  });

  it('treats max_retries = 0 as unbounded', () => {
    expect(parseConfig('[retry]\nmax_retries = 0\n').retry).toEqual({
      intervalSeconds: 60,
      maxAttempts: -1,
    });
  });

  it('prefers max_attempts over max_retries', () => {
    expect(
      parseConfig('[retry]\nmax_attempts = 2\nmax_retries = 5\n').retry.maxAttempts
    ).toBe(2);
  });

  it('decrypts credentials through the hook', () => {
    const config = parseConfig(
      `
[[dns_updater]]
name = "ali"
provider = "aliyun"
access_key = "enc:test-key"
secret_key = "plain-secret"
domain = "example.com"
[[dns_updater.record]]
name = "www"
`,
      {
        decrypt: (value) => {
          if (!value.startsWith('enc:')) throw new Error('not encrypted');
          return value.slice(4);
        },
      }
    );

    expect(config.dnsTargets[0]?.credentials).toEqual({
      accessKey: 'test-key',
      secretKey: 'plain-secret',
      token: undefined,
    });
  });

  it('rejects an unknown provider', () => {
    expect(() =>
      parseConfig(`
[[dns_updater]]
name = "x"
provider = "route53"
domain = "example.com"
[[dns_updater.record]]
name = "www"
`)
    ).toThrow('dns_updater "x": unknown provider "route53"');
  });

  it('rejects duplicate records within a target', () => {
    expect(() =>
      parseConfig(`
[[dns_updater]]
name = "x"
provider = "godaddy"
domain = "example.com"
[[dns_updater.record]]
name = "www"
[[dns_updater.record]]
name = "WWW"
type = "A"
`)
    ).toThrow('dns_updater.0.record.1: duplicate A record "WWW"');
  });

  it('rejects unsupported formats and bad INI key paths', () => {
    const err = (() => {
      try {
        parseConfig(`
[[file_updater]]
name = "a"
file_path = "a.xml"
format = "xml"
key_path = "ip"

[[file_updater]]
name = "b"
file_path = "b.ini"
format = "ini"
key_path = "ip"
`);
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toHaveProperty('issues', [
      'file_updater.0.format: unsupported file format: xml',
      'file_updater.1.key_path: invalid key path "ip": INI paths must be section/key',
    ]);
  });

  it('reports TOML syntax errors as ConfigError', () => {
    expect(() => parseConfig('[retry\n')).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ip-updater-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and parses a file', async () => {
    const path = join(dir, 'config.toml');
    await writeFile(path, '[retry]\ninterval = 5\n');

    await expect(loadConfig(path)).resolves.toMatchObject({
      retry: { intervalSeconds: 5, maxAttempts: -1 },
    });
  });

  it('fails with ConfigError when the file is missing', async () => {
    await expect(loadConfig(join(dir, 'nope.toml'))).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('sample configuration', () => {
  it('parses examples/config.toml', async () => {
    const config = await loadConfig(
      fileURLToPath(new URL('../examples/config.toml', import.meta.url))
    );

    expect(config.dnsTargets.map((t) => [t.name, t.provider, t.records.length])).toEqual([
      ['home', 'cloudflare', 2],
      ['aliyun-office', 'aliyun', 1],
    ]);
    expect(config.dnsTargets[1]?.missingRecordPolicy).toBe('error');
    expect(config.fileTargets.map((t) => [t.name, t.format, t.backup])).toEqual([
      ['wireguard', 'yaml', true],
      ['legacy', 'ini', false],
    ]);
  });
});
