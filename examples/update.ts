/**
 * Live run: point one Cloudflare record and one local YAML file at the
 * current public IP.
 *
 * Usage:
 *   CF_API_TOKEN=xxx npx tsx examples/update.ts example.com ./app.yaml
 */

import {
  CycleError,
  createLogger,
  detectPublicIp,
  updateAll,
  DEFAULT_API_ENDPOINTS,
} from '../src/index.js';

const domain = process.argv[2];
const filePath = process.argv[3];
const apiToken = process.env['CF_API_TOKEN'];

if (!domain || !filePath || !apiToken) {
  console.error('Usage: CF_API_TOKEN=xxx npx tsx examples/update.ts <domain> <yaml-file>');
  process.exit(1);
}

const logger = createLogger({ level: 'debug', pretty: true });

const ip = await detectPublicIp({ apiEndpoints: [...DEFAULT_API_ENDPOINTS], logger });
console.log(`\nPublic IP: ${ip}`);

try {
  const report = await updateAll(
    ip,
    {
      dnsTargets: [
        {
          name: 'home',
          provider: 'cloudflare',
          credentials: { token: apiToken },
          domain,
          records: [{ name: 'home', type: 'A', ttl: 300 }],
        },
      ],
      fileTargets: [
        {
          name: 'app',
          path: filePath,
          format: 'yaml',
          keyPath: 'server/public_ip',
          backup: true,
        },
      ],
      retry: { intervalSeconds: 5, maxAttempts: 3 },
    },
    { logger }
  );

  for (const o of [...report.dns, ...report.files]) {
    console.log(`  ✓ ${o.target} (${o.attempts} attempt(s))`);
  }
} catch (err) {
  if (!(err instanceof CycleError)) throw err;
  for (const o of [...err.report.dns, ...err.report.files]) {
    console.log(`  ${o.ok ? '✓' : '✗'} ${o.target}`);
  }
  process.exitCode = 1;
}
