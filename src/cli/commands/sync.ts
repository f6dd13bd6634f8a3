import { isIPv4 } from 'node:net';
import type { CommandModule } from 'yargs';
import { detectPublicIp } from '../../detect-ip.js';
import { errorMessage } from '../../errors.js';
import type { CycleReport, TargetOutcome } from '../../types.js';
import { CycleError, updateAll } from '../../updater.js';
import { configOption, runCommand } from '../context.js';

interface SyncArgs {
  config: string;
  ip?: string;
}

function printOutcomes<T>(
  label: string,
  outcomes: TargetOutcome<T>[],
  describe: (result: T) => string
): void {
  for (const outcome of outcomes) {
    if (outcome.ok) {
      console.log(`✓ ${label} ${outcome.target}: ${describe(outcome.result)}`);
    } else {
      console.log(
        `✗ ${label} ${outcome.target}: ${errorMessage(outcome.error)} (${outcome.attempts} attempt(s))`
      );
    }
  }
}

function printReport(report: CycleReport): void {
  printOutcomes('dns', report.dns, (result) =>
    result.records.map((r) => `${r.type} ${r.name} ${r.outcome}`).join(', ')
  );
  printOutcomes('file', report.files, (result) =>
    result.status === 'updated' ? `${result.path} -> ${result.value}` : `${result.path} unchanged`
  );
}

export const syncCommand: CommandModule<object, SyncArgs> = {
  command: 'sync',
  describe: 'Detect the public IP and update every DNS and file target',
  builder: (yargs) =>
    yargs.option('config', configOption).option('ip', {
      type: 'string',
      description: 'Use this IP instead of detecting it',
    }),
  handler: async (argv) => {
    await runCommand(argv.config, async ({ config, logger, signal }) => {
      let ip = argv.ip?.trim();
      if (ip) {
        if (!isIPv4(ip)) logger.warn(`--ip '${ip}' is not a valid IPv4 address, using it anyway`);
      } else {
        ip = await detectPublicIp({
          apiEndpoints: config.ipDetection.apiEndpoints,
          webEndpoints: config.ipDetection.webEndpoints,
          timeoutSeconds: config.ipDetection.timeoutSeconds,
          signal,
          logger,
        });
      }
      logger.info(`current public IP: ${ip}`);

      try {
        const report = await updateAll(
          ip,
          {
            dnsTargets: config.dnsTargets,
            fileTargets: config.fileTargets,
            retry: config.retry,
          },
          { logger, signal }
        );
        printReport(report);
        return 0;
      } catch (err) {
        if (!(err instanceof CycleError)) throw err;
        printReport(err.report);
        console.error(err.message);
        return 1;
      }
    });
  },
};
