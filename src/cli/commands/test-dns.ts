import type { CommandModule } from 'yargs';
import { maskCredential } from '../../credentials.js';
import { errorMessage, isAbortError } from '../../errors.js';
import { checkDnsTarget } from '../../sync.js';
import { configOption, runCommand } from '../context.js';

interface TestDnsArgs {
  config: string;
}

export const testDnsCommand: CommandModule<object, TestDnsArgs> = {
  command: 'test-dns',
  describe: 'Check credentials of every DNS target and show current record values',
  builder: (yargs) => yargs.option('config', configOption),
  handler: async (argv) => {
    await runCommand(argv.config, async ({ config, logger, signal }) => {
      if (config.dnsTargets.length === 0) {
        console.log('No DNS targets configured.');
        return 0;
      }

      let failed = 0;
      for (const target of config.dnsTargets) {
        const { accessKey, secretKey, token } = target.credentials;
        logger.debug(`testing ${target.name}`, {
          provider: target.provider,
          accessKey: maskCredential(accessKey),
          secretKey: maskCredential(secretKey),
          token: maskCredential(token),
        });

        try {
          const result = await checkDnsTarget(target, { logger, signal });
          console.log(`✓ ${target.name} (${target.provider}, ${target.domain})`);
          for (const record of result.records) {
            console.log(
              record.status === 'found'
                ? `    ${record.type} ${record.name} = ${record.value}`
                : `    ${record.type} ${record.name} not found`
            );
          }
        } catch (err) {
          if (isAbortError(err)) throw err;
          failed++;
          console.log(`✗ ${target.name} (${target.provider}, ${target.domain}): ${errorMessage(err)}`);
        }
      }

      return failed > 0 ? 1 : 0;
    });
  },
};
