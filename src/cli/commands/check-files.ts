import type { CommandModule } from 'yargs';
import { errorMessage } from '../../errors.js';
import { checkFileTarget } from '../../update-file.js';
import { configOption, runCommand } from '../context.js';

interface CheckFilesArgs {
  config: string;
}

export const checkFilesCommand: CommandModule<object, CheckFilesArgs> = {
  command: 'check-files',
  describe: 'Check that every file target exists, parses and has a usable key path',
  builder: (yargs) => yargs.option('config', configOption),
  handler: async (argv) => {
    await runCommand(argv.config, async ({ config }) => {
      if (config.fileTargets.length === 0) {
        console.log('No file targets configured.');
        return 0;
      }

      let failed = 0;
      for (const target of config.fileTargets) {
        try {
          const { value } = await checkFileTarget(target);
          const shown = value === undefined ? 'not set, will be created' : `= ${String(value)}`;
          console.log(`✓ ${target.name} (${target.format}) ${target.path}:${target.keyPath} ${shown}`);
        } catch (err) {
          failed++;
          console.log(`✗ ${target.name} (${target.format}) ${target.path}: ${errorMessage(err)}`);
        }
      }

      return failed > 0 ? 1 : 0;
    });
  },
};
