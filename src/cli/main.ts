#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { VERSION } from '../constants.js';
import { checkFilesCommand } from './commands/check-files.js';
import { syncCommand } from './commands/sync.js';
import { testDnsCommand } from './commands/test-dns.js';

await yargs(hideBin(process.argv))
  .scriptName('ip-updater')
  .usage('$0 <command> [options]')
  .command(syncCommand)
  .command(testDnsCommand)
  .command(checkFilesCommand)
  .demandCommand(1, 'Please specify a command')
  .strict()
  .version(VERSION)
  .help()
  .parseAsync();
