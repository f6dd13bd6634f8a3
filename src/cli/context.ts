import type { Options } from 'yargs';
import { ConfigError, loadConfig, type UpdaterConfig } from '../config.js';
import { DEFAULT_CONFIG_PATH } from '../constants.js';
import { errorMessage, isAbortError } from '../errors.js';
import { createLogger, errorMeta, type Logger } from '../logger.js';

/** `--config`, shared by every command */
export const configOption = {
  alias: 'c',
  type: 'string',
  description: 'Path to the TOML configuration file',
  default: process.env['IP_UPDATER_CONFIG'] ?? DEFAULT_CONFIG_PATH,
} satisfies Options;

export interface CliContext {
  config: UpdaterConfig;
  logger: Logger;
  /** Aborted on SIGINT or SIGTERM */
  signal: AbortSignal;
}

/** Exit code for a run cut short by a signal */
const EXIT_INTERRUPTED = 130;

/**
 * Load the configuration, build the logger and run `action` with a signal
 * tied to SIGINT/SIGTERM. The action's return value becomes the exit code.
 */
export async function runCommand(
  configPath: string,
  action: (context: CliContext) => Promise<number>
): Promise<void> {
  let config: UpdaterConfig;
  try {
    config = await loadConfig(configPath);
  } catch (err) {
    console.error(err instanceof ConfigError ? err.message : `Failed to load config: ${errorMessage(err)}`);
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({
    level: config.logging.level,
    destination: config.logging.filePath,
    pretty: config.logging.pretty,
  });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn(`received ${signal}, cancelling`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    process.exitCode = await action({ config, logger, signal: controller.signal });
  } catch (err) {
    if (isAbortError(err)) {
      logger.warn('cancelled');
      process.exitCode = EXIT_INTERRUPTED;
    } else {
      logger.error(errorMessage(err), errorMeta(err));
      console.error(errorMessage(err));
      process.exitCode = 1;
    }
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}
