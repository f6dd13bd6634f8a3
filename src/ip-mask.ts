import { isIP } from 'node:net';
import { silentLogger, type Logger } from './logger.js';

const CIDR_SUFFIX = /^(.+?)(\/\d+)$/;

function warnIfInvalid(label: string, value: string, logger: Logger): void {
  if (isIP(value) === 0) {
    logger.warn(`${label} IP value '${value}' is not a valid IP address, updating anyway`);
  }
}

/**
 * The value to store when `current` is replaced by `desired`: a `/N` mask on
 * the current value is carried over, otherwise `desired` is used verbatim.
 * Malformed addresses only produce warnings.
 *
 * E.g. ("10.0.0.1/24", "10.0.0.2") → "10.0.0.2/24"
 *      ("10.0.0.1", "10.0.0.2") → "10.0.0.2"
 */
export function mergeIpWithMask(
  current: string,
  desired: string,
  logger: Logger = silentLogger
): string {
  const match = CIDR_SUFFIX.exec(current);

  warnIfInvalid('current', match?.[1] ?? current, logger);
  warnIfInvalid('new', desired, logger);

  return match?.[2] ? `${desired}${match[2]}` : desired;
}
