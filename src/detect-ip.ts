import { isIPv4 } from 'node:net';
import { DEFAULT_DETECTION_TIMEOUT } from './constants.js';
import { TransientNetworkError, isAbortError } from './errors.js';
import { sendRequest } from './http.js';
import { errorMeta, silentLogger, type Logger } from './logger.js';

export interface DetectOptions {
  /** Plain-text IP services, tried first in order */
  apiEndpoints: readonly string[];
  /** Tried in order once every API endpoint has failed */
  webEndpoints?: readonly string[];
  timeoutSeconds?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Ask each endpoint in turn for this host's public IPv4 address. The first
 * response whose trimmed body is a dotted quad wins.
 */
export async function detectPublicIp(options: DetectOptions): Promise<string> {
  const logger = options.logger ?? silentLogger;
  const timeoutMs = (options.timeoutSeconds ?? DEFAULT_DETECTION_TIMEOUT) * 1000;
  const endpoints = [...options.apiEndpoints, ...(options.webEndpoints ?? [])];

  for (const url of endpoints) {
    try {
      const res = await sendRequest({
        provider: 'IP detection',
        url,
        signal: options.signal,
        timeoutMs,
      });
      const ip = res.body.trim();
      if (res.status !== 200) {
        logger.debug(`${url} answered HTTP ${res.status}`);
      } else if (!isIPv4(ip)) {
        logger.debug(`${url} returned something other than an IPv4 address: ${ip.slice(0, 64)}`);
      } else {
        logger.debug(`public IP ${ip} from ${url}`);
        return ip;
      }
    } catch (err) {
      if (isAbortError(err)) throw err;
      logger.debug(`${url} failed`, errorMeta(err));
    }
  }

  throw new TransientNetworkError(
    `failed to get public IP from all ${endpoints.length} endpoint(s)`
  );
}
