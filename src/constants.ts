export const VERSION = '1.0.0';

/** Config file read when neither `--config` nor IP_UPDATER_CONFIG is given */
export const DEFAULT_CONFIG_PATH = '/etc/ip_updater/config.toml';

/** Seconds between retry attempts */
export const DEFAULT_RETRY_INTERVAL = 60;

/** -1: retry until `UNBOUNDED_ATTEMPTS` */
export const DEFAULT_MAX_ATTEMPTS = -1;

/** Per-endpoint timeout for public IP detection, in seconds */
export const DEFAULT_DETECTION_TIMEOUT = 30;

/** Queried first; each returns the caller's IPv4 address as plain text */
export const DEFAULT_API_ENDPOINTS = [
  'https://api.ipify.org',
  'https://ipv4.icanhazip.com',
  'https://checkip.amazonaws.com',
] as const;

/** Fallbacks when every API endpoint fails */
export const DEFAULT_WEB_ENDPOINTS = ['https://ifconfig.me/ip', 'https://ipinfo.io/ip'] as const;

export const DEFAULT_RECORD_TYPE = 'A';

export const DEFAULT_RECORD_TTL = 600;
