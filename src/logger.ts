import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

/**
 * Observability hook used by every operation. Operations treat a missing
 * logger as `silentLogger`.
 */
export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};

export interface LoggerOptions {
  level?: LogLevel;
  /** Append JSON lines to this file instead of stdout */
  destination?: string;
  /** Human-readable output via pino-pretty; ignored when `destination` is set */
  pretty?: boolean;
}

class PinoLogger implements Logger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  debug(msg: string, meta?: LogMeta): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: LogMeta): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: LogMeta): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  child(bindings: LogMeta): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  let transport: pino.TransportSingleOptions | undefined;

  if (options.destination) {
    transport = {
      target: 'pino/file',
      options: { destination: options.destination, mkdir: true },
    };
  } else if (options.pretty) {
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  const instance = transport
    ? pino(pinoOptions, pino.transport(transport))
    : pino(pinoOptions);

  return new PinoLogger(instance);
}

/** Serialize an error for the `meta` argument of a log call. */
export function errorMeta(error: unknown): LogMeta {
  if (error instanceof Error) {
    return { err: { name: error.name, message: error.message } };
  }
  return { err: String(error) };
}
