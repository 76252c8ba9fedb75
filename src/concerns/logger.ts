import { pino, type Logger as PinoLogger, type LoggerOptions as PinoLoggerOptions, type TransportSingleOptions } from 'pino';
import { BaseError } from '../errors.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  format?: LogFormat;
  transport?: TransportSingleOptions;
  bindings?: Record<string, unknown>;
}

export type ElectionLogger = PinoLogger;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) {
    return err;
  }

  if (err instanceof BaseError) {
    return err.toJSON();
  }

  return {
    ...err,
    name: err.name,
    message: err.message,
    stack: err.stack,
  };
}

function createPrettyTransport(): TransportSingleOptions {
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false
    }
  };
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions = {}): ElectionLogger {
  const {
    level = 'info',
    name,
    format,
    transport,
    bindings = {}
  } = options;

  let finalTransport: TransportSingleOptions | undefined;
  if (format === 'pretty') {
    finalTransport = createPrettyTransport();
  } else if (format !== 'json' && transport !== undefined) {
    finalTransport = transport;
  }

  const config: PinoLoggerOptions = {
    level,
    transport: finalTransport,
    serializers: {
      err: serializeError,
      error: serializeError
    }
  };

  let logger = pino({
    ...config,
    name
  });

  if (Object.keys(bindings).length > 0) {
    logger = logger.child(bindings);
  }

  return logger;
}

/**
 * Overlays `ELECTION_LOG_LEVEL` and `ELECTION_LOG_FORMAT` on top of the given
 * options. Unknown values are ignored.
 */
export function getLoggerOptionsFromEnv(
  configOptions: LoggerOptions = {},
  env: NodeJS.ProcessEnv = process.env
): LoggerOptions {
  const options: LoggerOptions = { ...configOptions };

  const level = env.ELECTION_LOG_LEVEL?.toLowerCase();
  if (isLogLevel(level)) {
    options.level = level;
  }

  const format = env.ELECTION_LOG_FORMAT?.toLowerCase();
  if (format === 'json' || format === 'pretty') {
    options.format = format;
  }

  return options;
}

export default createLogger;
