import pino from 'pino';
import {
  type LogLevel,
  type LogConfig,
  getLogLevel,
  getServiceFromName,
  getRuntimeLogConfig,
  setDefaultLogLevel,
  isLogLevel,
} from './log-config';

/**
 * Logger options for creating a new logger
 */
export interface LoggerOptions {
  /** Logger name (e.g., 'indicators:engine') */
  name: string;
  /** Service the logger belongs to (auto-detected from name if not provided) */
  service?: string;
  /** Minimum log level (auto-detected from config if not provided) */
  level?: LogLevel;
  /** Custom log config (default: runtime config) */
  config?: LogConfig;
}

type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;

/**
 * Structured logger used across the pipeline packages
 */
export interface Logger {
  readonly name: string;
  /** Current minimum level */
  readonly level: LogLevel;
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
}

// Loggers whose level follows the runtime config (no explicit level option)
const configuredLoggers: Array<{ name: string; pino: pino.Logger; config?: LogConfig }> = [];

function toLogLevel(level: string): LogLevel {
  return isLogLevel(level) ? level : 'info';
}

/**
 * Wrap a pino instance so call sites can pass either a message or
 * a context object followed by a message
 */
function wrap(pinoLogger: pino.Logger, name: string): Logger {
  function method(pinoMethod: pino.LogFn): LogMethod {
    return (obj, msg) => {
      if (typeof obj === 'string') {
        pinoMethod.call(pinoLogger, obj);
      } else {
        pinoMethod.call(pinoLogger, obj, msg);
      }
    };
  }

  return {
    name,
    get level(): LogLevel {
      return toLogLevel(pinoLogger.level);
    },
    trace: method(pinoLogger.trace),
    debug: method(pinoLogger.debug),
    info: method(pinoLogger.info),
    warn: method(pinoLogger.warn),
    error: method(pinoLogger.error),
    fatal: method(pinoLogger.fatal),
  };
}

/**
 * Create a structured logger instance
 *
 * Console output only; pino-pretty is used when NODE_ENV=development,
 * JSON lines otherwise.
 *
 * @param options - Logger configuration options (or just a name string)
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions =
    typeof options === 'string' ? { name: options } : options;

  const config = opts.config ?? getRuntimeLogConfig();
  const service = opts.service ?? getServiceFromName(opts.name);
  const level = opts.level ?? getLogLevel(opts.name, config);

  const isDevelopment = process.env.NODE_ENV === 'development';

  const pinoLogger = pino({
    name: opts.name,
    level,
    base: { service },
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  if (!opts.level) {
    configuredLoggers.push({ name: opts.name, pino: pinoLogger, config: opts.config });
  }

  return wrap(pinoLogger, opts.name);
}

/**
 * Change the default level (config document's system.logLevel) and
 * re-resolve every logger created without an explicit level.
 * LOG_LEVEL* env vars keep precedence.
 */
export function applyLogLevel(level: LogLevel): void {
  setDefaultLogLevel(level);
  for (const entry of configuredLoggers) {
    entry.pino.level = getLogLevel(entry.name, entry.config ?? getRuntimeLogConfig());
  }
}

/**
 * Global logger instance for general use
 */
export const logger = createLogger('pricepipe');
