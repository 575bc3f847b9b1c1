/**
 * Log levels in order of verbosity (most verbose first)
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Log level priority (lower number = more verbose)
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Infinity,
};

/**
 * Per-service log level configuration
 *
 * Service names follow the pattern: category:subcategory
 * e.g., 'indicators:engine', 'pipeline:orchestrator'
 */
export interface LogConfig {
  /** Default log level for all services */
  defaultLevel: LogLevel;
  /** Per-service level overrides */
  services: Record<string, LogLevel>;
}

/**
 * Default log configuration
 *
 * Services inherit the default level unless listed in `services`.
 * To debug, set LOG_LEVEL=debug or LOG_LEVEL_INDICATORS=debug env var
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  defaultLevel: 'info',
  services: {},
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Get the effective log level for a service
 *
 * Checks in order:
 * 1. Environment variable: LOG_LEVEL_{NAME}, then LOG_LEVEL_{SERVICE}
 *    (e.g., LOG_LEVEL_INDICATORS_ENGINE=trace, LOG_LEVEL_INDICATORS=debug)
 * 2. Global LOG_LEVEL environment variable
 * 3. Per-service config
 * 4. Parent service config (e.g., 'indicators' for 'indicators:engine')
 * 5. Default level
 */
export function getLogLevel(
  serviceName: string,
  config: LogConfig = DEFAULT_LOG_CONFIG
): LogLevel {
  for (const name of [serviceName, getServiceFromName(serviceName)]) {
    const envKey = `LOG_LEVEL_${name.replace(/:/g, '_').toUpperCase()}`;
    const envLevel = process.env[envKey]?.toLowerCase();
    if (isLogLevel(envLevel)) {
      return envLevel;
    }
  }

  const globalEnvLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(globalEnvLevel)) {
    return globalEnvLevel;
  }

  const exact = config.services[serviceName];
  if (exact) {
    return exact;
  }

  const parentService = getServiceFromName(serviceName);
  const parent = config.services[parentService];
  if (parentService !== serviceName && parent) {
    return parent;
  }

  return config.defaultLevel;
}

/**
 * Get the service name from a logger name (first segment before ':')
 */
export function getServiceFromName(name: string): string {
  return name.split(':')[0];
}

let runtimeConfig: LogConfig = DEFAULT_LOG_CONFIG;

/**
 * Replace the default level used by loggers created afterwards
 * (config document's system.logLevel). Env vars still win.
 */
export function setDefaultLogLevel(level: LogLevel): void {
  runtimeConfig = { ...runtimeConfig, defaultLevel: level };
}

export function getRuntimeLogConfig(): LogConfig {
  return runtimeConfig;
}
