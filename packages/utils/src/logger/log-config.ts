import { LogSettingsSchema, type LogSettings } from '@candlevault/schemas';

/**
 * Log levels in order of verbosity (most verbose first)
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

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
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Per-service log level configuration
 *
 * Service names follow the pattern: category:subcategory
 * e.g., 'sync:engine', 'feed:binance'
 */
export interface LogConfig {
  /** Default log level for all services */
  defaultLevel: LogLevel;
  /** Per-service level overrides */
  services: Record<string, LogLevel>;
  /** Enable file logging */
  enableFileLogging: boolean;
  /** Log directory path */
  logDir: string;
  /** Max log file size in bytes before rotation */
  maxFileSize: number;
  /** Number of rotated files to keep */
  maxFiles: number;
  /** Number of recent lines kept in memory for the /logs endpoints */
  bufferSize: number;
}

/**
 * Default log configuration
 *
 * To debug, set LOG_LEVEL=debug or LOG_LEVEL_SYNC=debug env var
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  defaultLevel: 'info',
  services: {
    // Update engine and scheduler
    sync: 'info',
    'sync:engine': 'info',
    'sync:scheduler': 'info',

    // Upstream requests (one line per page at info)
    feed: 'info',
    'feed:binance': 'info',

    // Storage
    database: 'info',

    // HTTP surface
    api: 'info',
  },
  enableFileLogging: true,
  logDir: 'logs',
  maxFileSize: 10 * 1024 * 1024,
  maxFiles: 5,
  bufferSize: 1000,
};

/**
 * Get the effective log level for a service
 *
 * Checks in order:
 * 1. Environment variable: LOG_LEVEL_{SERVICE} (e.g., LOG_LEVEL_SYNC_ENGINE=trace)
 * 2. Global LOG_LEVEL environment variable
 * 3. Per-service config
 * 4. Parent service config (e.g., 'sync' for 'sync:engine')
 * 5. Default level
 */
export function getLogLevel(
  serviceName: string,
  config: LogConfig = DEFAULT_LOG_CONFIG
): LogLevel {
  const envKey = `LOG_LEVEL_${serviceName.replace(/:/g, '_').toUpperCase()}`;
  const envLevel = process.env[envKey]?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }

  const globalEnvLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(globalEnvLevel)) {
    return globalEnvLevel;
  }

  const exact = config.services[serviceName];
  if (exact) {
    return exact;
  }

  const parentService = serviceName.split(':')[0];
  const parent = config.services[parentService];
  if (parentService !== serviceName && parent) {
    return parent;
  }

  return config.defaultLevel;
}

/**
 * Check if a log level should be logged given the minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

/**
 * Get the service name from a logger name (first segment before ':')
 */
export function getServiceFromName(name: string): string {
  return name.split(':')[0];
}

/**
 * Logging settings from the environment, parsed by the same rules as the
 * startup config. Empty values count as unset. Invalid values fall back to
 * the defaults here; startup validation reports them and exits.
 */
export function readLogSettings(env: NodeJS.ProcessEnv = process.env): LogSettings {
  const input: Record<string, string> = {};
  for (const key of Object.keys(LogSettingsSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value !== '') input[key] = value;
  }

  const parsed = LogSettingsSchema.safeParse(input);
  return parsed.success ? parsed.data : LogSettingsSchema.parse({});
}

/**
 * Build runtime config by merging defaults with environment
 *
 * File logging is off under test runs.
 */
export function buildRuntimeConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  const settings = readLogSettings(env);

  return {
    ...DEFAULT_LOG_CONFIG,
    enableFileLogging: settings.LOG_FILE_ENABLED && env.NODE_ENV !== 'test',
    logDir: settings.LOG_DIR,
    maxFileSize: settings.LOG_MAX_SIZE * 1024 * 1024,
    maxFiles: settings.LOG_MAX_BACKUPS,
    bufferSize: settings.LOG_MAX_RECORDS,
  };
}
