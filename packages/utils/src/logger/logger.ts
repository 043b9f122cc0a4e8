import pino from 'pino';
import { FileTransport } from './file-transport';
import { LogBuffer, formatBufferLine } from './log-buffer';
import {
  type LogLevel,
  type LogConfig,
  getLogLevel,
  getServiceFromName,
  buildRuntimeConfig,
  shouldLog,
} from './log-config';

/**
 * Logger options for creating a new logger
 */
export interface LoggerOptions {
  /** Logger name (e.g., 'sync:engine') */
  name: string;
  /** Service for file grouping (auto-detected from name if not provided) */
  service?: string;
  /** Minimum log level (auto-detected from config if not provided) */
  level?: LogLevel;
  /** Enable file logging (default: from config) */
  enableFileLogging?: boolean;
  /** Custom log config (default: runtime config) */
  config?: LogConfig;
}

type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;

/**
 * Structured logger interface
 */
export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  flush: () => Promise<void>;
}

// Singleton file transports per service
const fileTransports: Map<string, FileTransport> = new Map();

// Singleton runtime config
let runtimeConfig: LogConfig | null = null;

// Recent lines for the /logs endpoints, shared by every logger
let logBuffer: LogBuffer | null = null;

function getRuntimeConfig(): LogConfig {
  if (!runtimeConfig) {
    runtimeConfig = buildRuntimeConfig();
  }
  return runtimeConfig;
}

function getLogBuffer(): LogBuffer {
  if (!logBuffer) {
    logBuffer = new LogBuffer(getRuntimeConfig().bufferSize);
  }
  return logBuffer;
}

/**
 * Get or create file transport for a service
 */
function getFileTransport(service: string, config: LogConfig): FileTransport {
  const existing = fileTransports.get(service);
  if (existing) {
    return existing;
  }

  const transport = new FileTransport({
    logDir: config.logDir,
    service,
    maxSize: config.maxFileSize,
    maxFiles: config.maxFiles,
    separateErrorLog: true,
  });
  fileTransports.set(service, transport);
  return transport;
}

/**
 * Create a structured logger instance
 *
 * Writes every entry to the console via pino (pino-pretty in development),
 * to a rotating JSON file per service when file logging is enabled, and to
 * the shared in-memory buffer served by /logs.
 *
 * @param options - Logger configuration options (or just a name string)
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions = typeof options === 'string' ? { name: options } : options;

  const config = opts.config ?? getRuntimeConfig();
  const service = opts.service ?? getServiceFromName(opts.name);
  const level = opts.level ?? getLogLevel(opts.name, config);
  const enableFileLogging = opts.enableFileLogging ?? config.enableFileLogging;

  const isDevelopment = process.env.NODE_ENV === 'development';

  const pinoLogger = pino({
    name: opts.name,
    level,
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

  const fileTransport = enableFileLogging ? getFileTransport(service, config) : null;

  function build(target: pino.Logger, name: string, bindings: Record<string, unknown>): Logger {
    function createLogMethod(logLevel: LogLevel): LogMethod {
      return (obj, msg) => {
        if (typeof obj === 'string') {
          target[logLevel](obj);
        } else {
          target[logLevel](obj, msg);
        }

        if (!shouldLog(logLevel, level)) {
          return;
        }

        const timestamp = new Date().toISOString();
        const context: Record<string, unknown> = typeof obj === 'string' ? {} : obj;
        const message = typeof obj === 'string' ? obj : msg;

        getLogBuffer().push(formatBufferLine(timestamp, logLevel, name, message, context));

        if (fileTransport) {
          fileTransport.write({
            timestamp,
            level: logLevel.toUpperCase(),
            name,
            service,
            ...bindings,
            ...context,
            msg: message,
          });
        }
      };
    }

    return {
      trace: createLogMethod('trace'),
      debug: createLogMethod('debug'),
      info: createLogMethod('info'),
      warn: createLogMethod('warn'),
      error: createLogMethod('error'),
      fatal: createLogMethod('fatal'),
      child: (childBindings: Record<string, unknown>) => {
        const childName =
          typeof childBindings.name === 'string' ? `${name}:${childBindings.name}` : name;
        return build(target.child(childBindings), childName, { ...bindings, ...childBindings });
      },
      flush: async () => {
        if (fileTransport) await fileTransport.flush();
      },
    };
  }

  return build(pinoLogger, opts.name, {});
}

/**
 * Global logger instance for general use
 */
export const logger = createLogger('candlevault');

/**
 * Recent log lines, oldest first (served by GET /logs)
 */
export function getRecentLogs(): string[] {
  return getLogBuffer().entries();
}

/**
 * Flush all file transports (for graceful shutdown)
 */
export async function flushAllLogs(): Promise<void> {
  await Promise.all([...fileTransports.values()].map((transport) => transport.flush()));
}

/**
 * Close all file transports (for shutdown)
 */
export function closeAllLogs(): void {
  for (const transport of fileTransports.values()) {
    transport.closeStreams();
  }
  fileTransports.clear();
}
