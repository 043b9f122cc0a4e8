import { z } from 'zod';
import { IntervalSchema } from '../market/kline.schema';

const portSchema = (fallback: string) =>
  z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive()).default(fallback);

const positiveIntSchema = (fallback: string) =>
  z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive()).default(fallback);

const booleanSchema = (fallback: 'true' | 'false') =>
  z
    .string()
    .transform((val) => ['true', '1', 't', 'yes'].includes(val.trim().toLowerCase()))
    .default(fallback);

/** Comma separated list; blank entries are dropped */
const listSchema = <T extends z.ZodTypeAny>(item: T, fallback: string, label: string) =>
  z
    .string()
    .transform((val) => val.split(',').map((part) => part.trim()).filter((part) => part.length > 0))
    .pipe(z.array(item).min(1, `${label} must not be empty`))
    .default(fallback);

/**
 * Logging settings
 *
 * Split out because loggers are created before the full config is loaded
 * and read these on their own; `LOG_MAX_SIZE` is in megabytes.
 */
export const LogSettingsSchema = z.object({
  LOG_DIR: z.string().min(1).default('logs'),
  LOG_FILE_ENABLED: booleanSchema('true'),
  LOG_MAX_SIZE: positiveIntSchema('10'),
  LOG_MAX_BACKUPS: positiveIntSchema('5'),
  LOG_MAX_RECORDS: positiveIntSchema('1000'),
});
export type LogSettings = z.infer<typeof LogSettingsSchema>;

/**
 * Environment configuration schema
 * Validates all environment variables on application startup
 */
export const EnvConfigSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // API Server
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: portSchema('8080'),
  API_ALLOWED_ORIGINS: listSchema(z.string(), '*', 'API_ALLOWED_ORIGINS'),

  // PostgreSQL Database
  DATABASE_HOST: z.string().default('localhost'),
  DATABASE_PORT: portSchema('5432'),
  DATABASE_USERNAME: z.string().default('postgres'),
  DATABASE_PASSWORD: z.string().default(''),
  DATABASE_NAME: z.string().min(1, 'Database name is required').default('crypto_data'),
  DATABASE_SSL: booleanSchema('false'),

  // Upstream feed
  BINANCE_SYMBOLS: listSchema(z.string().regex(/^[A-Za-z0-9]+$/, 'Invalid symbol'), 'BTCUSDT,ETHUSDT,BNBUSDT', 'BINANCE_SYMBOLS'),
  BINANCE_INTERVALS: listSchema(IntervalSchema, '5m,30m,1h,4h', 'BINANCE_INTERVALS'),
  BINANCE_BASE_URL: z.string().url('Invalid Binance base URL').default('https://api.binance.com'),
  BINANCE_PROXY_URL: z.string().default('https://your-proxy-url/'),
  BINANCE_USE_PROXY: booleanSchema('false'),
  BINANCE_TEST_SYMBOL: z.string().min(1).default('BTCUSDT'),

  // Local storage time zone
  TIMEZONE: z.string().min(1).default('Asia/Shanghai'),
  TIMEZONE_OFFSET: z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().min(-12).max(14)).default('8'),

  // Scheduler tick (node-cron syntax, optional seconds field)
  CRON_UPDATE_SCHEDULE: z.string().min(1).default('0 * * * * *'),

  // Logging
  ...LogSettingsSchema.shape,
});

/**
 * Validated environment configuration type
 */
export type EnvConfig = z.infer<typeof EnvConfigSchema>;

/**
 * Hardcoded configuration values (not from environment variables)
 */
export const HARDCODED_CONFIG = {
  // Upstream feed limits and timeouts
  feed: {
    pageLimit: 1000,
    pageDelayMs: 100,
    pageTimeoutMs: 10_000,
    probeTimeoutMs: 5_000,
  },

  // Update cadence
  sync: {
    /** Cadence an interval is widened to after a paginated backfill */
    widenedFrequencySec: 10 * 60,
    /** Fallback cadence for intervals missing from the frequency table */
    defaultFrequencySec: 10 * 60,
    connectivityCheckIntervalMs: 10 * 60 * 1000,
  },

  // Read API
  query: {
    maxLimit: 1000,
  },

  // Database connection pool
  database: {
    poolSize: 10,
    connectionTimeoutMs: 5000,
  },
} as const;

/**
 * Helper type for hardcoded config
 */
export type HardcodedConfig = typeof HARDCODED_CONFIG;
