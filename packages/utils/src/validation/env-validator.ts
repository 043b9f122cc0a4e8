import { EnvConfigSchema, type EnvConfig } from '@candlevault/schemas';
import { ConfigError } from '../errors/errors';
import { logger } from '../logger/logger';

/**
 * Parse and validate configuration from an environment map.
 *
 * Empty strings count as unset so defaults apply, except where an empty
 * value is itself invalid (an empty symbol or interval list).
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const listKeys = new Set(['BINANCE_SYMBOLS', 'BINANCE_INTERVALS', 'DATABASE_NAME']);
  const input: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (value === '' && !listKeys.has(key)) continue;
    input[key] = value;
  }

  const result = EnvConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: result.error });
  }

  return result.data;
}

/**
 * Validate environment variables on application startup.
 *
 * @returns Validated environment configuration
 * @throws Exits process if validation fails
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  try {
    const config = loadConfig(env);
    logger.info(
      { symbols: config.BINANCE_SYMBOLS.length, intervals: config.BINANCE_INTERVALS },
      'Environment variables validated'
    );
    return config;
  } catch (error) {
    logger.error({ err: error instanceof Error ? error.message : String(error) }, 'Invalid environment variables');
    logger.error('Please ensure all required environment variables are set. See .env.example for details.');
    process.exit(1);
  }
}
