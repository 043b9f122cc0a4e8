import { drizzle } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import { HARDCODED_CONFIG, type EnvConfig } from '@candlevault/schemas';
import { createLogger } from '@candlevault/utils';

const logger = createLogger('database');

export type DatabaseConfig = Pick<
  EnvConfig,
  'DATABASE_HOST' | 'DATABASE_PORT' | 'DATABASE_USERNAME' | 'DATABASE_PASSWORD' | 'DATABASE_NAME' | 'DATABASE_SSL'
>;

/**
 * Create a database client instance
 *
 * The pool connects lazily; call testDatabaseConnection to fail fast.
 *
 * @param config - Validated environment configuration
 * @returns Drizzle ORM instance
 */
export function createDbClient(config: DatabaseConfig) {
  logger.info(
    { host: config.DATABASE_HOST, port: config.DATABASE_PORT, database: config.DATABASE_NAME },
    'Connecting to PostgreSQL database...'
  );

  const queryClient = postgres({
    host: config.DATABASE_HOST,
    port: config.DATABASE_PORT,
    username: config.DATABASE_USERNAME,
    password: config.DATABASE_PASSWORD,
    database: config.DATABASE_NAME,
    max: HARDCODED_CONFIG.database.poolSize,
    connect_timeout: HARDCODED_CONFIG.database.connectionTimeoutMs / 1000,
    ssl: config.DATABASE_SSL ? 'require' : false,
    onnotice: () => {}, // CREATE TABLE IF NOT EXISTS raises a notice per existing table
  });

  return drizzle(queryClient);
}

/**
 * Helper type for database instance
 */
export type Database = ReturnType<typeof createDbClient>;

/**
 * Test database connection with a simple query
 * Throws an error if connection fails
 */
export async function testDatabaseConnection(db: Database): Promise<void> {
  try {
    await db.execute(sql`SELECT 1`);
    logger.info('Database connection test passed');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, 'Database connection test FAILED');
    throw new Error(`Database connection failed: ${message}`);
  }
}

/**
 * Close the connection pool (graceful shutdown)
 */
export async function closeDbClient(db: Database): Promise<void> {
  await db.$client.end({ timeout: 5 });
  logger.info('Database connection closed');
}
