/**
 * @candlevault/database
 *
 * PostgreSQL client and kline tables
 */

export * from './client';
export * from './schema';
export * from './kline-store';
