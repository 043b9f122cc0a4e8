/**
 * Database schema exports
 */

export * from './klines';
