import { pgTable, timestamp, decimal, text } from 'drizzle-orm/pg-core';
import type { Interval } from '@candlevault/schemas';
import { PersistenceError } from '@candlevault/utils';

const TABLE_NAME_PATTERN = /^[a-z0-9]+_[a-z0-9]+$/;

/**
 * Table name for a (symbol, interval) pair: lowercase `symbol_interval`
 *
 * @throws PersistenceError if the result is not a safe identifier
 */
export function klineTableName(symbol: string, interval: Interval): string {
  const name = `${symbol.trim().toLowerCase()}_${interval.toLowerCase()}`;
  if (!TABLE_NAME_PATTERN.test(name)) {
    throw new PersistenceError(`Invalid kline table name: "${name}"`);
  }
  return name;
}

/**
 * Klines table - one per (symbol, interval)
 *
 * `timestamp` is the bar open time as local wall-clock time (no zone).
 * Prices and volume are exact decimals, read and written as strings.
 */
export function klineTable(name: string) {
  return pgTable(name, {
    timestamp: timestamp('timestamp', { mode: 'string', precision: 0 }).primaryKey(),
    openPrice: decimal('open_price', { precision: 30, scale: 8 }).notNull(),
    closePrice: decimal('close_price', { precision: 30, scale: 8 }).notNull(),
    highPrice: decimal('high_price', { precision: 30, scale: 8 }).notNull(),
    lowPrice: decimal('low_price', { precision: 30, scale: 8 }).notNull(),
    volume: decimal('volume', { precision: 30, scale: 8 }).notNull(),
    note: text('note'),
  });
}

export type KlineTable = ReturnType<typeof klineTable>;
export type KlineRow = KlineTable['$inferSelect'];
export type NewKlineRow = KlineTable['$inferInsert'];
