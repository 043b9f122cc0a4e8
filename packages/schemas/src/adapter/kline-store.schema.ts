import type { Interval, KlineQuery, KlineRecord } from '../market/kline.schema';

/**
 * Persistence gateway for klines, one table per (symbol, interval)
 *
 * Timestamps crossing this interface are local wall-clock strings.
 */
export interface IKlineStore {
  /** Create the table for the pair if it does not exist yet */
  ensureTable(symbol: string, interval: Interval): Promise<void>;

  /** Insert, or overwrite every non-key field of the record with the same timestamp */
  upsert(symbol: string, interval: Interval, record: KlineRecord): Promise<void>;

  /** Records ordered newest first */
  query(symbol: string, interval: Interval, options: KlineQuery): Promise<KlineRecord[]>;

  /** Newest stored record, or null for an empty table */
  latest(symbol: string, interval: Interval): Promise<KlineRecord | null>;
}
