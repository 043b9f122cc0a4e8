import { and, desc, gte, lte, sql } from 'drizzle-orm';
import type { IKlineStore, Interval, KlineQuery, KlineRecord } from '@candlevault/schemas';
import { createLogger, errorMessage, PersistenceError } from '@candlevault/utils';
import type { Database } from './client';
import { klineTable, klineTableName, type KlineRow, type KlineTable } from './schema/klines';

const logger = createLogger('database:klines');

function toRecord(row: KlineRow): KlineRecord {
  return {
    timestamp: row.timestamp,
    open: row.openPrice,
    high: row.highPrice,
    low: row.lowPrice,
    close: row.closePrice,
    volume: row.volume,
    note: row.note,
  };
}

/**
 * Persistence gateway backed by PostgreSQL via drizzle-orm.
 *
 * One table per (symbol, interval), created on first use.
 */
export class DrizzleKlineStore implements IKlineStore {
  private readonly tables = new Map<string, KlineTable>();
  private readonly created = new Set<string>();

  constructor(private readonly db: Database) {}

  /** Table handle for a pair (no I/O) */
  table(symbol: string, interval: Interval): KlineTable {
    const name = klineTableName(symbol, interval);
    let table = this.tables.get(name);
    if (!table) {
      table = klineTable(name);
      this.tables.set(name, table);
    }
    return table;
  }

  async ensureTable(symbol: string, interval: Interval): Promise<void> {
    const name = klineTableName(symbol, interval);
    if (this.created.has(name)) return;

    try {
      await this.db.execute(sql`
        CREATE TABLE IF NOT EXISTS ${sql.identifier(name)} (
          "timestamp" timestamp(0) PRIMARY KEY,
          "open_price" numeric(30, 8) NOT NULL,
          "close_price" numeric(30, 8) NOT NULL,
          "high_price" numeric(30, 8) NOT NULL,
          "low_price" numeric(30, 8) NOT NULL,
          "volume" numeric(30, 8) NOT NULL,
          "note" text
        )
      `);
    } catch (error) {
      throw new PersistenceError(`Failed to create table ${name}: ${errorMessage(error)}`, { cause: error });
    }

    this.created.add(name);
    logger.debug({ table: name }, 'Kline table ready');
  }

  /** Insert-or-update statement for one record */
  upsertStatement(symbol: string, interval: Interval, record: KlineRecord) {
    const table = this.table(symbol, interval);
    return this.db
      .insert(table)
      .values({
        timestamp: record.timestamp,
        openPrice: record.open,
        closePrice: record.close,
        highPrice: record.high,
        lowPrice: record.low,
        volume: record.volume,
        note: record.note,
      })
      .onConflictDoUpdate({
        target: table.timestamp,
        set: {
          openPrice: record.open,
          closePrice: record.close,
          highPrice: record.high,
          lowPrice: record.low,
          volume: record.volume,
          note: record.note,
        },
      });
  }

  async upsert(symbol: string, interval: Interval, record: KlineRecord): Promise<void> {
    try {
      await this.upsertStatement(symbol, interval, record);
    } catch (error) {
      throw new PersistenceError(
        `Failed to upsert ${klineTableName(symbol, interval)} @ ${record.timestamp}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /** Range select, newest first; bounds are inclusive and independently optional */
  selectStatement(symbol: string, interval: Interval, options: KlineQuery) {
    const table = this.table(symbol, interval);
    return this.db
      .select()
      .from(table)
      .where(
        and(
          options.start !== undefined ? gte(table.timestamp, options.start) : undefined,
          options.end !== undefined ? lte(table.timestamp, options.end) : undefined
        )
      )
      .orderBy(desc(table.timestamp))
      .limit(options.limit);
  }

  async query(symbol: string, interval: Interval, options: KlineQuery): Promise<KlineRecord[]> {
    try {
      const rows = await this.selectStatement(symbol, interval, options);
      return rows.map(toRecord);
    } catch (error) {
      throw new PersistenceError(
        `Failed to query ${klineTableName(symbol, interval)}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async latest(symbol: string, interval: Interval): Promise<KlineRecord | null> {
    const [row] = await this.query(symbol, interval, { limit: 1 });
    return row ?? null;
  }
}
