import { decodeKline } from '@candlevault/schemas';
import type { IKlineFeed, IKlineStore, Interval } from '@candlevault/schemas';
import {
  barsBetween,
  createLogger,
  errorMessage,
  intervalToMs,
  MalformedRecordError,
  type TimeNormalizer,
} from '@candlevault/utils';
import type { EngineState } from '../state/engine-state';
import {
  DEFAULT_UPDATE_ENGINE_CONFIG,
  type FetchPlan,
  type UpdateEngineConfig,
  type UpdateResult,
} from './types';

const logger = createLogger('sync:engine');

/** Upstream spelling; table names are lowercased separately by the store */
const normalizeSymbol = (symbol: string): string => symbol.trim().toUpperCase();

export interface UpdateEngineDeps {
  feed: IKlineFeed;
  store: IKlineStore;
  time: TimeNormalizer;
  state: EngineState;
  /** Current time in epoch ms */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Incremental kline updater
 *
 * For each (symbol, interval) it resumes from the newest stored bar, or the
 * interval's default history start for an empty table, and pulls everything
 * up to now. Backlogs larger than one page are walked in page-sized windows
 * with every page persisted before the next is requested.
 *
 * Failures never escape: they are logged and the interval reports 0 so the
 * next scheduler tick retries.
 */
export class UpdateEngine {
  private readonly feed: IKlineFeed;
  private readonly store: IKlineStore;
  private readonly time: TimeNormalizer;
  private readonly state: EngineState;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly config: UpdateEngineConfig;

  constructor(deps: UpdateEngineDeps, config: Partial<UpdateEngineConfig> = {}) {
    this.feed = deps.feed;
    this.store = deps.store;
    this.time = deps.time;
    this.state = deps.state;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.config = { ...DEFAULT_UPDATE_ENGINE_CONFIG, ...config };
  }

  /**
   * Due check against the interval's current (possibly widened) frequency
   */
  shouldUpdate(interval: Interval, lastUpdate: number | undefined, now: number = this.now()): boolean {
    return this.state.shouldUpdate(interval, lastUpdate, now);
  }

  /** Intervals of `symbol` whose due check passes at `now`, in the given order */
  dueIntervals(symbol: string, intervals: readonly Interval[], now: number = this.now()): Interval[] {
    const pair = normalizeSymbol(symbol);
    return intervals.filter((interval) => this.shouldUpdate(interval, this.state.lastUpdate(pair, interval), now));
  }

  /**
   * Update every given interval of one symbol, sequentially in caller order
   *
   * Skips the due check. A failing interval counts as 0 and does not stop
   * the others.
   */
  async updateSymbolData(symbol: string, intervals: readonly Interval[]): Promise<UpdateResult> {
    const pair = normalizeSymbol(symbol);
    const result: UpdateResult = {};
    for (const interval of intervals) {
      result[interval] = await this.updateInterval(pair, interval);
    }

    logger.info({ event: 'symbol_update_complete', symbol: pair, result }, `Updated ${pair}`);
    return result;
  }

  /**
   * Update one (symbol, interval)
   *
   * A call made while the same pair is already updating joins the running
   * pass and resolves with its count. Symbols are matched case-insensitively.
   */
  updateInterval(rawSymbol: string, interval: Interval): Promise<number> {
    const symbol = normalizeSymbol(rawSymbol);
    const key = `${symbol}:${interval}`;
    const running = this.state.inFlight.get(key);
    if (running) {
      logger.info({ event: 'update_joined', symbol, interval }, `${symbol} ${interval} already updating, joining`);
      return running;
    }

    const pass = this.runInterval(symbol, interval).finally(() => {
      this.state.inFlight.delete(key);
    });
    this.state.inFlight.set(key, pass);
    return pass;
  }

  /**
   * Windows to request for a backlog starting at `lastMs`
   */
  planFetch(interval: Interval, lastMs: number, nowMs: number): FetchPlan {
    const neededBars = barsBetween(lastMs, nowMs, interval);
    const { pageLimit } = this.config;

    if (neededBars <= pageLimit) {
      return { kind: 'single', startMs: lastMs, neededBars };
    }

    const pageWidth = pageLimit * intervalToMs(interval);
    const pages: Array<{ startMs: number; endMs: number }> = [];
    for (let startMs = lastMs; startMs < nowMs; startMs += pageWidth) {
      pages.push({ startMs, endMs: Math.min(startMs + pageWidth, nowMs) });
    }
    return { kind: 'paginated', pages, neededBars };
  }

  private async runInterval(symbol: string, interval: Interval): Promise<number> {
    const now = this.now();

    try {
      await this.store.ensureTable(symbol, interval);
    } catch (error) {
      logger.error({ symbol, interval, error: errorMessage(error) }, 'Failed to prepare kline table');
      return 0;
    }

    let lastMs: number;
    try {
      lastMs = await this.resumePoint(symbol, interval);
    } catch (error) {
      logger.error({ symbol, interval, error: errorMessage(error) }, 'Failed to read last stored kline');
      return 0;
    }

    const plan = this.planFetch(interval, lastMs, now);

    if (plan.kind === 'single') {
      const written = await this.fetchAndPersist(symbol, interval, plan.startMs, 0, now);
      const count = written ?? 0;
      logger.info(
        { event: 'interval_update_complete', symbol, interval, neededBars: plan.neededBars, written: count },
        `Updated ${symbol} ${interval}: ${count} records`
      );
      return count;
    }

    logger.info(
      { event: 'backfill_start', symbol, interval, neededBars: plan.neededBars, pages: plan.pages.length },
      `Backfilling ${symbol} ${interval}: ${plan.neededBars} bars in ${plan.pages.length} pages`
    );

    let total = 0;
    let failedPages = 0;
    for (const [index, page] of plan.pages.entries()) {
      const written = await this.fetchAndPersist(symbol, interval, page.startMs, page.endMs, now);
      if (written === null) {
        failedPages++;
      } else {
        total += written;
      }

      if (index < plan.pages.length - 1) {
        await this.sleep(this.config.pageDelayMs);
      }
    }

    this.state.widenFrequency(interval, this.config.widenedFrequencySec);

    logger.info(
      {
        event: 'backfill_complete',
        symbol,
        interval,
        written: total,
        failedPages,
        frequencySec: this.config.widenedFrequencySec,
      },
      `Backfilled ${symbol} ${interval}: ${total} records, update frequency now ${this.config.widenedFrequencySec}s`
    );
    return total;
  }

  /** UTC ms of the newest stored bar, or of the default history start */
  private async resumePoint(symbol: string, interval: Interval): Promise<number> {
    const latest = await this.store.latest(symbol, interval);
    if (latest) {
      return this.time.localStringToUtcMillis(latest.timestamp);
    }
    return this.time.toUtcMillis(this.time.defaultHistoryStart(interval));
  }

  /**
   * Fetch one page and persist it
   *
   * @returns records written, or null when the page could not be fetched
   */
  private async fetchAndPersist(
    symbol: string,
    interval: Interval,
    startMs: number,
    endMs: number,
    now: number
  ): Promise<number | null> {
    let rows: unknown[][];
    try {
      rows = await this.feed.fetchPage(symbol, interval, startMs, endMs, this.config.pageLimit);
    } catch (error) {
      logger.warn({ symbol, interval, startMs, endMs, error: errorMessage(error) }, 'Kline page fetch failed');
      return null;
    }

    const written = await this.persistRows(symbol, interval, rows);
    this.state.recordUpdate(symbol, interval, now);
    return written;
  }

  private async persistRows(symbol: string, interval: Interval, rows: unknown[][]): Promise<number> {
    let written = 0;

    for (const row of rows) {
      const decoded = decodeKline(row);
      if (!decoded.ok) {
        const malformed = new MalformedRecordError(`Skipping malformed kline: ${decoded.reason}`);
        logger.warn({ symbol, interval, row: JSON.stringify(row) }, malformed.message);
        continue;
      }

      const { kline } = decoded;
      const timestamp = this.time.utcMillisToLocalString(kline.openTime);
      try {
        await this.store.upsert(symbol, interval, {
          timestamp,
          open: kline.open,
          high: kline.high,
          low: kline.low,
          close: kline.close,
          volume: kline.volume,
          note: null,
        });
        written++;
      } catch (error) {
        logger.error({ symbol, interval, timestamp, error: errorMessage(error) }, 'Failed to save kline');
      }
    }

    return written;
  }
}
