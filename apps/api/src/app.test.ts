import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type {
  ConnectivityState,
  IKlineFeed,
  IKlineStore,
  Interval,
  KlineQuery,
  KlineRecord,
} from '@candlevault/schemas';
import { PersistenceError, TimeNormalizer } from '@candlevault/utils';
import { EngineState, UpdateEngine, UpdateScheduler } from '@candlevault/kline-sync';
import { buildApp } from './app';
import { effectiveLimit } from './routes/kline.route';

/** 2020-01-01 00:00:00 Asia/Shanghai */
const T0 = 1577808000000;
const HOUR = 3_600_000;

function record(timestamp: string): KlineRecord {
  return {
    timestamp,
    open: '7195.24000000',
    high: '7196.25000000',
    low: '7175.46000000',
    close: '7176.47000000',
    volume: '511.81400000',
    note: null,
  };
}

class MemoryStore implements IKlineStore {
  records: KlineRecord[] = [];
  queries: KlineQuery[] = [];
  failQuery = false;

  async ensureTable(): Promise<void> {}

  async upsert(_symbol: string, _interval: Interval, rec: KlineRecord): Promise<void> {
    this.records.push(rec);
  }

  async query(symbol: string, interval: Interval, options: KlineQuery): Promise<KlineRecord[]> {
    this.queries.push(options);
    if (this.failQuery) {
      throw new PersistenceError(`Failed to query ${symbol.toLowerCase()}_${interval}: boom`);
    }
    return this.records
      .filter((r) => options.start === undefined || r.timestamp >= options.start)
      .filter((r) => options.end === undefined || r.timestamp <= options.end)
      .sort((a, b) => b.timestamp.localeCompare(a.timestamp))
      .slice(0, options.limit);
  }

  async latest(): Promise<KlineRecord | null> {
    return null;
  }
}

class StubFeed implements IKlineFeed {
  reachable = true;
  probes: string[] = [];

  constructor(private readonly connectivity: ConnectivityState) {}

  async fetchPage(): Promise<unknown[][]> {
    return [];
  }

  async checkConnectivity(testSymbol = 'BTCUSDT'): Promise<boolean> {
    this.probes.push(testSymbol);
    this.connectivity.useProxy = !this.reachable;
    this.connectivity.lastCheckedAt = T0;
    this.connectivity.lastProbeOk = this.reachable;
    return this.reachable;
  }
}

describe('HTTP API', () => {
  const time = TimeNormalizer.fromConfig({ name: 'Asia/Shanghai', offsetHours: 8 });
  let state: EngineState;
  let store: MemoryStore;
  let feed: StubFeed;
  let engine: UpdateEngine;
  let scheduler: UpdateScheduler;
  let app: FastifyInstance;

  beforeEach(async () => {
    state = new EngineState();
    store = new MemoryStore();
    feed = new StubFeed(state.connectivity);
    engine = new UpdateEngine({ feed, store, time, state, now: () => T0 + 3 * HOUR, sleep: async () => undefined });
    scheduler = new UpdateScheduler(engine, feed, state, {
      symbols: ['BTCUSDT'],
      intervals: ['1h'],
      schedule: '0 * * * * *',
    });
    app = await buildApp({
      config: {
        API_ALLOWED_ORIGINS: ['*'],
        BINANCE_BASE_URL: 'https://api.binance.test',
        BINANCE_PROXY_URL: 'https://proxy.test/',
        BINANCE_TEST_SYMBOL: 'ETHUSDT',
      },
      state,
      time,
      store,
      feed,
      engine,
      scheduler,
      getLogs: () => ['first <b>', 'second'],
    });
  });

  afterEach(async () => {
    scheduler.stop();
    await app.close();
  });

  describe('health and logs', () => {
    it('GET /health', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'ok' });
    });

    it('GET /logs returns buffered lines oldest first', async () => {
      const res = await app.inject({ method: 'GET', url: '/logs' });
      expect(res.json()).toEqual({ logs: ['first <b>', 'second'] });
    });

    it('GET /logs/view renders escaped lines newest first', async () => {
      const res = await app.inject({ method: 'GET', url: '/logs/view' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('text/html; charset=utf-8');
      const second = res.body.indexOf('<div class="log-line info">second</div>');
      const first = res.body.indexOf('<div class="log-line info">first &lt;b&gt;</div>');
      expect(second).toBeGreaterThan(-1);
      expect(first).toBeGreaterThan(second);
    });

    it('answers unknown routes with the error envelope', async () => {
      const res = await app.inject({ method: 'GET', url: '/nope' });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ success: false, error: { code: 'NOT_FOUND', message: 'Route GET /nope not found' } });
    });
  });

  describe('GET /api/v1/kline', () => {
    beforeEach(() => {
      store.records = [record('2020-01-01 00:00:00'), record('2020-01-01 01:00:00'), record('2020-01-01 02:00:00')];
    });

    it('returns stored bars newest first with UTC milliseconds', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/kline?symbol=BTCUSDT&interval=1h' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body).toMatchObject({ symbol: 'BTCUSDT', interval: '1h', count: 3 });
      expect(body.data[0]).toEqual({ ...record('2020-01-01 02:00:00'), timestamp_ms: T0 + 2 * HOUR });
      expect(body.data.map((row: { timestamp: string }) => row.timestamp)).toEqual([
        '2020-01-01 02:00:00',
        '2020-01-01 01:00:00',
        '2020-01-01 00:00:00',
      ]);
      expect(store.queries).toEqual([{ start: undefined, end: undefined, limit: 1000 }]);
    });

    it('converts UTC millisecond bounds to local time', async () => {
      const res = await app.inject({
        method: 'GET',
        url: `/api/v1/kline?symbol=BTCUSDT&interval=1h&start_time=${T0 + HOUR}&end_time=${T0 + 2 * HOUR}`,
      });

      expect(res.json().count).toBe(2);
      expect(store.queries[0]).toEqual({ start: '2020-01-01 01:00:00', end: '2020-01-01 02:00:00', limit: 1000 });
    });

    it('honours a limit in range', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/kline?symbol=BTCUSDT&interval=1h&limit=2' });

      expect(res.json().count).toBe(2);
      expect(store.queries[0]?.limit).toBe(2);
    });

    it.each([
      ['missing symbol', '/api/v1/kline?interval=1h'],
      ['missing interval', '/api/v1/kline?symbol=BTCUSDT'],
      ['unsupported interval', '/api/v1/kline?symbol=BTCUSDT&interval=1d'],
      ['non-numeric limit', '/api/v1/kline?symbol=BTCUSDT&interval=1h&limit=abc'],
      ['non-numeric start_time', '/api/v1/kline?symbol=BTCUSDT&interval=1h&start_time=yesterday'],
      ['start_time past the last representable date', '/api/v1/kline?symbol=BTCUSDT&interval=1h&start_time=8640000000000001'],
      ['end_time past the last representable date', '/api/v1/kline?symbol=BTCUSDT&interval=1h&end_time=99999999999999999'],
    ])('rejects %s with 400', async (_case, url) => {
      const res = await app.inject({ method: 'GET', url });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ success: false, error: { code: 'BAD_REQUEST' } });
      expect(store.queries).toHaveLength(0);
    });

    it('reports storage failures as 500', async () => {
      store.failQuery = true;

      const res = await app.inject({ method: 'GET', url: '/api/v1/kline?symbol=BTCUSDT&interval=1h' });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({
        success: false,
        error: { code: 'INTERNAL_ERROR', message: 'Failed to query btcusdt_1h: boom' },
      });
    });
  });

  it('GET /api/v1/kline accepts the last representable date as a bound', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/kline?symbol=BTCUSDT&interval=1h&end_time=8640000000000000' });

    expect(res.statusCode).toBe(200);
    expect(store.queries[0]?.end).toBe(time.utcMillisToLocalString(8.64e15));
  });

  describe('effectiveLimit', () => {
    it('falls back to the maximum outside 1..1000', () => {
      expect(effectiveLimit(undefined)).toBe(1000);
      expect(effectiveLimit(0)).toBe(1000);
      expect(effectiveLimit(-5)).toBe(1000);
      expect(effectiveLimit(5000)).toBe(1000);
      expect(effectiveLimit(1)).toBe(1);
      expect(effectiveLimit(1000)).toBe(1000);
    });
  });

  describe('POST /api/v1/update', () => {
    it('acknowledges and dispatches the update', async () => {
      const spy = vi.spyOn(engine, 'updateSymbolData').mockResolvedValue({ '1h': 0, '4h': 0 });

      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/update',
        payload: { symbol: 'BTCUSDT', intervals: ['1h', '4h'] },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ message: 'Update triggered', symbol: 'BTCUSDT', intervals: ['1h', '4h'] });
      expect(spy).toHaveBeenCalledWith('BTCUSDT', ['1h', '4h']);
    });

    it('answers 200 even when the update fails later', async () => {
      vi.spyOn(engine, 'updateSymbolData').mockRejectedValue(new Error('boom'));

      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/update',
        payload: { symbol: 'BTCUSDT', intervals: ['1h'] },
      });

      expect(res.statusCode).toBe(200);
    });

    it.each([
      ['empty symbol', { symbol: '', intervals: ['1h'] }],
      ['empty intervals', { symbol: 'BTCUSDT', intervals: [] }],
      ['unsupported interval', { symbol: 'BTCUSDT', intervals: ['1d'] }],
      ['missing intervals', { symbol: 'BTCUSDT' }],
    ])('rejects %s with 400', async (_case, payload) => {
      const spy = vi.spyOn(engine, 'updateSymbolData');

      const res = await app.inject({ method: 'POST', url: '/api/v1/update', payload });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ success: false, error: { code: 'BAD_REQUEST' } });
      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('network', () => {
    it('GET /api/v1/network reports routing settings', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/network' });

      expect(res.json()).toEqual({
        use_proxy: false,
        base_url: 'https://api.binance.test',
        proxy_url: 'https://proxy.test/',
        test_symbol: 'ETHUSDT',
        last_checked_at: null,
        last_probe_ok: null,
      });
    });

    it('POST /api/v1/network overrides the proxy flag', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/network', payload: { use_proxy: true } });

      expect(res.json()).toEqual({ message: 'Network mode switched to proxy', use_proxy: true });
      expect(state.connectivity.useProxy).toBe(true);
    });

    it('POST /api/v1/network rejects a non-boolean flag', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/network', payload: { use_proxy: 'yes' } });

      expect(res.statusCode).toBe(400);
      expect(state.connectivity.useProxy).toBe(false);
    });

    it('POST /api/v1/network/test reports the probe outcome', async () => {
      feed.reachable = false;
      const down = await app.inject({ method: 'POST', url: '/api/v1/network/test' });
      expect(down.json()).toEqual({ connected: false, use_proxy: true, mode: 'proxy' });

      feed.reachable = true;
      const up = await app.inject({ method: 'POST', url: '/api/v1/network/test' });
      expect(up.json()).toEqual({ connected: true, use_proxy: false, mode: 'direct' });

      expect(feed.probes).toEqual(['ETHUSDT', 'ETHUSDT']);
      const status = await app.inject({ method: 'GET', url: '/api/v1/network' });
      expect(status.json()).toMatchObject({ last_checked_at: '2020-01-01 00:00:00', last_probe_ok: true });
    });
  });

  describe('scheduler', () => {
    it('starts and stops idempotently', async () => {
      const post = async (url: string) => (await app.inject({ method: 'POST', url })).json();

      expect(await post('/api/v1/scheduler/start')).toEqual({ message: 'Scheduler started', running: true });
      expect(await post('/api/v1/scheduler/start')).toEqual({ message: 'Scheduler already running', running: true });
      expect(await post('/api/v1/scheduler/stop')).toEqual({ message: 'Scheduler stopped', running: false });
      expect(await post('/api/v1/scheduler/stop')).toEqual({ message: 'Scheduler already stopped', running: false });
    });

    it('GET /api/v1/scheduler reports bookkeeping in local time', async () => {
      state.recordUpdate('BTCUSDT', '1h', T0);

      const res = await app.inject({ method: 'GET', url: '/api/v1/scheduler' });

      expect(res.json()).toEqual({
        running: false,
        schedule: '0 * * * * *',
        symbols: ['BTCUSDT'],
        intervals: ['1h'],
        last_tick_at: null,
        last_updates: { BTCUSDT: { '1h': '2020-01-01 00:00:00' } },
        frequencies: { '5m': 300, '30m': 1800, '1h': 3600, '4h': 14400 },
        in_flight: [],
      });
    });
  });
});
