import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError, TimeNormalizer } from '@candlevault/utils';
import { EngineState } from '../state/engine-state';
import { UpdateEngine } from '../engine/update-engine';
import { UpdateScheduler } from '../scheduler/update-scheduler';
import { InMemoryKlineStore, ScriptedFeed } from './fakes';

/** 2025-01-01 01:00:00 Asia/Shanghai */
const NOW = 1735664400000;
const MINUTE = 60_000;

describe('UpdateScheduler', () => {
  const time = TimeNormalizer.fromConfig({ name: 'Asia/Shanghai', offsetHours: 8 });
  let now: number;
  let state: EngineState;
  let feed: ScriptedFeed;
  let engine: UpdateEngine;
  let scheduler: UpdateScheduler;

  beforeEach(() => {
    now = NOW;
    state = new EngineState();
    feed = new ScriptedFeed(state.connectivity, () => now);
    feed.handler = () => [];
    engine = new UpdateEngine({
      feed,
      store: new InMemoryKlineStore(),
      time,
      state,
      now: () => now,
      sleep: async () => undefined,
    });
    scheduler = new UpdateScheduler(
      engine,
      feed,
      state,
      { symbols: ['BTCUSDT', 'ETHUSDT'], intervals: ['5m', '1h'], schedule: '0 * * * * *' },
      () => now
    );
  });

  afterEach(() => {
    scheduler.stop();
  });

  it('rejects an invalid schedule', () => {
    expect(
      () => new UpdateScheduler(engine, feed, state, { symbols: ['BTCUSDT'], intervals: ['5m'], schedule: 'every minute' })
    ).toThrow(ConfigError);
  });

  describe('start/stop', () => {
    it('starts stopped', () => {
      expect(scheduler.isRunning).toBe(false);
      expect(scheduler.status().running).toBe(false);
    });

    it('is idempotent in both directions', () => {
      expect(scheduler.start()).toEqual({ running: true, changed: true });
      expect(scheduler.start()).toEqual({ running: true, changed: false });
      expect(state.isSchedulerRunning).toBe(true);

      expect(scheduler.stop()).toEqual({ running: false, changed: true });
      expect(scheduler.stop()).toEqual({ running: false, changed: false });
      expect(state.isSchedulerRunning).toBe(false);

      expect(scheduler.start()).toEqual({ running: true, changed: true });
    });
  });

  describe('tick', () => {
    it('probes connectivity on the first tick and then every ten minutes', async () => {
      await scheduler.tick();
      expect(feed.probes).toHaveLength(1);

      now += 10 * MINUTE;
      await scheduler.tick();
      expect(feed.probes).toHaveLength(1);

      now += MINUTE;
      await scheduler.tick();
      expect(feed.probes).toHaveLength(2);
    });

    it('keeps dispatching after a failed probe, through the proxy', async () => {
      feed.probeResults = [false];

      const dispatches = await scheduler.tick();

      expect(state.connectivity.useProxy).toBe(true);
      expect(dispatches).toHaveLength(2);
    });

    it('dispatches every symbol with its due intervals', async () => {
      const dispatches = await scheduler.tick();

      expect(dispatches.map(({ symbol, intervals }) => ({ symbol, intervals }))).toEqual([
        { symbol: 'BTCUSDT', intervals: ['5m', '1h'] },
        { symbol: 'ETHUSDT', intervals: ['5m', '1h'] },
      ]);
      await expect(Promise.all(dispatches.map((d) => d.completion))).resolves.toEqual([
        { '5m': 0, '1h': 0 },
        { '5m': 0, '1h': 0 },
      ]);
    });

    it('skips symbols with nothing due', async () => {
      const first = await scheduler.tick();
      await Promise.all(first.map((d) => d.completion));

      now += MINUTE;
      await expect(scheduler.tick()).resolves.toEqual([]);
    });

    it('dispatches only what is due under the widened cadence', async () => {
      // 1h resumes from 2020-01-01, far more than one page: it gets widened
      const first = await scheduler.tick();
      await Promise.all(first.map((d) => d.completion));
      expect(state.frequencySec('1h')).toBe(600);

      now += 5 * MINUTE;
      const second = await scheduler.tick();
      expect(second.map((d) => d.intervals)).toEqual([['5m'], ['5m']]);

      await Promise.all(second.map((d) => d.completion));
      now += 5 * MINUTE;
      const third = await scheduler.tick();
      expect(third.map((d) => d.intervals)).toEqual([['5m', '1h'], ['5m', '1h']]);
      await Promise.all(third.map((d) => d.completion));
    });

    it('contains a failing update', async () => {
      vi.spyOn(engine, 'updateSymbolData').mockRejectedValueOnce(new Error('boom'));

      const [failed, ok] = await scheduler.tick();

      await expect(failed?.completion).resolves.toBeNull();
      await expect(ok?.completion).resolves.toEqual({ '5m': 0, '1h': 0 });
    });

    it('records the tick in the status', async () => {
      const dispatches = await scheduler.tick();
      await Promise.all(dispatches.map((d) => d.completion));

      const status = scheduler.status();
      expect(status).toMatchObject({
        running: false,
        schedule: '0 * * * * *',
        symbols: ['BTCUSDT', 'ETHUSDT'],
        intervals: ['5m', '1h'],
        lastTickAt: NOW,
        inFlight: [],
      });
      expect(status.lastUpdates).toEqual({
        BTCUSDT: { '5m': NOW, '1h': NOW },
        ETHUSDT: { '5m': NOW, '1h': NOW },
      });
    });
  });
});
