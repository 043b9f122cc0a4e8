import cron, { type ScheduledTask } from 'node-cron';
import type { IKlineFeed, Interval } from '@candlevault/schemas';
import { ConfigError, createLogger, errorMessage } from '@candlevault/utils';
import type { UpdateEngine } from '../engine/update-engine';
import type { UpdateResult } from '../engine/types';
import type { BookkeepingSnapshot, EngineState } from '../state/engine-state';

const logger = createLogger('sync:scheduler');

export interface UpdateSchedulerConfig {
  symbols: readonly string[];
  intervals: readonly Interval[];
  /** node-cron expression, seconds field allowed */
  schedule: string;
}

/** Result of a start/stop request */
export interface SchedulerTransition {
  running: boolean;
  /** False when the scheduler was already in the requested state */
  changed: boolean;
}

/** One symbol's update launched by a tick */
export interface TickDispatch {
  symbol: string;
  intervals: Interval[];
  /** Settles when the update finishes; null if it failed */
  completion: Promise<UpdateResult | null>;
}

export interface SchedulerStatus {
  running: boolean;
  schedule: string;
  symbols: readonly string[];
  intervals: readonly Interval[];
  lastTickAt: number | null;
  lastUpdates: BookkeepingSnapshot;
  frequencies: Record<string, number>;
  inFlight: string[];
}

/**
 * Periodic driver for the update engine
 *
 * Every tick re-probes upstream when the last probe is stale, then launches
 * an update for each symbol with at least one due interval. Launched updates
 * run concurrently and are not awaited by the tick; stopping the scheduler
 * prevents new ticks but leaves running updates alone.
 */
export class UpdateScheduler {
  private task: ScheduledTask | null = null;
  private readonly now: () => number;

  constructor(
    private readonly engine: UpdateEngine,
    private readonly feed: IKlineFeed,
    private readonly state: EngineState,
    private readonly config: UpdateSchedulerConfig,
    now: () => number = Date.now
  ) {
    if (!cron.validate(config.schedule)) {
      throw new ConfigError(`Invalid update schedule: "${config.schedule}"`);
    }
    this.now = now;
  }

  get isRunning(): boolean {
    return this.state.isSchedulerRunning;
  }

  start(): SchedulerTransition {
    if (this.state.isSchedulerRunning) {
      return { running: true, changed: false };
    }

    if (!this.task) {
      this.task = cron.schedule(this.config.schedule, () => this.onCron(), { scheduled: false });
    }
    this.task.start();
    this.state.setSchedulerRunning(true);

    logger.info(
      { event: 'scheduler_started', schedule: this.config.schedule, symbols: this.config.symbols.length },
      'Update scheduler started'
    );
    return { running: true, changed: true };
  }

  stop(): SchedulerTransition {
    if (!this.state.isSchedulerRunning) {
      return { running: false, changed: false };
    }

    this.task?.stop();
    this.state.setSchedulerRunning(false);

    logger.info({ event: 'scheduler_stopped', inFlight: this.state.inFlight.size }, 'Update scheduler stopped');
    return { running: false, changed: true };
  }

  /**
   * One scheduling pass
   *
   * Resolves once every due symbol has been dispatched, not when the
   * dispatched updates finish.
   */
  async tick(): Promise<TickDispatch[]> {
    const now = this.now();
    this.state.recordTick(now);

    if (this.state.connectivityCheckDue(now)) {
      logger.info({ event: 'connectivity_check' }, 'Checking Binance connectivity');
      await this.feed.checkConnectivity();
    }

    const dispatches: TickDispatch[] = [];
    for (const symbol of this.config.symbols) {
      const intervals = this.engine.dueIntervals(symbol, this.config.intervals, now);
      if (intervals.length === 0) continue;

      logger.info({ event: 'update_dispatch', symbol, intervals }, `Updating ${symbol}: ${intervals.join(', ')}`);
      dispatches.push({ symbol, intervals, completion: this.dispatch(symbol, intervals) });
    }

    return dispatches;
  }

  status(): SchedulerStatus {
    return {
      running: this.state.isSchedulerRunning,
      schedule: this.config.schedule,
      symbols: this.config.symbols,
      intervals: this.config.intervals,
      lastTickAt: this.state.lastTick,
      lastUpdates: this.state.bookkeepingSnapshot(),
      frequencies: this.state.frequencySnapshot(),
      inFlight: [...this.state.inFlight.keys()],
    };
  }

  private dispatch(symbol: string, intervals: Interval[]): Promise<UpdateResult | null> {
    return this.engine.updateSymbolData(symbol, intervals).then(
      (result) => {
        logger.info({ event: 'scheduled_update_complete', symbol, result }, `Scheduled update of ${symbol} complete`);
        return result;
      },
      (error: unknown) => {
        logger.error({ event: 'scheduled_update_failed', symbol, error: errorMessage(error) }, `Scheduled update of ${symbol} failed`);
        return null;
      }
    );
  }

  private onCron(): void {
    this.tick().catch((error: unknown) => {
      logger.error({ event: 'tick_failed', error: errorMessage(error) }, 'Scheduler tick failed');
    });
  }
}
