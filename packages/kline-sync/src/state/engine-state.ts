import { HARDCODED_CONFIG, SUPPORTED_INTERVALS } from '@candlevault/schemas';
import type { ConnectivityState, Interval } from '@candlevault/schemas';
import { baseUpdateFrequencySec } from '@candlevault/utils';

export interface EngineStateOptions {
  /** Initial routing mode */
  useProxy?: boolean;
  /** Cadence for intervals without an entry in the frequency table */
  defaultFrequencySec?: number;
}

/** Last-update times per symbol, epoch ms */
export type BookkeepingSnapshot = Record<string, Record<string, number>>;

/**
 * Process-wide mutable state shared by the feed client, update engine,
 * scheduler and HTTP handlers. Constructed once at startup.
 *
 * Accessors are synchronous, so no read-modify-write here ever spans an
 * await and the event loop provides the mutual exclusion.
 */
export class EngineState {
  readonly connectivity: ConnectivityState;

  /** Running update passes keyed by `${symbol}:${interval}` */
  readonly inFlight = new Map<string, Promise<number>>();

  private readonly lastUpdates = new Map<string, Map<Interval, number>>();
  private readonly frequencies = new Map<Interval, number>();
  private readonly defaultFrequencySec: number;

  private schedulerRunning = false;
  private lastTickAt: number | null = null;

  constructor(options: EngineStateOptions = {}) {
    this.connectivity = { useProxy: options.useProxy ?? false, lastCheckedAt: null, lastProbeOk: null };
    this.defaultFrequencySec = options.defaultFrequencySec ?? HARDCODED_CONFIG.sync.defaultFrequencySec;

    for (const interval of SUPPORTED_INTERVALS) {
      this.frequencies.set(interval, baseUpdateFrequencySec(interval));
    }
  }

  // ---------------------------------------------------------------------------
  // Update frequency
  // ---------------------------------------------------------------------------

  frequencySec(interval: Interval): number {
    return this.frequencies.get(interval) ?? this.defaultFrequencySec;
  }

  /** Slow an interval down for the rest of the process lifetime */
  widenFrequency(interval: Interval, seconds: number = HARDCODED_CONFIG.sync.widenedFrequencySec): void {
    this.frequencies.set(interval, seconds);
  }

  frequencySnapshot(): Record<string, number> {
    return Object.fromEntries(this.frequencies);
  }

  // ---------------------------------------------------------------------------
  // Bookkeeping
  // ---------------------------------------------------------------------------

  lastUpdate(symbol: string, interval: Interval): number | undefined {
    return this.lastUpdates.get(symbol)?.get(interval);
  }

  recordUpdate(symbol: string, interval: Interval, at: number): void {
    let bySymbol = this.lastUpdates.get(symbol);
    if (!bySymbol) {
      bySymbol = new Map();
      this.lastUpdates.set(symbol, bySymbol);
    }
    bySymbol.set(interval, at);
  }

  /**
   * Due check: never updated, or at least one frequency period has elapsed
   */
  shouldUpdate(interval: Interval, lastUpdate: number | undefined, now: number): boolean {
    if (lastUpdate === undefined) return true;
    return now - lastUpdate >= this.frequencySec(interval) * 1000;
  }

  bookkeepingSnapshot(): BookkeepingSnapshot {
    const snapshot: BookkeepingSnapshot = {};
    for (const [symbol, byInterval] of this.lastUpdates) {
      snapshot[symbol] = Object.fromEntries(byInterval);
    }
    return snapshot;
  }

  // ---------------------------------------------------------------------------
  // Connectivity
  // ---------------------------------------------------------------------------

  setUseProxy(useProxy: boolean): void {
    this.connectivity.useProxy = useProxy;
  }

  /** True when no probe has run yet or the last one is older than `periodMs` */
  connectivityCheckDue(now: number, periodMs: number = HARDCODED_CONFIG.sync.connectivityCheckIntervalMs): boolean {
    const last = this.connectivity.lastCheckedAt;
    return last === null || now - last > periodMs;
  }

  // ---------------------------------------------------------------------------
  // Scheduler
  // ---------------------------------------------------------------------------

  get isSchedulerRunning(): boolean {
    return this.schedulerRunning;
  }

  setSchedulerRunning(running: boolean): void {
    this.schedulerRunning = running;
  }

  get lastTick(): number | null {
    return this.lastTickAt;
  }

  recordTick(at: number): void {
    this.lastTickAt = at;
  }
}
