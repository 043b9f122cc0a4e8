import { HARDCODED_CONFIG, type Interval } from '@candlevault/schemas';

/**
 * Tunables for the update engine
 */
export interface UpdateEngineConfig {
  /** Bars per upstream request, also the single-page threshold (default: 1000) */
  pageLimit: number;
  /** Delay between paginated requests in ms (default: 100) */
  pageDelayMs: number;
  /** Cadence set on an interval after a paginated backfill, seconds (default: 600) */
  widenedFrequencySec: number;
}

export const DEFAULT_UPDATE_ENGINE_CONFIG: UpdateEngineConfig = {
  pageLimit: HARDCODED_CONFIG.feed.pageLimit,
  pageDelayMs: HARDCODED_CONFIG.feed.pageDelayMs,
  widenedFrequencySec: HARDCODED_CONFIG.sync.widenedFrequencySec,
};

/** Records written per interval for one symbol */
export type UpdateResult = Partial<Record<Interval, number>>;

/**
 * Fetch plan for one interval: a single open-ended page, or a walk of
 * bounded pages ending at `now`
 */
export type FetchPlan =
  | { kind: 'single'; startMs: number; neededBars: number }
  | { kind: 'paginated'; pages: Array<{ startMs: number; endMs: number }>; neededBars: number };
