import type { Interval } from '../market/kline.schema';

/**
 * Upstream kline source
 *
 * `startMs` / `endMs` are UTC milliseconds; 0 leaves that side unbounded.
 * Rows are returned undecoded so the caller can skip malformed ones.
 */
export interface IKlineFeed {
  fetchPage(
    symbol: string,
    interval: Interval,
    startMs: number,
    endMs: number,
    limit: number
  ): Promise<unknown[][]>;

  /** Probe upstream reachability; flips proxy routing as a side effect */
  checkConnectivity(testSymbol?: string): Promise<boolean>;
}

/**
 * Direct/proxy routing state, shared between the feed client (reads it on
 * every request, writes it on every probe) and administrative overrides.
 */
export interface ConnectivityState {
  useProxy: boolean;
  /** Epoch ms of the last probe, null before the first one */
  lastCheckedAt: number | null;
  /** Outcome of the last probe, null before the first one */
  lastProbeOk: boolean | null;
}
