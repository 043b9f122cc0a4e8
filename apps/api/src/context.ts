import type { EnvConfig, IKlineFeed, IKlineStore } from '@candlevault/schemas';
import type { TimeNormalizer } from '@candlevault/utils';
import type { EngineState, UpdateEngine, UpdateScheduler } from '@candlevault/kline-sync';

/**
 * Everything the HTTP layer needs, built once by the bootstrap
 */
export interface AppContext {
  config: Pick<
    EnvConfig,
    'API_ALLOWED_ORIGINS' | 'BINANCE_BASE_URL' | 'BINANCE_PROXY_URL' | 'BINANCE_TEST_SYMBOL'
  >;
  state: EngineState;
  time: TimeNormalizer;
  store: IKlineStore;
  feed: IKlineFeed;
  engine: UpdateEngine;
  scheduler: UpdateScheduler;
  /** Recent log lines, oldest first */
  getLogs: () => string[];
}
