/**
 * Collaborator contracts used by the sync engine:
 * - IKlineFeed: upstream kline source
 * - IKlineStore: per-pair kline tables
 */
export * from './kline-feed.schema';
export * from './kline-store.schema';
