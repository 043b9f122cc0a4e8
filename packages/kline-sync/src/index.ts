/**
 * @candlevault/kline-sync
 *
 * Incremental kline update engine and its scheduler
 */

export * from './state/engine-state';
export * from './engine/types';
export * from './engine/update-engine';
export * from './scheduler/update-scheduler';
