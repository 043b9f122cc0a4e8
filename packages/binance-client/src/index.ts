/**
 * @candlevault/binance-client
 *
 * Binance kline feed: page fetch and connectivity probe
 */

export * from './rest/client';
