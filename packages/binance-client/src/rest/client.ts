import { HARDCODED_CONFIG } from '@candlevault/schemas';
import type { ConnectivityState, IKlineFeed, Interval } from '@candlevault/schemas';
import { ConnectivityError, createLogger, errorMessage, FetchError } from '@candlevault/utils';

const logger = createLogger('feed:binance');

export interface BinanceKlineClientOptions {
  /** Upstream origin, e.g. https://api.binance.com */
  baseUrl: string;
  /** Prefix prepended to the full upstream URL when routing through the proxy */
  proxyUrl: string;
  /** Symbol used by the price-ticker probe when none is given */
  testSymbol: string;
  /** Shared routing state, read on every page request */
  connectivity: ConnectivityState;
  pageTimeoutMs?: number;
  probeTimeoutMs?: number;
  clock?: () => number;
}

function isRowArray(value: unknown): value is unknown[][] {
  return Array.isArray(value) && value.every((row) => Array.isArray(row));
}

/**
 * Binance public market-data client
 *
 * Only unauthenticated endpoints are used: /api/v3/klines for data pages and
 * /api/v3/ticker/price as a reachability probe. Page requests follow the
 * shared proxy flag; the probe always goes direct so it can detect recovery.
 *
 * Reference: https://developers.binance.com/docs/binance-spot-api-docs/rest-api
 */
export class BinanceKlineClient implements IKlineFeed {
  private readonly baseUrl: string;
  private readonly proxyUrl: string;
  private readonly testSymbol: string;
  private readonly connectivity: ConnectivityState;
  private readonly pageTimeoutMs: number;
  private readonly probeTimeoutMs: number;
  private readonly clock: () => number;

  constructor(options: BinanceKlineClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.proxyUrl = options.proxyUrl;
    this.testSymbol = options.testSymbol;
    this.connectivity = options.connectivity;
    this.pageTimeoutMs = options.pageTimeoutMs ?? HARDCODED_CONFIG.feed.pageTimeoutMs;
    this.probeTimeoutMs = options.probeTimeoutMs ?? HARDCODED_CONFIG.feed.probeTimeoutMs;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Kline request URL, proxied when the shared flag is set
   *
   * Zero bounds and a zero limit are left out so the upstream applies its own.
   */
  klinesUrl(symbol: string, interval: Interval, startMs: number, endMs: number, limit: number): string {
    const params = new URLSearchParams({ symbol, interval });
    if (startMs > 0) {
      params.append('startTime', startMs.toString());
    }
    if (endMs > 0) {
      params.append('endTime', endMs.toString());
    }
    if (limit > 0) {
      params.append('limit', limit.toString());
    }

    const url = `${this.baseUrl}/api/v3/klines?${params.toString()}`;
    return this.connectivity.useProxy ? `${this.proxyUrl}${url}` : url;
  }

  /**
   * Fetch one page of raw kline rows
   *
   * @throws FetchError on transport failure, non-2xx status or a body that is
   * not an array of arrays
   */
  async fetchPage(
    symbol: string,
    interval: Interval,
    startMs: number,
    endMs: number,
    limit: number
  ): Promise<unknown[][]> {
    const url = this.klinesUrl(symbol, interval, startMs, endMs, limit);
    const proxied = this.connectivity.useProxy;

    logger.debug({ symbol, interval, startMs, endMs, limit, proxied }, 'Requesting klines');

    let response: Response;
    try {
      response = await fetch(url, { signal: AbortSignal.timeout(this.pageTimeoutMs) });
    } catch (err) {
      logger.error({ err: errorMessage(err), symbol, interval, proxied }, 'Kline request failed');
      throw new FetchError(`Kline request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      const errorText = await response.text().catch((err: unknown) => errorMessage(err));
      logger.error(
        { status: response.status, statusText: response.statusText, error: errorText, symbol, interval },
        'Binance API request failed'
      );
      throw new FetchError(`Binance API error: ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new FetchError(`Malformed kline response: ${errorMessage(err)}`, { cause: err });
    }

    if (!isRowArray(body)) {
      throw new FetchError('Malformed kline response: expected an array of arrays');
    }

    logger.info({ symbol, interval, count: body.length, proxied }, 'Fetched klines');
    return body;
  }

  /**
   * Probe upstream with a single-symbol price request
   *
   * Switches routing as a side effect: failure turns the proxy on, success
   * turns it off. Never throws.
   */
  async checkConnectivity(testSymbol: string = this.testSymbol): Promise<boolean> {
    const url = `${this.baseUrl}/api/v3/ticker/price?${new URLSearchParams({ symbol: testSymbol }).toString()}`;
    let ok: boolean;

    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(this.probeTimeoutMs) });
      await response.text();
      if (!response.ok) {
        throw new ConnectivityError(`Price probe returned ${response.status} ${response.statusText}`);
      }
      ok = true;
    } catch (err) {
      const failure =
        err instanceof ConnectivityError
          ? err
          : new ConnectivityError(`Price probe failed: ${errorMessage(err)}`, { cause: err });
      logger.warn({ symbol: testSymbol, error: failure.message }, 'Binance unreachable, switching to proxy');
      ok = false;
    }

    if (ok && this.connectivity.useProxy) {
      logger.info({ symbol: testSymbol }, 'Binance reachable, switching to direct');
    }

    this.connectivity.useProxy = !ok;
    this.connectivity.lastCheckedAt = this.clock();
    this.connectivity.lastProbeOk = ok;
    return ok;
  }
}
