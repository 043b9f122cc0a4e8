// dotenv must be imported FIRST so every module below sees the .env values
import 'dotenv/config';

import {
  closeAllLogs,
  errorMessage,
  flushAllLogs,
  getRecentLogs,
  logger,
  TimeNormalizer,
  validateEnv,
} from '@candlevault/utils';
import { closeDbClient, createDbClient, DrizzleKlineStore, testDatabaseConnection } from '@candlevault/database';
import { BinanceKlineClient } from '@candlevault/binance-client';
import { EngineState, UpdateEngine, UpdateScheduler } from '@candlevault/kline-sync';
import { buildApp } from './app';

/**
 * Start the service
 *
 * Order matters: config and the database are fatal, the first connectivity
 * probe is not (it only picks the routing mode).
 */
async function start() {
  const config = validateEnv();

  const time = TimeNormalizer.fromConfig({ name: config.TIMEZONE, offsetHours: config.TIMEZONE_OFFSET });
  logger.info({ zone: time.zoneName }, 'Storage time zone resolved');

  const db = createDbClient(config);
  await testDatabaseConnection(db);

  const state = new EngineState({ useProxy: config.BINANCE_USE_PROXY });
  const feed = new BinanceKlineClient({
    baseUrl: config.BINANCE_BASE_URL,
    proxyUrl: config.BINANCE_PROXY_URL,
    testSymbol: config.BINANCE_TEST_SYMBOL,
    connectivity: state.connectivity,
  });
  const store = new DrizzleKlineStore(db);
  const engine = new UpdateEngine({ feed, store, time, state });
  const scheduler = new UpdateScheduler(engine, feed, state, {
    symbols: config.BINANCE_SYMBOLS,
    intervals: config.BINANCE_INTERVALS,
    schedule: config.CRON_UPDATE_SCHEDULE,
  });

  const connected = await feed.checkConnectivity();
  logger.info({ connected, useProxy: state.connectivity.useProxy }, 'Initial Binance connectivity check');

  scheduler.start();

  const app = await buildApp({ config, state, time, store, feed, engine, scheduler, getLogs: getRecentLogs });

  const port = config.API_PORT;
  const host = config.API_HOST;

  try {
    await app.listen({ port, host });
    logger.info(`Server listening on ${host}:${port}`);
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down server...');

    // Running updates are not cancelled; only new ticks stop
    scheduler.stop();
    await app.close();
    await closeDbClient(db);

    logger.info('Server shut down successfully');
    await flushAllLogs();
    closeAllLogs();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error: errorMessage(error) }, 'Error during shutdown');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

// Start the server
start().catch((error: unknown) => {
  logger.fatal(
    { error: errorMessage(error), stack: error instanceof Error ? error.stack : undefined },
    'Fatal error during server startup'
  );
  process.exit(1);
});
