import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod';
import { createLogger } from '@candlevault/utils';
import type { AppContext } from '../context';
import {
  NetworkModeRequestSchema,
  NetworkModeResponseSchema,
  NetworkStatusSchema,
  NetworkTestResponseSchema,
} from '../schemas';

const logger = createLogger('api:network');

const modeName = (useProxy: boolean): 'direct' | 'proxy' => (useProxy ? 'proxy' : 'direct');

/**
 * Upstream routing routes
 *
 * - GET  /api/v1/network       current routing and last probe
 * - POST /api/v1/network       manual override of the proxy flag
 * - POST /api/v1/network/test  run the connectivity probe now
 */
export const networkRoute: FastifyPluginAsyncZod<{ ctx: AppContext }> = async (fastify, { ctx }) => {
  const { connectivity } = ctx.state;

  fastify.get('/network', { schema: { response: { 200: NetworkStatusSchema } } }, async () => ({
    use_proxy: connectivity.useProxy,
    base_url: ctx.config.BINANCE_BASE_URL,
    proxy_url: ctx.config.BINANCE_PROXY_URL,
    test_symbol: ctx.config.BINANCE_TEST_SYMBOL,
    last_checked_at:
      connectivity.lastCheckedAt !== null ? ctx.time.utcMillisToLocalString(connectivity.lastCheckedAt) : null,
    last_probe_ok: connectivity.lastProbeOk,
  }));

  fastify.post(
    '/network',
    {
      schema: {
        body: NetworkModeRequestSchema,
        response: { 200: NetworkModeResponseSchema },
      },
    },
    async (request) => {
      ctx.state.setUseProxy(request.body.use_proxy);
      const mode = modeName(connectivity.useProxy);

      logger.info({ event: 'network_mode_set', mode }, `Network mode switched to ${mode}`);
      return { message: `Network mode switched to ${mode}`, use_proxy: connectivity.useProxy };
    }
  );

  fastify.post('/network/test', { schema: { response: { 200: NetworkTestResponseSchema } } }, async () => {
    const connected = await ctx.feed.checkConnectivity(ctx.config.BINANCE_TEST_SYMBOL);
    return { connected, use_proxy: connectivity.useProxy, mode: modeName(connectivity.useProxy) };
  });
};
