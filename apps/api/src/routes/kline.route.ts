import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod';
import { HARDCODED_CONFIG, type KlineRecord } from '@candlevault/schemas';
import type { TimeNormalizer } from '@candlevault/utils';
import type { AppContext } from '../context';
import { KlineQuerySchema, KlineResponseSchema, type KlineView } from '../schemas';

function toView(record: KlineRecord, time: TimeNormalizer): KlineView {
  return {
    timestamp: record.timestamp,
    timestamp_ms: time.localStringToUtcMillis(record.timestamp),
    open: record.open,
    high: record.high,
    low: record.low,
    close: record.close,
    volume: record.volume,
    note: record.note,
  };
}

/**
 * Effective row limit: anything missing or outside 1..max reads as max
 */
export function effectiveLimit(limit: number | undefined, max: number = HARDCODED_CONFIG.query.maxLimit): number {
  if (limit === undefined || limit <= 0 || limit > max) return max;
  return limit;
}

/**
 * GET /api/v1/kline - stored bars for one pair, newest first
 *
 * `start_time` / `end_time` are UTC milliseconds, converted to the storage
 * zone before querying; both bounds are inclusive.
 */
export const klineRoute: FastifyPluginAsyncZod<{ ctx: AppContext }> = async (fastify, { ctx }) => {
  fastify.get(
    '/kline',
    {
      schema: {
        querystring: KlineQuerySchema,
        response: { 200: KlineResponseSchema },
      },
    },
    async (request) => {
      const { symbol, interval, start_time, end_time, limit } = request.query;

      const records = await ctx.store.query(symbol, interval, {
        start: start_time !== undefined ? ctx.time.utcMillisToLocalString(start_time) : undefined,
        end: end_time !== undefined ? ctx.time.utcMillisToLocalString(end_time) : undefined,
        limit: effectiveLimit(limit),
      });

      const data = records.map((record) => toView(record, ctx.time));
      return { symbol, interval, data, count: data.length };
    }
  );
};
