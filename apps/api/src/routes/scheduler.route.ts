import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod';
import type { AppContext } from '../context';
import { SchedulerStatusSchema, SchedulerTransitionSchema } from '../schemas';

/**
 * Scheduler control routes
 *
 * start/stop are idempotent; the message says whether anything changed.
 */
export const schedulerRoute: FastifyPluginAsyncZod<{ ctx: AppContext }> = async (fastify, { ctx }) => {
  const toLocal = (ms: number) => ctx.time.utcMillisToLocalString(ms);

  fastify.get('/scheduler', { schema: { response: { 200: SchedulerStatusSchema } } }, async () => {
    const status = ctx.scheduler.status();

    const lastUpdates: Record<string, Record<string, string>> = {};
    for (const [symbol, byInterval] of Object.entries(status.lastUpdates)) {
      const formatted: Record<string, string> = {};
      for (const [interval, at] of Object.entries(byInterval)) {
        formatted[interval] = toLocal(at);
      }
      lastUpdates[symbol] = formatted;
    }

    return {
      running: status.running,
      schedule: status.schedule,
      symbols: [...status.symbols],
      intervals: [...status.intervals],
      last_tick_at: status.lastTickAt !== null ? toLocal(status.lastTickAt) : null,
      last_updates: lastUpdates,
      frequencies: status.frequencies,
      in_flight: status.inFlight,
    };
  });

  fastify.post('/scheduler/start', { schema: { response: { 200: SchedulerTransitionSchema } } }, async () => {
    const { running, changed } = ctx.scheduler.start();
    return { message: changed ? 'Scheduler started' : 'Scheduler already running', running };
  });

  fastify.post('/scheduler/stop', { schema: { response: { 200: SchedulerTransitionSchema } } }, async () => {
    const { running, changed } = ctx.scheduler.stop();
    return { message: changed ? 'Scheduler stopped' : 'Scheduler already stopped', running };
  });
};
