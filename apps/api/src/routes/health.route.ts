import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod';
import { z } from 'zod';
import type { AppContext } from '../context';
import { renderLogsPage } from '../helpers/logs-html';

/**
 * Liveness and log routes
 *
 * - GET /health
 * - GET /logs       recent log lines as JSON, oldest first
 * - GET /logs/view  the same lines as an HTML page, newest first
 */
export const healthRoute: FastifyPluginAsyncZod<{ ctx: AppContext }> = async (fastify, { ctx }) => {
  fastify.get(
    '/health',
    { schema: { response: { 200: z.object({ status: z.literal('ok') }) } } },
    async () => ({ status: 'ok' as const })
  );

  fastify.get(
    '/logs',
    { schema: { response: { 200: z.object({ logs: z.array(z.string()) }) } } },
    async () => ({ logs: ctx.getLogs() })
  );

  fastify.get('/logs/view', async (_request, reply) => {
    return reply.type('text/html; charset=utf-8').send(renderLogsPage(ctx.getLogs()));
  });
};
