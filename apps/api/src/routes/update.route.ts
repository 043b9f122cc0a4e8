import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod';
import { createLogger, errorMessage } from '@candlevault/utils';
import type { AppContext } from '../context';
import { UpdateRequestSchema, UpdateResponseSchema } from '../schemas';

const logger = createLogger('api:update');

/**
 * POST /api/v1/update - manual update trigger
 *
 * Skips the due check and answers as soon as the update is dispatched; the
 * outcome only shows up in the logs and the stored data.
 */
export const updateRoute: FastifyPluginAsyncZod<{ ctx: AppContext }> = async (fastify, { ctx }) => {
  fastify.post(
    '/update',
    {
      schema: {
        body: UpdateRequestSchema,
        response: { 200: UpdateResponseSchema },
      },
    },
    async (request) => {
      const { symbol, intervals } = request.body;

      logger.info({ event: 'manual_update', symbol, intervals }, `Manual update triggered for ${symbol}`);

      void ctx.engine.updateSymbolData(symbol, intervals).then(
        (result) => {
          logger.info({ event: 'manual_update_complete', symbol, result }, `Manual update of ${symbol} complete`);
        },
        (error: unknown) => {
          logger.error({ event: 'manual_update_failed', symbol, error: errorMessage(error) }, `Manual update of ${symbol} failed`);
        }
      );

      return { message: 'Update triggered', symbol, intervals };
    }
  );
};
