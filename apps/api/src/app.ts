import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import {
  serializerCompiler,
  validatorCompiler,
  hasZodFastifySchemaValidationErrors,
  isResponseSerializationError,
} from 'fastify-type-provider-zod';
import { createLogger, PersistenceError } from '@candlevault/utils';
import type { AppContext } from './context';
import { healthRoute, klineRoute, networkRoute, schedulerRoute, updateRoute } from './routes';
import { errorEnvelope } from './schemas';

const logger = createLogger('api');

/**
 * Build the HTTP application
 *
 * Registers:
 * - Zod type provider for request validation and response serialization
 * - CORS for the configured origins
 * - Liveness/log routes at the root, control routes under /api/v1
 * - Error envelope for validation failures, unknown routes and handler errors
 *
 * Does not listen; the bootstrap (or a test via inject) drives it.
 */
export async function buildApp(ctx: AppContext): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // Using pino logger directly
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Bypass Zod response serializer for error responses
    reply.serializer(JSON.stringify);

    if (hasZodFastifySchemaValidationErrors(error)) {
      logger.warn({ method: request.method, url: request.url, error: error.message }, 'Invalid request');
      return reply.code(400).send(errorEnvelope('BAD_REQUEST', error.message));
    }

    if (isResponseSerializationError(error)) {
      logger.error({ method: request.method, url: request.url, error: error.message }, 'Response serialization failed');
      return reply.code(500).send(errorEnvelope('INTERNAL_ERROR', 'An internal error occurred'));
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send(errorEnvelope('BAD_REQUEST', error.message || 'Bad request'));
    }

    logger.error({ method: request.method, url: request.url, error: error.message }, 'Request failed');
    const message = error instanceof PersistenceError ? error.message : 'An internal error occurred';
    return reply.code(500).send(errorEnvelope('INTERNAL_ERROR', message));
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.code(404).send(errorEnvelope('NOT_FOUND', `Route ${request.method} ${request.url} not found`));
  });

  const origins = ctx.config.API_ALLOWED_ORIGINS;
  await app.register(cors, {
    origin: origins.includes('*') ? true : origins,
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.debug(
      { method: request.method, url: request.url, status: reply.statusCode, ms: Math.round(reply.elapsedTime) },
      'Request completed'
    );
  });

  await app.register(healthRoute, { ctx });
  await app.register(klineRoute, { ctx, prefix: '/api/v1' });
  await app.register(updateRoute, { ctx, prefix: '/api/v1' });
  await app.register(networkRoute, { ctx, prefix: '/api/v1' });
  await app.register(schedulerRoute, { ctx, prefix: '/api/v1' });

  return app;
}
