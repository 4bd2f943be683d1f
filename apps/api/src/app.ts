/**
 * Fastify application factory
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { failure, type ModelRegistry } from '@kendb/api-fields';
import { KenDbError, createChildLogger, httpStatusFor, wrapError } from '@kendb/shared';
import { registerRoutes } from './routes/index.js';

const logger = createChildLogger({ component: 'API' });

// Extend Fastify instance with the served models
declare module 'fastify' {
  interface FastifyInstance {
    models: ModelRegistry;
  }
}

export interface BuildAppOptions {
  registry: ModelRegistry;
  apiPrefix: string;
  corsOrigin?: string;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own logger
  });

  app.decorate('models', options.registry);

  const corsOrigin = options.corsOrigin ?? '*';
  await app.register(cors, {
    origin: corsOrigin === '*' ? true : corsOrigin.split(','),
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof KenDbError) {
      const response = failure(error.message, httpStatusFor(error));
      if (response.statusCode >= 500) {
        logger.error({ error: error.toJSON(), url: request.url }, 'Request failed');
      }
      return reply.status(response.statusCode).send(response.body);
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send(failure(error.message, error.statusCode).body);
    }

    logger.error({ error: wrapError(error).toJSON(), url: request.url }, 'Unhandled request error');
    return reply.status(500).send(failure('Internal server error', 500).body);
  });

  await registerRoutes(app, options.apiPrefix);

  return app;
}
