/**
 * KenDB3 API Server
 */

import { ApiAutogenerator, AutogeneratorRegistry } from '@kendb/api-fields';
import { closeDatabase, createModelRegistry, initializeDatabase } from '@kendb/database';
import { createChildLogger, getConfig, validateConfig } from '@kendb/shared';
import { buildApp } from './app.js';

const logger = createChildLogger({ component: 'API' });

async function main() {
  // Load configuration
  const validation = validateConfig();
  if (!validation.valid) {
    logger.error({ errors: validation.errors }, 'Invalid configuration');
    process.exit(1);
  }
  const config = getConfig();

  // Initialize database
  initializeDatabase({ path: config.database.path, verbose: config.database.verbose });

  const registry = createModelRegistry();

  // Frontend resources are generated once, before serving
  const autogenerators = new AutogeneratorRegistry();
  if (config.frontend.autogenerate) {
    autogenerators.register(new ApiAutogenerator(registry, { outputPath: config.frontend.outputPath }));
    await autogenerators.run();
  } else {
    autogenerators.cancelRegistrations();
    logger.info('Frontend autogeneration disabled');
  }

  const app = await buildApp({
    registry,
    apiPrefix: config.server.apiPrefix,
    corsOrigin: config.server.corsOrigin,
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await app.close();
    closeDatabase();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  // Start server
  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info(`Server started on ${config.server.host}:${config.server.port}${config.server.apiPrefix}`);
  } catch (err) {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Fatal error');
  process.exit(1);
});
