/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { createLogger, PRETTY_TRANSPORT } from './infra/logger/index.js';
import { createArcResolverFromFile } from './modules/arc/index.js';
import { createNaicsResolverFromFile } from './modules/naics/index.js';

const getVersion = (): string | undefined => process.env['APP_VERSION'];

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  // Create logger
  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server } }, 'Starting API server');

  // Reference documents are loaded once; a bad document is fatal
  const naicsResult = await createNaicsResolverFromFile(config.hierarchies.naicsPath);
  if (naicsResult.isErr()) {
    logger.fatal({ err: naicsResult.error }, 'Failed to load NAICS hierarchy');
    process.exit(1);
  }
  const naicsResolver = naicsResult.value;
  logger.info({ codes: naicsResolver.size }, 'NAICS hierarchy loaded');

  const arcResult = await createArcResolverFromFile(config.hierarchies.arcPath);
  if (arcResult.isErr()) {
    logger.fatal({ err: arcResult.error }, 'Failed to load ARC catalog');
    process.exit(1);
  }
  const arcResolver = arcResult.value;
  logger.info({ codes: arcResolver.size }, 'ARC catalog loaded');

  const itacDb = initDatabase(config);

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: PRETTY_TRANSPORT }),
      },
    },
    deps: {
      itacDb,
      naicsResolver,
      arcResolver,
      config,
    },
    version: getVersion(),
  });

  app.addHook('onClose', async () => {
    await itacDb.destroy();
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
