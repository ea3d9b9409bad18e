/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors } from '../infra/plugins/index.js';
import {
  makeHealthRoutes,
  makeServiceReadinessCheckers,
  type ReadinessChecker,
} from '../modules/health/index.js';
import {
  makeRecommendationRepo,
  makeRecommendationRoutes,
  type RecommendationRepository,
} from '../modules/recommendations/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { ItacDbClient } from '../infra/database/client.js';
import type { ArcResolver } from '../modules/arc/index.js';
import type { NaicsResolver } from '../modules/naics/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  /** Replaces the service readiness checks (tables, NAICS, ARC) */
  readinessCheckers?: ReadinessChecker[];
  itacDb: ItacDbClient;
  /** Loaded once at startup; shared read-only by every request */
  naicsResolver: NaicsResolver;
  arcResolver: ArcResolver;
  /** Overrides the Kysely repository built from `itacDb` (tests) */
  recommendationRepo?: RecommendationRepository;
  config: AppConfig;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>; // Allow partial for tests/defaults, but runtime needs them
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  const { itacDb, naicsResolver, arcResolver, config } = deps;
  if (
    itacDb === undefined ||
    naicsResolver === undefined ||
    arcResolver === undefined ||
    config === undefined
  ) {
    throw new Error('Missing required dependencies: itacDb, naicsResolver, arcResolver, config');
  }

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers:
        deps.readinessCheckers ??
        makeServiceReadinessCheckers({ itacDb, naicsResolver, arcResolver }),
    })
  );

  // Setup Recommendations Module
  const recommendationRepo = deps.recommendationRepo ?? makeRecommendationRepo(itacDb);
  await app.register(
    makeRecommendationRoutes({
      recommendationRepo,
      naicsResolver,
      arcResolver,
    })
  );

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.message });
    }

    // Handle unexpected errors
    return reply.status(500).send({ error: 'An unexpected error occurred' });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
