/**
 * Recommendations Module REST Routes
 *
 * - GET /all: every recommendation joined to its assessment, enriched with
 *   NAICS and ARC descriptions
 */

import { AllRecommendationsResponseSchema, ErrorResponseSchema } from './schemas.js';
import { getHttpStatusForError } from '../../core/errors.js';
import {
  listAllRecommendations,
  type ListAllRecommendationsDeps,
} from '../../core/usecases/list-all-recommendations.js';

import type { FastifyPluginAsync } from 'fastify';

/**
 * Dependencies for recommendation routes.
 */
export type MakeRecommendationRoutesDeps = ListAllRecommendationsDeps;

/**
 * Creates recommendation REST routes.
 */
export const makeRecommendationRoutes = (
  deps: MakeRecommendationRoutesDeps
): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get(
      '/all',
      {
        schema: {
          response: {
            200: AllRecommendationsResponseSchema,
            500: ErrorResponseSchema,
          },
        },
      },
      async (request, reply) => {
        const result = await listAllRecommendations(deps);

        if (result.isErr()) {
          const { error } = result;
          request.log.error({ err: error }, 'Failed to list recommendations');
          return reply.status(getHttpStatusForError(error)).send({ error: error.message });
        }

        return reply.status(200).send(result.value);
      }
    );
  };
};
