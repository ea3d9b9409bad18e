/**
 * Health routes
 *
 * - GET /health/live: 200 while the process is up
 * - GET /health/ready: 200 when ready or degraded, 503 when not ready
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type ReadinessStatus,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

const HTTP_STATUS_BY_READINESS: Record<ReadinessStatus, 200 | 503> = {
  ready: 200,
  degraded: 200,
  not_ready: 503,
};

export const makeHealthRoutes = (deps: GetReadinessDeps): FastifyPluginAsync => {
  const registeredAt = Date.now();

  return async (fastify) => {
    fastify.get(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async () => ({ status: 'ok' })
    );

    fastify.get(
      '/health/ready',
      { schema: { response: { 200: ReadinessResponseSchema, 503: ReadinessResponseSchema } } },
      async (_request, reply) => {
        const readiness = await getReadiness(deps, {
          uptime: Math.floor((Date.now() - registeredAt) / 1000),
          timestamp: new Date().toISOString(),
        });

        return reply.status(HTTP_STATUS_BY_READINESS[readiness.status]).send(readiness);
      }
    );
  };
};
