/**
 * Readiness model for the ITAC service.
 *
 * The service is ready when both ITAC tables can be read and the NAICS index
 * is populated. An empty ARC catalog only degrades it: rows are still served,
 * with the not-found ARC description.
 */

import { Type, type Static } from '@sinclair/typebox';

export const ReadinessCheckSchema = Type.Object({
  name: Type.String(),
  status: Type.Union([Type.Literal('pass'), Type.Literal('fail')]),
  /** A failing critical check makes the service not ready */
  critical: Type.Boolean(),
  detail: Type.Optional(Type.String()),
  latencyMs: Type.Optional(Type.Number()),
});

export type ReadinessCheck = Static<typeof ReadinessCheckSchema>;

export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

export const ReadinessStatusSchema = Type.Union([
  Type.Literal('ready'),
  Type.Literal('degraded'),
  Type.Literal('not_ready'),
]);

export type ReadinessStatus = Static<typeof ReadinessStatusSchema>;

export const ReadinessResponseSchema = Type.Object({
  status: ReadinessStatusSchema,
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.Optional(Type.String()),
  uptime: Type.Number({ description: 'Seconds since the routes were registered' }),
  checks: Type.Array(ReadinessCheckSchema),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;
