/**
 * Recommendations REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { EnrichedRecommendationSchema } from '../../core/types.js';

/**
 * `GET /all` success body.
 */
export const AllRecommendationsResponseSchema = Type.Array(EnrichedRecommendationSchema);

export type AllRecommendationsResponse = Static<typeof AllRecommendationsResponseSchema>;

/**
 * Error response schema. Carries a human-readable message only.
 */
export const ErrorResponseSchema = Type.Object({
  error: Type.String({ description: 'Human-readable error message' }),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
