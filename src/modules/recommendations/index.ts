/**
 * Recommendations Module - Public API
 *
 * Joins recommendations to their assessments and serves them, enriched with
 * NAICS and ARC descriptions, over REST.
 */

// =============================================================================
// Repository
// =============================================================================
export { makeRecommendationRepo } from './shell/repo/recommendation-repo.js';
export type { RecommendationRepository } from './core/ports.js';

// =============================================================================
// Use Cases
// =============================================================================
export {
  listAllRecommendations,
  type ListAllRecommendationsDeps,
} from './core/usecases/list-all-recommendations.js';
export { isImplemented, toEnrichedRecommendation } from './core/logic.js';

// =============================================================================
// REST
// =============================================================================
export {
  makeRecommendationRoutes,
  type MakeRecommendationRoutesDeps,
} from './shell/rest/routes.js';

// =============================================================================
// Types
// =============================================================================
export type {
  EnrichedRecommendation,
  RecommendationWithAssessment,
  ResolvedDescriptions,
} from './core/types.js';
export { IMPLEMENTED_STATUS } from './core/types.js';

// =============================================================================
// Errors
// =============================================================================
export type {
  RecommendationError,
  MalformedRowError,
  EnrichmentError,
} from './core/errors.js';
