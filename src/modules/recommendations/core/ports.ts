/**
 * Port interfaces for the Recommendations module.
 */

import type { RecommendationError } from './errors.js';
import type { RecommendationWithAssessment } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Repository interface for recommendation data access.
 */
export interface RecommendationRepository {
  /**
   * Every recommendation inner-joined to its assessment, in the order the
   * database returns them. Recommendations without an assessment are dropped.
   *
   * Fails as a whole if the query fails or any row is malformed.
   */
  listWithAssessments(): Promise<Result<RecommendationWithAssessment[], RecommendationError>>;
}
