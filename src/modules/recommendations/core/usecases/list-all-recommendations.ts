/**
 * Use case: List every recommendation enriched with NAICS and ARC descriptions.
 */

import { err, ok, type Result } from 'neverthrow';

import { createEnrichmentError, type RecommendationError } from '../errors.js';
import { toEnrichedRecommendation } from '../logic.js';

import type { RecommendationRepository } from '../ports.js';
import type { EnrichedRecommendation } from '../types.js';
import type { ArcResolver } from '@/modules/arc/index.js';
import type { NaicsResolver } from '@/modules/naics/index.js';

/**
 * Dependencies for the list all recommendations use case.
 */
export interface ListAllRecommendationsDeps {
  recommendationRepo: RecommendationRepository;
  naicsResolver: NaicsResolver;
  arcResolver: ArcResolver;
}

/**
 * Fetch all joined rows and enrich them in database order.
 *
 * All-or-nothing: if the query fails, or any single row cannot be enriched,
 * the error is returned and the rows built so far are discarded.
 */
export const listAllRecommendations = async (
  deps: ListAllRecommendationsDeps
): Promise<Result<EnrichedRecommendation[], RecommendationError>> => {
  const rowsResult = await deps.recommendationRepo.listWithAssessments();
  if (rowsResult.isErr()) {
    return err(rowsResult.error);
  }

  const enriched: EnrichedRecommendation[] = [];

  for (const [rowIndex, row] of rowsResult.value.entries()) {
    try {
      enriched.push(
        toEnrichedRecommendation(row, {
          naics: deps.naicsResolver.describe(row.naics),
          arc: deps.arcResolver.describe(row.arc),
        })
      );
    } catch (error) {
      return err(createEnrichmentError(rowIndex, error));
    }
  }

  return ok(enriched);
};
