import {
  IMPLEMENTED_STATUS,
  type EnrichedRecommendation,
  type RecommendationWithAssessment,
  type ResolvedDescriptions,
} from './types.js';

/**
 * True only for the exact implemented status; null, blank and every other
 * status (pending, not implemented, unknown) are false.
 */
export const isImplemented = (status: string | null): boolean => status === IMPLEMENTED_STATUS;

/**
 * Reshapes a joined row into the public response row.
 */
export const toEnrichedRecommendation = (
  row: RecommendationWithAssessment,
  descriptions: ResolvedDescriptions
): EnrichedRecommendation => ({
  number_arc: row.arc,
  number_naics: row.naics,
  description_naics: descriptions.naics,
  description_arc: descriptions.arc,
  product_naics: row.products,
  center: row.center,
  state: row.state,
  fiscal_year: row.fiscal_year,
  implemented: isImplemented(row.imp_status),
  cost: row.imp_cost,
  total_savings: row.total_savings,
  p_conserved_mmbtu: row.p_conserved_mmbtu,
  energy_savings: row.total_energy_saved,
});
