/**
 * Domain types for the Recommendations module.
 *
 * A recommendation is one energy or cost saving measure proposed during an
 * assessment; the assessment carries the plant's NAICS code and products.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** `imp_status` value meaning the plant implemented the recommendation */
export const IMPLEMENTED_STATUS = 'I';

// ─────────────────────────────────────────────────────────────────────────────
// Schema Helpers
// ─────────────────────────────────────────────────────────────────────────────

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

const CodeSchema = Type.Union([Type.String(), Type.Number()]);

// ─────────────────────────────────────────────────────────────────────────────
// Joined Row
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One row of `recommendations JOIN assessments`, as read from the database.
 */
export const RecommendationWithAssessmentSchema = Type.Object({
  arc: Nullable(CodeSchema),
  assessment_id: Nullable(CodeSchema),
  imp_status: Nullable(Type.String()),
  imp_cost: Nullable(Type.Number()),
  fiscal_year: Nullable(Type.Number()),
  center: Nullable(Type.String()),
  state: Nullable(Type.String()),
  total_savings: Nullable(Type.Number()),
  p_conserved_mmbtu: Nullable(Type.Number()),
  total_energy_saved: Nullable(Type.Number()),
  naics: Nullable(CodeSchema),
  products: Nullable(Type.String()),
});

export type RecommendationWithAssessment = Static<typeof RecommendationWithAssessmentSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Row
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Public shape of a recommendation returned by `GET /all`.
 */
export const EnrichedRecommendationSchema = Type.Object({
  number_arc: Nullable(CodeSchema),
  number_naics: Nullable(CodeSchema),
  description_naics: Type.String(),
  description_arc: Type.String(),
  product_naics: Nullable(Type.String()),
  center: Nullable(Type.String()),
  state: Nullable(Type.String()),
  fiscal_year: Nullable(Type.Number()),
  implemented: Type.Boolean(),
  cost: Nullable(Type.Number()),
  total_savings: Nullable(Type.Number()),
  p_conserved_mmbtu: Nullable(Type.Number({ description: 'Primary energy conserved, MMBtu' })),
  energy_savings: Nullable(Type.Number()),
});

export type EnrichedRecommendation = Static<typeof EnrichedRecommendationSchema>;

/**
 * Descriptions resolved for one row before it is reshaped.
 */
export interface ResolvedDescriptions {
  naics: string;
  arc: string;
}
