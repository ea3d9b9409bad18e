/**
 * Kysely repository implementation for recommendations.
 */

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { ok, err, type Result } from 'neverthrow';

import { formatSchemaErrors } from '../../../../infra/documents/json-document.js';
import {
  createDatabaseError,
  createMalformedRowError,
  type RecommendationError,
} from '../../core/errors.js';
import {
  RecommendationWithAssessmentSchema,
  type RecommendationWithAssessment,
} from '../../core/types.js';

import type { RecommendationRepository } from '../../core/ports.js';
import type { ItacDbClient } from '@/infra/database/client.js';

const rowValidator = TypeCompiler.Compile(RecommendationWithAssessmentSchema);

/**
 * Kysely-based implementation of RecommendationRepository.
 */
class KyselyRecommendationRepo implements RecommendationRepository {
  constructor(private readonly db: ItacDbClient) {}

  async listWithAssessments(): Promise<
    Result<RecommendationWithAssessment[], RecommendationError>
  > {
    let rows: unknown[];

    try {
      // Scoped connection: released when the callback settles, on success or failure
      rows = await this.db.connection().execute(async (conn) =>
        conn
          .selectFrom('recommendations as r')
          .innerJoin('assessments as a', 'r.assessment_id', 'a.id')
          .select([
            'r.arc',
            'r.assessment_id',
            'r.imp_status',
            'r.imp_cost',
            'r.fiscal_year',
            'a.center',
            'a.state',
            'r.total_savings',
            'r.p_conserved_mmbtu',
            'r.total_energy_saved',
            'a.naics',
            'a.products',
          ])
          .execute()
      );
    } catch (error) {
      return err(createDatabaseError('Failed to load recommendations', error));
    }

    const validated: RecommendationWithAssessment[] = [];

    for (const [rowIndex, row] of rows.entries()) {
      if (!rowValidator.Check(row)) {
        return err(createMalformedRowError(rowIndex, formatSchemaErrors(rowValidator.Errors(row))));
      }
      validated.push(row);
    }

    return ok(validated);
  }
}

/**
 * Factory function to create RecommendationRepository.
 *
 * @param db - Kysely client for the ITAC database
 */
export const makeRecommendationRepo = (db: ItacDbClient): RecommendationRepository => {
  return new KyselyRecommendationRepo(db);
};
