import { describe, expect, it } from 'vitest';

import { listAllRecommendations } from '@/modules/recommendations/index.js';

import { makeRecommendationRow } from '../../fixtures/builders.js';
import {
  makeFakeArcResolver,
  makeFakeNaicsResolver,
  makeFakeRecommendationRepo,
  makeThrowingNaicsResolver,
} from '../../fixtures/fakes.js';

const naicsResolver = makeFakeNaicsResolver({ '311221': 'Wet Corn Milling' });
const arcResolver = makeFakeArcResolver({ '2.7142': 'Efficient lamps' });

describe('listAllRecommendations', () => {
  it('enriches every row in repository order', async () => {
    const recommendationRepo = makeFakeRecommendationRepo({
      rows: [
        makeRecommendationRow({ assessment_id: 'AM0001', arc: '2.7142' }),
        makeRecommendationRow({ assessment_id: 'AM0002', arc: '2.1111', naics: 999999 }),
        makeRecommendationRow({ assessment_id: 'AM0003', arc: null, naics: null }),
      ],
    });

    const result = await listAllRecommendations({ recommendationRepo, naicsResolver, arcResolver });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(
        result.value.map((r) => [r.number_arc, r.description_arc, r.description_naics])
      ).toEqual([
        ['2.7142', 'Efficient lamps', 'Wet Corn Milling'],
        ['2.1111', 'ARC description not found', 'NAICS description not found'],
        [null, 'Unknown', 'Unknown'],
      ]);
    }
  });

  it('returns an empty list when there are no rows', async () => {
    const recommendationRepo = makeFakeRecommendationRepo({ rows: [] });

    const result = await listAllRecommendations({ recommendationRepo, naicsResolver, arcResolver });

    expect(result.isOk() && result.value).toEqual([]);
  });

  it('passes repository errors through', async () => {
    const recommendationRepo = makeFakeRecommendationRepo({
      error: {
        type: 'DatabaseError',
        message: 'Failed to load recommendations',
      },
    });

    const result = await listAllRecommendations({ recommendationRepo, naicsResolver, arcResolver });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('DatabaseError');
      expect(result.error.message).toBe('Failed to load recommendations');
    }
  });

  it('fails the whole listing when one row cannot be enriched', async () => {
    const recommendationRepo = makeFakeRecommendationRepo({
      rows: [makeRecommendationRow(), makeRecommendationRow(), makeRecommendationRow()],
    });
    const throwingResolver = makeThrowingNaicsResolver(2);

    const result = await listAllRecommendations({
      recommendationRepo,
      naicsResolver: throwingResolver,
      arcResolver,
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({
        type: 'EnrichmentError',
        rowIndex: 1,
        message: 'Failed to build recommendation row 1',
      });
    }
    // Rows after the failing one are not processed
    expect(throwingResolver.calls).toBe(2);
  });
});
