/**
 * Readiness checkers for the ITAC service
 */

import { makeItacTablesChecker } from './itac-tables-checker.js';
import { makeReferenceDataChecker, type CodeLookup } from './reference-data-checker.js';

import type { ReadinessChecker } from '../../core/ports.js';
import type { ItacDbClient } from '@/infra/database/client.js';

export { makeItacTablesChecker, type ItacTablesCheckerOptions } from './itac-tables-checker.js';
export {
  makeReferenceDataChecker,
  type CodeLookup,
  type ReferenceDataCheckerOptions,
} from './reference-data-checker.js';

export interface ServiceReadinessDeps {
  itacDb: ItacDbClient;
  naicsResolver: CodeLookup;
  arcResolver: CodeLookup;
}

/**
 * Checks for everything `GET /all` depends on. The ARC catalog is not
 * critical: without it rows still resolve, with the not-found description.
 */
export const makeServiceReadinessCheckers = (deps: ServiceReadinessDeps): ReadinessChecker[] => [
  makeItacTablesChecker(deps.itacDb),
  makeReferenceDataChecker({ name: 'naics-hierarchy', lookup: deps.naicsResolver, critical: true }),
  makeReferenceDataChecker({ name: 'arc-catalog', lookup: deps.arcResolver, critical: false }),
];
