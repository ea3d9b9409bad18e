/**
 * Health module exports
 */

// Routes
export { makeHealthRoutes } from './shell/rest/routes.js';

// Checkers
export {
  makeItacTablesChecker,
  makeReferenceDataChecker,
  makeServiceReadinessCheckers,
  type CodeLookup,
  type ItacTablesCheckerOptions,
  type ReferenceDataCheckerOptions,
  type ServiceReadinessDeps,
} from './shell/checkers/index.js';

// Use cases
export {
  getReadiness,
  summarizeReadiness,
  toReadinessChecks,
  type GetReadinessDeps,
} from './core/usecases/get-readiness.js';

// Types
export type { ReadinessChecker } from './core/ports.js';
export type {
  LivenessResponse,
  ReadinessCheck,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
