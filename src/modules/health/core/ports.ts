import type { ReadinessCheck } from './types.js';

/**
 * One readiness check. Expected to resolve even on failure; a rejection is
 * reported as a failing critical check.
 */
export type ReadinessChecker = () => Promise<ReadinessCheck>;
