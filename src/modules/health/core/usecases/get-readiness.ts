import type { ReadinessChecker } from '../ports.js';
import type { ReadinessCheck, ReadinessResponse, ReadinessStatus } from '../types.js';

export interface GetReadinessDeps {
  checkers: ReadinessChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

/**
 * Settled checker promises to checks, in checker order. A rejected checker
 * becomes a critical failure named `checker-<position>`.
 */
export const toReadinessChecks = (
  settled: PromiseSettledResult<ReadinessCheck>[]
): ReadinessCheck[] =>
  settled.map((outcome, index): ReadinessCheck =>
    outcome.status === 'fulfilled'
      ? outcome.value
      : {
          name: `checker-${String(index + 1)}`,
          status: 'fail',
          critical: true,
          detail: outcome.reason instanceof Error ? outcome.reason.message : 'Check failed',
        }
  );

export const summarizeReadiness = (checks: ReadinessCheck[]): ReadinessStatus => {
  const failed = checks.filter((check) => check.status === 'fail');
  if (failed.some((check) => check.critical)) {
    return 'not_ready';
  }
  return failed.length > 0 ? 'degraded' : 'ready';
};

/**
 * Runs every checker concurrently and summarizes the outcome.
 */
export const getReadiness = async (
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> => {
  const settled = await Promise.allSettled(deps.checkers.map((checker) => checker()));
  const checks = toReadinessChecks(settled);

  return {
    status: summarizeReadiness(checks),
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(deps.version !== undefined && { version: deps.version }),
  };
};
