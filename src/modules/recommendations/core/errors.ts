/**
 * Domain error types for the Recommendations module.
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { InfraError } from '@/common/types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A joined row whose columns do not have the expected types.
 */
export interface MalformedRowError {
  readonly type: 'MalformedRowError';
  readonly message: string;
  readonly rowIndex: number;
  readonly details: string[];
}

/**
 * Resolving or reshaping a row failed unexpectedly.
 */
export interface EnrichmentError {
  readonly type: 'EnrichmentError';
  readonly message: string;
  readonly rowIndex: number;
  readonly cause?: unknown;
}

/**
 * All possible recommendations module errors.
 */
export type RecommendationError = InfraError | MalformedRowError | EnrichmentError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a database error. Surfaced to the caller as is.
 */
export const createDatabaseError = (message: string, cause?: unknown): InfraError => ({
  type: 'DatabaseError',
  message,
  cause,
});

export const createMalformedRowError = (rowIndex: number, details: string[]): MalformedRowError => ({
  type: 'MalformedRowError',
  message: `Recommendation row ${String(rowIndex)} has unexpected column values`,
  rowIndex,
  details,
});

export const createEnrichmentError = (rowIndex: number, cause?: unknown): EnrichmentError => ({
  type: 'EnrichmentError',
  message: `Failed to build recommendation row ${String(rowIndex)}`,
  rowIndex,
  cause,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps error types to HTTP status codes.
 */
export const RECOMMENDATION_ERROR_HTTP_STATUS: Record<RecommendationError['type'], 500> = {
  DatabaseError: 500,
  MalformedRowError: 500,
  EnrichmentError: 500,
};

/**
 * Gets HTTP status code for an error.
 */
export const getHttpStatusForError = (error: RecommendationError): 500 => {
  return RECOMMENDATION_ERROR_HTTP_STATUS[error.type];
};
