/**
 * NAICS Module - Public API
 *
 * Loads the NAICS hierarchy document once and resolves industry codes to
 * their most specific known description.
 */

// =============================================================================
// Loading
// =============================================================================
export { loadNaicsHierarchy, createNaicsResolverFromFile } from './shell/repo/fs-repo.js';

// =============================================================================
// Logic
// =============================================================================
export {
  buildNaicsIndex,
  describeNaicsCode,
  findLongestPrefixMatch,
  makeNaicsResolver,
  normalizeNaicsCode,
} from './core/logic.js';
export type { NaicsResolver } from './core/ports.js';

// =============================================================================
// Types
// =============================================================================
export type {
  NaicsCodeInput,
  NaicsHierarchyNode,
  NaicsIndex,
} from './core/types.js';
export {
  MIN_PREFIX_LENGTH,
  NAICS_DESCRIPTION_NOT_FOUND,
  UNKNOWN_NAICS_DESCRIPTION,
} from './core/types.js';

// =============================================================================
// Errors
// =============================================================================
export type { NaicsHierarchyError } from './core/errors.js';
