/**
 * ARC Module - Public API
 *
 * Resolves Assessment Recommendation Codes to their descriptions.
 */

export { createArcResolverFromFile, loadArcCatalog } from './shell/repo/fs-repo.js';
export { makeArcResolver } from './core/logic.js';
export type { ArcResolver } from './core/ports.js';
export type { ArcCatalogDocument, ArcCodeInput } from './core/types.js';
export { ARC_DESCRIPTION_NOT_FOUND, UNKNOWN_ARC_DESCRIPTION } from './core/types.js';
export type { ArcCatalogError } from './core/errors.js';
