/**
 * Domain types for the ARC module.
 *
 * ARCs (Assessment Recommendation Codes) classify the recommendations made
 * during an assessment, e.g. `2.7142` for a lighting upgrade.
 */

import { Type, type Static } from '@sinclair/typebox';

/** Returned when the input code is empty or missing */
export const UNKNOWN_ARC_DESCRIPTION = 'Unknown';

/** Returned when the code is not listed in the catalog */
export const ARC_DESCRIPTION_NOT_FOUND = 'ARC description not found';

/**
 * ARC document. Only the flat `arc_codes` map is read; the nested
 * `arc_hierarchy` section of the same file is ignored.
 */
export const ArcCatalogDocumentSchema = Type.Object({
  arc_codes: Type.Record(Type.String(), Type.String()),
});

export type ArcCatalogDocument = Static<typeof ArcCatalogDocumentSchema>;

export type ArcCodeInput = string | number | null | undefined;
