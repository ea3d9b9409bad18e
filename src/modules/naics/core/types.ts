/**
 * Domain types for the NAICS module.
 *
 * NAICS (North American Industry Classification System) codes are 2 to 6 digit
 * industry codes. Each extra digit narrows the parent category.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Shortest code prefix tried by the longest-prefix lookup (NAICS sectors) */
export const MIN_PREFIX_LENGTH = 2;

/** Code of the synthetic root node; never indexed */
export const ROOT_CODE = 'ROOT';

/** Returned when the input code is empty or missing */
export const UNKNOWN_NAICS_DESCRIPTION = 'Unknown';

/** Returned when no prefix of the input code exists in the hierarchy */
export const NAICS_DESCRIPTION_NOT_FOUND = 'NAICS description not found';

// ─────────────────────────────────────────────────────────────────────────────
// Hierarchy Document
// ─────────────────────────────────────────────────────────────────────────────

const CodeSchema = Type.Union([Type.String(), Type.Number()]);

/**
 * One node of the hierarchy document.
 *
 * `children` is keyed by child code in exported hierarchies, but a plain array
 * is accepted too. Range sectors such as `31-33` list their member codes in
 * `alternate_codes`.
 */
export const NaicsHierarchyNodeSchema = Type.Recursive(
  (Self) =>
    Type.Object({
      code: CodeSchema,
      title: Type.Optional(Type.String()),
      description: Type.Optional(Type.String()),
      is_range: Type.Optional(Type.Boolean()),
      alternate_codes: Type.Optional(Type.Array(CodeSchema)),
      children: Type.Optional(Type.Union([Type.Record(Type.String(), Self), Type.Array(Self)])),
    }),
  { $id: 'NaicsHierarchyNode' }
);

export type NaicsHierarchyNode = Static<typeof NaicsHierarchyNodeSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Lookup
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Flat code → title index built once from the hierarchy document.
 */
export type NaicsIndex = ReadonlyMap<string, string>;

/**
 * Codes arrive from the database as TEXT, INTEGER or REAL depending on how
 * the column was imported.
 */
export type NaicsCodeInput = string | number | null | undefined;
