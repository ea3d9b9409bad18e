/**
 * NAICS hierarchy indexing and longest-prefix lookup.
 *
 * The nested document is flattened once into a code → title map so that a
 * lookup is a bounded loop over prefixes of the input rather than a tree walk.
 */

import {
  MIN_PREFIX_LENGTH,
  NAICS_DESCRIPTION_NOT_FOUND,
  ROOT_CODE,
  UNKNOWN_NAICS_DESCRIPTION,
  type NaicsCodeInput,
  type NaicsHierarchyNode,
  type NaicsIndex,
} from './types.js';

import type { NaicsResolver } from './ports.js';

/**
 * Canonical string form of a code.
 *
 * Strips whitespace and thousands separators, and drops an all-zero decimal
 * part left behind by spreadsheet imports ("311221.0" → "311221").
 * Anything else is kept verbatim and compared as an opaque string.
 */
export const normalizeNaicsCode = (code: string | number): string => {
  const text = String(code).replace(/[,\s]/g, '');
  const integral = /^(\d+)\.0*$/.exec(text);
  return integral?.[1] ?? text;
};

const childrenOf = (node: NaicsHierarchyNode): NaicsHierarchyNode[] => {
  if (node.children === undefined) {
    return [];
  }
  return Array.isArray(node.children) ? node.children : Object.values(node.children);
};

/**
 * Flattens the hierarchy into a lookup index.
 *
 * Nodes are visited in document order (pre-order); the first node seen for a
 * code wins. Range aliases are registered after all real nodes, so a real
 * node always shadows an alias with the same code.
 */
export const buildNaicsIndex = (root: NaicsHierarchyNode): NaicsIndex => {
  const index = new Map<string, string>();
  const aliases: [string, string][] = [];
  const stack: NaicsHierarchyNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) {
      break;
    }

    const code = normalizeNaicsCode(node.code);
    const title = node.title ?? node.description;

    if (code !== ROOT_CODE && code !== '' && title !== undefined) {
      if (!index.has(code)) {
        index.set(code, title);
      }
      for (const alternate of node.alternate_codes ?? []) {
        aliases.push([normalizeNaicsCode(alternate), title]);
      }
    }

    // Reverse so the first child is popped first
    const children = childrenOf(node);
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) {
        stack.push(child);
      }
    }
  }

  for (const [alias, title] of aliases) {
    if (alias !== '' && !index.has(alias)) {
      index.set(alias, title);
    }
  }

  return index;
};

/**
 * Finds the title of the longest prefix of `code` present in the index.
 *
 * Codes shorter than {@link MIN_PREFIX_LENGTH} are looked up as-is.
 */
export const findLongestPrefixMatch = (index: NaicsIndex, code: string): string | undefined => {
  if (code.length < MIN_PREFIX_LENGTH) {
    return index.get(code);
  }

  for (let length = code.length; length >= MIN_PREFIX_LENGTH; length--) {
    const title = index.get(code.slice(0, length));
    if (title !== undefined) {
      return title;
    }
  }

  return undefined;
};

/**
 * Resolves a raw code to a description, falling back to sentinel strings.
 *
 * A numeric `0` is an unset code in the export and counts as blank.
 */
export const describeNaicsCode = (index: NaicsIndex, code: NaicsCodeInput): string => {
  if (code === null || code === undefined || code === 0) {
    return UNKNOWN_NAICS_DESCRIPTION;
  }

  const normalized = normalizeNaicsCode(code);
  if (normalized === '') {
    return UNKNOWN_NAICS_DESCRIPTION;
  }

  return findLongestPrefixMatch(index, normalized) ?? NAICS_DESCRIPTION_NOT_FOUND;
};

/**
 * Creates a resolver over a prebuilt index.
 */
export const makeNaicsResolver = (index: NaicsIndex): NaicsResolver => ({
  size: index.size,
  describe: (code) => describeNaicsCode(index, code),
});
