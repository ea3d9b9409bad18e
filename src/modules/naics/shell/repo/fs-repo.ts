import { TypeCompiler } from '@sinclair/typebox/compiler';

import { readJsonDocument } from '../../../../infra/documents/json-document.js';
import { buildNaicsIndex, makeNaicsResolver } from '../../core/logic.js';
import { NaicsHierarchyNodeSchema, type NaicsHierarchyNode } from '../../core/types.js';

import type { NaicsHierarchyError } from '../../core/errors.js';
import type { NaicsResolver } from '../../core/ports.js';
import type { Result } from 'neverthrow';

const validator = TypeCompiler.Compile(NaicsHierarchyNodeSchema);

/**
 * Reads and validates the NAICS hierarchy document.
 */
export const loadNaicsHierarchy = async (
  filePath: string
): Promise<Result<NaicsHierarchyNode, NaicsHierarchyError>> => {
  return readJsonDocument(filePath, validator, 'NAICS hierarchy');
};

/**
 * Loads the hierarchy document and builds the resolver index from it.
 */
export const createNaicsResolverFromFile = async (
  filePath: string
): Promise<Result<NaicsResolver, NaicsHierarchyError>> => {
  const hierarchy = await loadNaicsHierarchy(filePath);
  return hierarchy.map((root) => makeNaicsResolver(buildNaicsIndex(root)));
};
