import { TypeCompiler } from '@sinclair/typebox/compiler';

import { readJsonDocument } from '../../../../infra/documents/json-document.js';
import { makeArcResolver } from '../../core/logic.js';
import { ArcCatalogDocumentSchema, type ArcCatalogDocument } from '../../core/types.js';

import type { ArcCatalogError } from '../../core/errors.js';
import type { ArcResolver } from '../../core/ports.js';
import type { Result } from 'neverthrow';

const validator = TypeCompiler.Compile(ArcCatalogDocumentSchema);

/**
 * Reads and validates the ARC document.
 */
export const loadArcCatalog = async (
  filePath: string
): Promise<Result<ArcCatalogDocument, ArcCatalogError>> => {
  return readJsonDocument(filePath, validator, 'ARC catalog');
};

/**
 * Loads the ARC document and builds the resolver from it.
 */
export const createArcResolverFromFile = async (
  filePath: string
): Promise<Result<ArcResolver, ArcCatalogError>> => {
  const document = await loadArcCatalog(filePath);
  return document.map(makeArcResolver);
};
