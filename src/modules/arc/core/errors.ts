import type { DocumentError } from '@/infra/documents/json-document.js';

/**
 * Failure to load the ARC document. Fatal at startup.
 */
export type ArcCatalogError = DocumentError;
