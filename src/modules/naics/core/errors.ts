/**
 * Domain error types for the NAICS module.
 */

import type { DocumentError } from '@/infra/documents/json-document.js';

/**
 * Failure to load the hierarchy document. Fatal at startup.
 */
export type NaicsHierarchyError = DocumentError;
