import type { ArcCodeInput } from './types.js';

/**
 * Resolves ARC codes to their recommendation description.
 */
export interface ArcResolver {
  readonly size: number;
  describe(code: ArcCodeInput): string;
}
