import type { NaicsCodeInput } from './types.js';

/**
 * Resolves NAICS codes to their category description.
 */
export interface NaicsResolver {
  /** Number of distinct codes (including range aliases) known to the resolver */
  readonly size: number;

  /**
   * Returns the description of the longest indexed prefix of `code`.
   * Never throws; unknown, empty or zero codes map to sentinel strings.
   */
  describe(code: NaicsCodeInput): string;
}
