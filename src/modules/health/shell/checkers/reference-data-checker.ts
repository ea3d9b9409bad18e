import type { ReadinessChecker } from '../../core/ports.js';

/** Anything loaded at startup that reports how many codes it knows */
export interface CodeLookup {
  readonly size: number;
}

export interface ReferenceDataCheckerOptions {
  name: string;
  lookup: CodeLookup;
  critical: boolean;
}

/**
 * Fails while the lookup is empty: every code would resolve to the not-found
 * description.
 */
export const makeReferenceDataChecker = (options: ReferenceDataCheckerOptions): ReadinessChecker => {
  const { name, lookup, critical } = options;

  return async () =>
    lookup.size > 0
      ? { name, status: 'pass', critical, detail: `${String(lookup.size)} codes loaded` }
      : { name, status: 'fail', critical, detail: 'No codes loaded' };
};
