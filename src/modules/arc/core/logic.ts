import {
  ARC_DESCRIPTION_NOT_FOUND,
  UNKNOWN_ARC_DESCRIPTION,
  type ArcCatalogDocument,
} from './types.js';

import type { ArcResolver } from './ports.js';

/**
 * Creates an exact-match resolver over the catalog's `arc_codes` map.
 */
export const makeArcResolver = (document: ArcCatalogDocument): ArcResolver => {
  const catalog = new Map(Object.entries(document.arc_codes));

  return {
    size: catalog.size,
    describe: (code) => {
      // 0 marks an unset code, like null
      if (code === null || code === undefined || code === 0) {
        return UNKNOWN_ARC_DESCRIPTION;
      }

      const key = String(code).trim();
      if (key === '') {
        return UNKNOWN_ARC_DESCRIPTION;
      }

      return catalog.get(key) ?? ARC_DESCRIPTION_NOT_FOUND;
    },
  };
};
