/**
 * Verifies the ITAC database can be opened and holds the tables `GET /all`
 * joins. Table names are read from `sqlite_master`, so no table is scanned.
 */

import { sql } from 'kysely';

import { ITAC_TABLES } from '../../../../infra/database/itac/types.js';

import type { ReadinessChecker } from '../../core/ports.js';
import type { ItacDbClient } from '@/infra/database/client.js';

const DEFAULT_TIMEOUT_MS = 3000;

export interface ItacTablesCheckerOptions {
  timeoutMs?: number;
}

const withTimeout = async <T>(work: Promise<T>, timeoutMs: number): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`ITAC table check timed out after ${String(timeoutMs)}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

export const makeItacTablesChecker = (
  db: ItacDbClient,
  options: ItacTablesCheckerOptions = {}
): ReadinessChecker => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  return async () => {
    const startedAt = Date.now();

    try {
      const result = await withTimeout(
        sql<{ name: string }>`SELECT name FROM sqlite_master WHERE type = 'table'`.execute(db),
        timeoutMs
      );
      const present = new Set(result.rows.map((row) => row.name));
      const missing = ITAC_TABLES.filter((table) => !present.has(table));

      return {
        name: 'itac-tables',
        status: missing.length === 0 ? 'pass' : 'fail',
        critical: true,
        ...(missing.length > 0 && { detail: `Missing tables: ${missing.join(', ')}` }),
        latencyMs: Date.now() - startedAt,
      };
    } catch (error) {
      return {
        name: 'itac-tables',
        status: 'fail',
        critical: true,
        detail: error instanceof Error ? error.message : 'Unknown database error',
        latencyMs: Date.now() - startedAt,
      };
    }
  };
};
