import SQLite from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';

import type { ItacDatabase } from './itac/types.js';
import type { AppConfig } from '../config/env.js';

export type ItacDbClient = Kysely<ItacDatabase>;

/**
 * Create a Kysely instance over an on-disk SQLite file.
 *
 * The file is opened read-only and lazily, on the first connection request,
 * so a missing or unreadable database surfaces as a query error rather than
 * a startup crash.
 */
export const createItacDb = (
  filePath: string,
  options: { busyTimeoutMs?: number } = {}
): ItacDbClient => {
  return new Kysely<ItacDatabase>({
    dialect: new SqliteDialect({
      database: async () =>
        new SQLite(filePath, {
          readonly: true,
          fileMustExist: true,
          timeout: options.busyTimeoutMs ?? 5000,
        }),
    }),
  });
};

/**
 * Initialize database client from configuration
 */
export const initDatabase = (config: AppConfig): ItacDbClient =>
  createItacDb(config.database.path, { busyTimeoutMs: config.database.busyTimeoutMs });

// Re-export types
export * from './itac/types.js';
