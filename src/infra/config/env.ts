/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Data files
  ITAC_DATABASE_PATH: Type.String({ minLength: 1 }),
  NAICS_HIERARCHY_PATH: Type.String({ minLength: 1 }),
  ARC_HIERARCHY_PATH: Type.String({ minLength: 1 }),
  DATABASE_BUSY_TIMEOUT_MS: Type.Integer({ default: 5000, minimum: 0 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

export const DEFAULT_ITAC_DATABASE_PATH = './data/itac_database.db';
export const DEFAULT_NAICS_HIERARCHY_PATH = './data/naics_hierarchy.json';
export const DEFAULT_ARC_HIERARCHY_PATH = './data/arc_hierarchy.json';

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number.parseInt(value, 10) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseInteger(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    ITAC_DATABASE_PATH: env['ITAC_DATABASE_PATH'] ?? DEFAULT_ITAC_DATABASE_PATH,
    NAICS_HIERARCHY_PATH: env['NAICS_HIERARCHY_PATH'] ?? DEFAULT_NAICS_HIERARCHY_PATH,
    ARC_HIERARCHY_PATH: env['ARC_HIERARCHY_PATH'] ?? DEFAULT_ARC_HIERARCHY_PATH,
    DATABASE_BUSY_TIMEOUT_MS: parseInteger(env['DATABASE_BUSY_TIMEOUT_MS'], 5000),
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    /** On-disk SQLite file holding the recommendations and assessments tables */
    path: env.ITAC_DATABASE_PATH,
    busyTimeoutMs: env.DATABASE_BUSY_TIMEOUT_MS,
  },
  hierarchies: {
    naicsPath: env.NAICS_HIERARCHY_PATH,
    arcPath: env.ARC_HIERARCHY_PATH,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
