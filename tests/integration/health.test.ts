/**
 * Integration tests for health endpoints
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { createItacDb } from '@/infra/database/client.js';
import { makeArcResolver } from '@/modules/arc/index.js';

import {
  makeFailingReadinessChecker,
  makeTestConfig,
  makeTestResolvers,
} from '../fixtures/builders.js';
import { makeEmptyItacDb, makeSeededItacDb } from '../fixtures/itac-db.js';

import type { ItacDbClient } from '@/infra/database/client.js';
import type { AppDeps } from '@/app/build-app.js';
import type { FastifyInstance } from 'fastify';

describe('Health Endpoints', () => {
  let app: FastifyInstance | undefined;
  let db: ItacDbClient | undefined;

  afterEach(async () => {
    await app?.close();
    await db?.destroy();
    app = undefined;
    db = undefined;
  });

  const start = async (
    itacDb: ItacDbClient,
    overrides: Partial<AppDeps> = {},
    version?: string
  ): Promise<FastifyInstance> =>
    createApp({
      fastifyOptions: { logger: false },
      deps: { itacDb, ...makeTestResolvers(), config: makeTestConfig(), ...overrides },
      version,
    });

  it('GET /health/live returns 200 with status ok', async () => {
    db = makeEmptyItacDb();
    app = await start(db);

    const response = await app.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('GET /health/ready is ready when the tables and reference data are in place', async () => {
    db = await makeSeededItacDb();
    app = await start(db, {}, '0.1.0');

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('ready');
    expect(body.version).toBe('0.1.0');
    expect(body.uptime).toBeGreaterThanOrEqual(0);
    expect(body.checks).toEqual([
      expect.objectContaining({ name: 'itac-tables', status: 'pass', critical: true }),
      {
        name: 'naics-hierarchy',
        status: 'pass',
        critical: true,
        detail: '9 codes loaded',
      },
      { name: 'arc-catalog', status: 'pass', critical: false, detail: '3 codes loaded' },
    ]);
  });

  it('GET /health/ready returns 503 when the ITAC tables are missing', async () => {
    db = makeEmptyItacDb();
    app = await start(db);

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    const body = response.json();
    expect(body.status).toBe('not_ready');
    expect(body.checks[0]).toMatchObject({
      name: 'itac-tables',
      status: 'fail',
      detail: 'Missing tables: recommendations, assessments',
    });
  });

  it('GET /health/ready returns 503 when the database file is missing', async () => {
    db = createItacDb('/nonexistent/itac/itac_database.db');
    app = await start(db);

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    expect(response.json().status).toBe('not_ready');
  });

  it('GET /health/ready is degraded with an empty ARC catalog', async () => {
    db = await makeSeededItacDb();
    app = await start(db, { arcResolver: makeArcResolver({ arc_codes: {} }) });

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    expect(response.json().status).toBe('degraded');
  });

  it('GET /health/ready returns 503 when a checker throws', async () => {
    db = makeEmptyItacDb();
    app = await start(db, { readinessCheckers: [makeFailingReadinessChecker('checker crashed')] });

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    expect(response.json().checks).toEqual([
      { name: 'checker-1', status: 'fail', critical: true, detail: 'checker crashed' },
    ]);
  });
});
