// =============================================================================
// BASTION — Test Suite 01: Health & Connectivity
// =============================================================================

import fetch from 'node-fetch';
import { createHarness } from './fakes';
import { api, json, startTestApp, TestServer } from './helpers';

interface HealthBody {
  status: string;
  service: string;
  version: string;
  checks: Record<string, { status: string; latencyMs?: number; error?: string }>;
}

describe('Health & Connectivity', () => {
  let server: TestServer;
  let databaseUp = true;

  beforeAll(async () => {
    server = await startTestApp(createHarness(), async () => {
      if (!databaseUp) throw new Error('connection refused');
    });
  });

  afterAll(async () => {
    await server.close();
  });

  afterEach(() => {
    databaseUp = true;
  });

  test('GET /api/health returns healthy status', async () => {
    const res = await api(server, 'GET', '/api/health');
    expect(res.status).toBe(200);

    const body = await json<HealthBody>(res);
    expect(body.status).toBe('healthy');
    expect(body.service).toBe('bastion');
    expect(body.version).toBe('0.3.0');
    expect(body.checks.database.status).toBe('healthy');
    expect(typeof body.checks.database.latencyMs).toBe('number');
    expect(body.checks.scorer.status).toBe('unconfigured');
  });

  test('unreachable database reports degraded with 503', async () => {
    databaseUp = false;
    const res = await api(server, 'GET', '/api/health');
    expect(res.status).toBe(503);

    const body = await json<HealthBody>(res);
    expect(body.status).toBe('degraded');
    expect(body.checks.database.status).toBe('unhealthy');
    expect(body.checks.database.error).toBe('connection refused');
  });

  test('responses carry a request id', async () => {
    const res = await api(server, 'GET', '/api/health');
    expect(res.headers.get('x-request-id')).toMatch(/^bst-[0-9a-f-]{36}$/);
  });

  test('unknown route returns 404', async () => {
    const res = await api(server, 'GET', '/api/nonexistent');
    expect(res.status).toBe(404);
  });

  test('protected route without token returns 401', async () => {
    const res = await api(server, 'GET', '/api/escalations');
    expect(res.status).toBe(401);
  });

  test('malformed JSON body returns 400', async () => {
    const res = await fetchRaw(server, '/api/auth/login', '{"email":');
    expect(res.status).toBe(400);
    expect((await json<{ error: string }>(res)).error).toBe('Malformed JSON body');
  });
});

function fetchRaw(server: TestServer, path: string, body: string) {
  return fetch(`${server.baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}
