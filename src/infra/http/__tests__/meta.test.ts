import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { buildTestApp } from '../../../test/helpers.js';

describe('Meta endpoints', () => {
  it('GET / describes the API', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      name: 'User Directory API',
      version: '1.0.0',
      status: 'running',
      documentation: '/docs',
    });
    expect(response.body.endpoints.searchUsers).toBe('GET /api/users/search?q={query}');
  });

  it('GET /api/health reports a reachable database', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', database: 'up' });
  });

  it('GET /api/health answers 503 when the probe fails', async () => {
    const { app } = buildTestApp({
      probeDatabase: async () => {
        throw new Error('connection refused');
      },
    });

    const response = await request(app).get('/api/health');

    expect(response.status).toBe(503);
    expect(response.body).toEqual({
      code: 'DB_UNAVAILABLE',
      message: 'Database unavailable',
    });
  });

  it('GET /docs.json serves the OpenAPI document', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/docs.json');

    expect(response.status).toBe(200);
    expect(response.body.openapi).toBe('3.0.0');
    expect(response.body.info.title).toBe('User Directory API');
    expect(response.body.components.securitySchemes.bearerAuth.scheme).toBe('bearer');
  });

  it('answers 404 for an unknown route', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/nope');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'Route GET /nope not found' });
  });
});
