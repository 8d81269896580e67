import request from 'supertest';
import { buildTestApp } from '../helpers/app.js';

describe('status routes', () => {
  it('GET /health lists the sources', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(response.body.sources).toEqual(['stub']);
    expect(typeof response.body.timestamp).toBe('string');
    expect(response.headers['x-ratelimit-limit']).toBe('100');
  });

  it('GET /status/degradation reports source health after a check', async () => {
    const { app } = buildTestApp();
    await request(app).post('/check').send({ items: 'milk', postcode: '2000' });

    const response = await request(app).get('/status/degradation');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      serviceStatusCounts: { available: 1, degraded: 0, unavailable: 0 },
      services: { stub: 'available' },
      circuitBreakers: { stub: { serviceName: 'stub', state: 'closed', failureCount: 0, lastFailureTime: 0 } },
      cachedResultsCount: 1,
    });
  });

  it('GET /status/cache reports cache statistics', async () => {
    const { app } = buildTestApp({ CACHE_MAX_SIZE: '50', CACHE_TTL_MIN: '1' });
    await request(app).post('/check').send({ items: 'milk', postcode: '2000' });
    await request(app).post('/check').send({ items: 'milk', postcode: '2000' });

    const response = await request(app).get('/status/cache');

    expect(response.body).toEqual({
      size: 1,
      maxSize: 50,
      expiredItems: 0,
      defaultTtlMs: 60_000,
      hits: 1,
      misses: 1,
      evictions: 0,
    });
  });

  it('answers unknown routes with a NOT_FOUND envelope', async () => {
    const { app } = buildTestApp();

    const response = await request(app).get('/nope');

    expect(response.status).toBe(404);
    expect(response.body).toMatchObject({ error: 'NOT_FOUND', message: 'No route for GET /nope' });
  });
});
