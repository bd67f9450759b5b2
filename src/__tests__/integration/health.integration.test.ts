/**
 * Integration Tests — Health Endpoint & Static Page
 *
 * Supertest drives the full middleware chain in memory; no port is bound.
 * Neither endpoint touches a provider, so the real container is used.
 */
import { createApp } from '@interfaces/http/app';
import request from 'supertest';

describe('GET /api/v1/health', () => {
  const app = createApp();

  it('should return 200 with status "ok"', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('should include an uptime value (number of seconds)', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(typeof res.body.uptime).toBe('number');
    expect(res.body.uptime).toBeGreaterThanOrEqual(0);
  });

  it('should include a valid ISO 8601 timestamp', async () => {
    const res = await request(app).get('/api/v1/health');

    const parsed = new Date(res.body.timestamp);
    expect(parsed.toISOString()).toBe(res.body.timestamp);
  });
});

describe('GET /', () => {
  const app = createApp();

  it('should serve the analysis page', async () => {
    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/text\/html/);
    expect(res.text).toContain('<title>企业信息智能分析平台</title>');
  });

  it('should allow its own script without forcing HTTPS', async () => {
    const res = await request(app).get('/');

    const csp = res.headers['content-security-policy'];
    expect(csp).toContain("script-src 'self'");
    expect(csp).not.toContain('upgrade-insecure-requests');
  });
});

describe('unknown routes', () => {
  const app = createApp();

  it('should return 404 in the error envelope', async () => {
    const res = await request(app).get('/api/v1/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 'error', message: 'Route not found: GET /api/v1/nope' });
  });
});
