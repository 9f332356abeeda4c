import request from 'supertest';
import { createTestApp, TestApp } from './support/test-app';

describe('Health (e2e)', () => {
  let ctx: TestApp;

  beforeAll(async () => {
    ctx = await createTestApp();
  });

  afterAll(async () => {
    await ctx.app?.close();
  });

  it('reports database and redis status without credentials', async () => {
    const res = await request(ctx.app.getHttpServer()).get('/api/v1/health').expect(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data).toMatchObject({
      status: 'healthy',
      services: { database: 'connected', redis: 'connected' },
    });
  });

  it('exposes Prometheus metrics as plain text', async () => {
    await request(ctx.app.getHttpServer()).get('/api/v1/health').expect(200);
    const res = await request(ctx.app.getHttpServer()).get('/api/v1/health/metrics').expect(200);

    expect(res.headers['content-type']).toContain('text/plain');
    expect(res.text).toContain('# TYPE http_requests_total counter');
    expect(res.text).toContain('http_requests_total{method="GET",route="/api/v1/health",status="200"}');
    expect(res.text).toContain('# TYPE config_mutations_total counter');
  });
});
