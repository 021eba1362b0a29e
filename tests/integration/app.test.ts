import request from 'supertest';
import { createApp } from '../../src/app';
import { InMemoryPlotStore } from '../helpers/inMemoryPlotStore';

describe('Application routes', () => {
  const cors = { allowedOrigins: ['http://localhost:3000'], allowAllOrigins: false };

  it('answers GET /ping with pong', async () => {
    const app = createApp({ plotStore: new InMemoryPlotStore(), cors });

    const response = await request(app).get('/ping');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ message: 'pong' });
  });

  it('reports a reachable database from GET /health', async () => {
    const app = createApp({ plotStore: new InMemoryPlotStore(), cors });

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', database: 'connected' });
  });

  it('reports an unreachable database from GET /health with 503', async () => {
    const store = new InMemoryPlotStore();
    store.reachable = false;
    const app = createApp({ plotStore: store, cors });

    const response = await request(app).get('/health');

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ status: 'unhealthy', database: 'unreachable' });
  });

  it('returns 404 for unknown routes', async () => {
    const app = createApp({ plotStore: new InMemoryPlotStore(), cors });

    const response = await request(app).get('/nowhere');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'Route not found', detail: 'Route not found' });
  });

  it('echoes a caller-supplied request id', async () => {
    const app = createApp({ plotStore: new InMemoryPlotStore(), cors });

    const response = await request(app).get('/ping').set('X-Request-Id', 'req-plot-42');

    expect(response.headers['x-request-id']).toBe('req-plot-42');
  });

  it('generates a request id when none is supplied', async () => {
    const app = createApp({ plotStore: new InMemoryPlotStore(), cors });

    const response = await request(app).get('/ping');

    expect(response.headers['x-request-id']).toMatch(/^[A-Za-z0-9_-]{16}$/);
  });

  it('allows configured origins and rejects others', async () => {
    const app = createApp({ plotStore: new InMemoryPlotStore(), cors });

    const allowed = await request(app).get('/ping').set('Origin', 'http://localhost:3000');
    expect(allowed.status).toBe(200);
    expect(allowed.headers['access-control-allow-origin']).toBe('http://localhost:3000');

    const rejected = await request(app).get('/ping').set('Origin', 'http://elsewhere.test');
    expect(rejected.status).toBe(403);
    expect(rejected.body.code).toBe('CORS_NOT_ALLOWED');
    expect(rejected.body.details).toEqual({ origin: 'http://elsewhere.test' });
  });
});
