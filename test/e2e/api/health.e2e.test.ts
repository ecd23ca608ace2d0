// E2E tests for the banner, health diagnostic and error mapping
import { FastifyInstance } from 'fastify';
import App from '../../../src/app';
import { InMemoryDocumentStore } from '../../helpers/in-memory-document-store';
import { buildTestApp } from '../../helpers/test-utils';

describe('Health E2E Tests', () => {
  let app: App;
  let server: FastifyInstance;
  let store: InMemoryDocumentStore;

  beforeEach(async () => {
    ({ app, store } = await buildTestApp());
    server = app.getFastifyInstance();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should answer the root banner', async () => {
    const response = await server.inject({ method: 'GET', url: '/' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ message: 'Spendings API running' });
  });

  it('should allow any origin by default', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/',
      headers: { origin: 'http://localhost:3000' }
    });

    expect(response.headers['access-control-allow-origin']).toBe('*');
  });

  it('should report a reachable store as healthy', async () => {
    await server.inject({ method: 'POST', url: '/api/share', payload: { client_id: 'c1' } });

    const response = await server.inject({ method: 'GET', url: '/api/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      status: 'healthy',
      backend: 'running',
      database: 'connected',
      database_name: 'in-memory',
      collections: ['share']
    });
  });

  it('should answer 503 when the store is unreachable', async () => {
    store.failWith(new Error('connect ECONNREFUSED'));

    const response = await server.inject({ method: 'GET', url: '/api/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({
      success: false,
      message: 'Document store unavailable',
      code: 'STORE_UNAVAILABLE'
    });
  });

  it('should map a store failure on a business endpoint to 500', async () => {
    store.failWith(new Error('connection reset'));

    const response = await server.inject({ method: 'GET', url: '/api/balance?client_id=c1' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      success: false,
      message: 'connection reset',
      code: 'INTERNAL_ERROR'
    });
  });

  it('should answer 404 for an unknown route', async () => {
    const response = await server.inject({ method: 'GET', url: '/api/unknown' });

    expect(response.statusCode).toBe(404);
  });
});
