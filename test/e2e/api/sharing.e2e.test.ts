// E2E tests for shareable dashboards
import { FastifyInstance } from 'fastify';
import App from '../../../src/app';
import { buildTestApp } from '../../helpers/test-utils';

describe('Sharing E2E Tests', () => {
  let app: App;
  let server: FastifyInstance;

  beforeEach(async () => {
    ({ app } = await buildTestApp());
    server = app.getFastifyInstance();

    await server.inject({
      method: 'POST',
      url: '/api/transactions',
      payload: { client_id: 'c1', amount: 50, category: 'Salary', type: 'income' }
    });
    await server.inject({
      method: 'POST',
      url: '/api/transactions',
      payload: { client_id: 'c1', amount: 20, category: 'Food', type: 'expense' }
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('should issue a token that resolves to the owner\'s dashboard', async () => {
    const created = await server.inject({ method: 'POST', url: '/api/share', payload: { client_id: 'c1' } });

    expect(created.statusCode).toBe(201);
    const { token } = created.json();
    expect(token).toMatch(/^[0-9a-f]{10}$/);

    const shared = await server.inject({ method: 'GET', url: `/api/share/${token}` });
    const categories = await server.inject({ method: 'GET', url: '/api/categories?client_id=c1' });

    expect(shared.statusCode).toBe(200);
    const dashboard = shared.json();
    expect(dashboard.client_id).toBe('c1');
    expect(dashboard.balance).toBe(30);
    expect(dashboard.items).toHaveLength(2);
    expect(dashboard.categories).toEqual(categories.json().categories);
  });

  it('should return 404 for an unknown token', async () => {
    const response = await server.inject({ method: 'GET', url: '/api/share/0000000000' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      success: false,
      message: 'Share not found',
      code: 'NOT_FOUND_ERROR'
    });
  });

  it('should require client_id to create a share', async () => {
    const response = await server.inject({ method: 'POST', url: '/api/share', payload: {} });

    expect(response.statusCode).toBe(400);
    expect(response.json().errors).toEqual([{ field: 'client_id', message: 'client_id is required' }]);
  });
});
