import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { create_app } from './app.js';

// Mock the database pool
vi.mock('./db/index.js', () => ({
  get_pool: vi.fn(() => ({
    query: vi.fn().mockResolvedValue({ rows: [{ '?column?': 1 }] }),
  })),
  query: vi.fn(),
  with_transaction: vi.fn(),
}));

describe('App', () => {
  const app = create_app();

  it('GET /api/health returns 200', async () => {
    const response = await request(app).get('/api/health');
    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', database: 'connected' });
  });

  it('echoes a request id supplied by the caller', async () => {
    const response = await request(app).get('/api/health').set('x-request-id', 'req-123');
    expect(response.headers['x-request-id']).toBe('req-123');
  });

  it('rejects cfp routes without an API key', async () => {
    const response = await request(app).get('/api/cfps/11111111-1111-4111-8111-111111111111');
    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'API key required' });
  });

  it('rejects a wrong API key', async () => {
    const response = await request(app)
      .get('/api/cfps/11111111-1111-4111-8111-111111111111')
      .set('x-api-key', 'wrong-key');
    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'Invalid API key' });
  });

  it('answers a malformed JSON body with 400 and the request id', async () => {
    const response = await request(app)
      .post('/api/conferences')
      .set('x-api-key', 'test-api-key')
      .set('x-request-id', 'req-456')
      .set('Content-Type', 'application/json')
      .send('{"name":');
    expect(response.status).toBe(400);
    expect(response.body.request_id).toBe('req-456');
  });
});
