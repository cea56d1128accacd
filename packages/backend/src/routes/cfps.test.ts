import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import type { Cfp } from '@cfp/shared';

vi.mock('../db/index.js', () => ({
  get_pool: vi.fn(),
  query: vi.fn(),
  with_transaction: vi.fn(),
}));

vi.mock('../services/cfps.js', () => ({
  list_cfps: vi.fn(),
  create_cfp: vi.fn(),
  update_cfp: vi.fn(),
  delete_cfp: vi.fn(),
  get_cfp_status: vi.fn(),
}));

vi.mock('../lib/logger.js', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
  log.child.mockReturnValue(log);
  return { logger: log };
});

import { create_app } from '../app.js';
import { list_cfps, create_cfp, update_cfp, delete_cfp, get_cfp_status } from '../services/cfps.js';
import { CfpValidationError, NotFoundError } from '../lib/errors.js';

const mock_list = vi.mocked(list_cfps);
const mock_create = vi.mocked(create_cfp);
const mock_update = vi.mocked(update_cfp);
const mock_delete = vi.mocked(delete_cfp);
const mock_status = vi.mocked(get_cfp_status);

const API_KEY = 'test-api-key';
const CONFERENCE_ID = '11111111-1111-4111-8111-111111111111';
const CFP_ID = '22222222-2222-4222-8222-222222222222';

const cfp: Cfp = {
  id: CFP_ID,
  program_id: '33333333-3333-4333-8333-333333333333',
  cfp_type: 'events',
  start_date: '2024-06-13',
  end_date: '2024-06-14',
  description: null,
  created_at: new Date('2024-01-01T00:00:00Z'),
  updated_at: new Date('2024-01-01T00:00:00Z'),
};

const cfp_json = { ...cfp, created_at: '2024-01-01T00:00:00.000Z', updated_at: '2024-01-01T00:00:00.000Z' };

describe('cfp routes', () => {
  const app = create_app();

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('GET /api/conferences/:conference_id/cfps', () => {
    it('returns the cfps with per-type lookups', async () => {
      mock_list.mockResolvedValueOnce({ cfps: [cfp], for_events: cfp, for_tracks: null, for_booths: null });

      const response = await request(app).get(`/api/conferences/${CONFERENCE_ID}/cfps`).set('x-api-key', API_KEY);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ cfps: [cfp_json], for_events: cfp_json, for_tracks: null, for_booths: null });
      expect(mock_list).toHaveBeenCalledWith(CONFERENCE_ID);
    });

    it('returns 404 for an unknown conference', async () => {
      mock_list.mockRejectedValueOnce(new NotFoundError('Conference not found'));

      const response = await request(app).get(`/api/conferences/${CONFERENCE_ID}/cfps`).set('x-api-key', API_KEY);

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Conference not found' });
    });

    it('returns 400 for a malformed conference id', async () => {
      const response = await request(app).get('/api/conferences/not-a-uuid/cfps').set('x-api-key', API_KEY);

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Invalid conference ID' });
      expect(mock_list).not.toHaveBeenCalled();
    });
  });

  describe('POST /api/conferences/:conference_id/cfps', () => {
    const body = { cfp_type: 'events', start_date: '2024-06-13', end_date: '2024-06-14' };

    it('creates a cfp', async () => {
      mock_create.mockResolvedValueOnce(cfp);

      const response = await request(app)
        .post(`/api/conferences/${CONFERENCE_ID}/cfps`)
        .set('x-api-key', API_KEY)
        .send(body);

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ cfp: cfp_json });
      expect(mock_create).toHaveBeenCalledWith(CONFERENCE_ID, body);
    });

    it('answers 422 with field errors when the cfp is invalid', async () => {
      mock_create.mockRejectedValueOnce(new CfpValidationError([{ field: 'cfp_type', reason: 'taken' }]));

      const response = await request(app)
        .post(`/api/conferences/${CONFERENCE_ID}/cfps`)
        .set('x-api-key', API_KEY)
        .send(body);

      expect(response.status).toBe(422);
      expect(response.body).toEqual({ error: 'Cfp is invalid', errors: [{ field: 'cfp_type', reason: 'taken' }] });
    });

    it('answers 400 when a date is malformed', async () => {
      const response = await request(app)
        .post(`/api/conferences/${CONFERENCE_ID}/cfps`)
        .set('x-api-key', API_KEY)
        .send({ ...body, end_date: '2024-02-30' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Invalid request body');
      expect(mock_create).not.toHaveBeenCalled();
    });
  });

  describe('GET /api/cfps/:id', () => {
    it('returns the cfp with its status', async () => {
      mock_status.mockResolvedValueOnce({ cfp, open: true, remaining_days: 1, weeks: 1 });

      const response = await request(app).get(`/api/cfps/${CFP_ID}`).set('x-api-key', API_KEY);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ cfp: cfp_json, open: true, remaining_days: 1, weeks: 1 });
    });

    it('returns 500 on unexpected errors', async () => {
      mock_status.mockRejectedValueOnce(new Error('connection refused'));

      const response = await request(app).get(`/api/cfps/${CFP_ID}`).set('x-api-key', API_KEY);

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: 'Internal server error' });
    });
  });

  describe('PUT /api/cfps/:id', () => {
    it('updates the cfp and reports whether the email was queued', async () => {
      mock_update.mockResolvedValueOnce({ cfp, notified: true });

      const response = await request(app)
        .put(`/api/cfps/${CFP_ID}`)
        .set('x-api-key', API_KEY)
        .send({ end_date: '2024-06-14' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ cfp: cfp_json, notified: true });
      expect(mock_update).toHaveBeenCalledWith(CFP_ID, { end_date: '2024-06-14' });
    });

    it('returns 404 for an unknown cfp', async () => {
      mock_update.mockRejectedValueOnce(new NotFoundError('Cfp not found'));

      const response = await request(app)
        .put(`/api/cfps/${CFP_ID}`)
        .set('x-api-key', API_KEY)
        .send({ end_date: '2024-06-14' });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Cfp not found' });
    });

    it('answers 422 when the start date is not before the end date', async () => {
      mock_update.mockRejectedValueOnce(
        new CfpValidationError([{ field: 'start_date', reason: 'not_before_end_date' }])
      );

      const response = await request(app)
        .put(`/api/cfps/${CFP_ID}`)
        .set('x-api-key', API_KEY)
        .send({ start_date: '2024-06-14' });

      expect(response.status).toBe(422);
      expect(response.body.errors).toEqual([{ field: 'start_date', reason: 'not_before_end_date' }]);
    });
  });

  describe('DELETE /api/cfps/:id', () => {
    it('deletes the cfp', async () => {
      mock_delete.mockResolvedValueOnce(true);

      const response = await request(app).delete(`/api/cfps/${CFP_ID}`).set('x-api-key', API_KEY);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true });
    });

    it('returns 404 when nothing was deleted', async () => {
      mock_delete.mockResolvedValueOnce(false);

      const response = await request(app).delete(`/api/cfps/${CFP_ID}`).set('x-api-key', API_KEY);

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Cfp not found' });
    });
  });
});
