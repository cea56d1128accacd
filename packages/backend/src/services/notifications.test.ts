import { describe, it, expect, vi, beforeEach } from 'vitest';
import type pg from 'pg';

vi.mock('../db/index.js', () => ({
  query: vi.fn(),
}));

vi.mock('../lib/logger.js', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
  log.child.mockReturnValue(log);
  return { logger: log };
});

import { query } from '../db/index.js';
import { logger } from '../lib/logger.js';
import { list_pending_notifications, queue_cfp_dates_updated } from './notifications.js';

const mock_query = vi.mocked(query);

const queued = {
  id: 'n-1',
  conference_id: 'conf-1',
  cfp_id: 'cfp-1',
  kind: 'cfp_dates_updated' as const,
  subject: 'Dates changed',
  body: 'The call for events now closes on {end_date}.',
  created_at: new Date('2024-06-15T10:00:00Z'),
};

function rows<T extends pg.QueryResultRow>(items: T[]): pg.QueryResult<T> {
  return { rows: items, rowCount: items.length, command: 'SELECT', oid: 0, fields: [] };
}

describe('notifications service', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('queue_cfp_dates_updated', () => {
    it('stores the configured subject and body verbatim', async () => {
      const client = { query: vi.fn().mockResolvedValue({ rows: [queued] }) };

      const result = await queue_cfp_dates_updated(client as unknown as pg.PoolClient, {
        conference: { id: 'conf-1' },
        cfp: { id: 'cfp-1', cfp_type: 'events', start_date: '2024-06-01', end_date: '2024-06-20' },
        email_settings: {
          cfp_dates_updated_subject: 'Dates changed',
          cfp_dates_updated_body: 'The call for events now closes on {end_date}.',
        },
      });

      expect(result).toBe(queued);
      expect(client.query).toHaveBeenCalledTimes(1);
      expect(client.query.mock.calls[0][1]).toEqual([
        'conf-1',
        'cfp-1',
        'Dates changed',
        'The call for events now closes on {end_date}.',
      ]);
    });

    it('logs the queued email with the readable name of the call', async () => {
      const client = { query: vi.fn().mockResolvedValue({ rows: [queued] }) };

      await queue_cfp_dates_updated(client as unknown as pg.PoolClient, {
        conference: { id: 'conf-1' },
        cfp: { id: 'cfp-1', cfp_type: 'events', start_date: '2024-06-01', end_date: '2024-06-20' },
        email_settings: { cfp_dates_updated_subject: 'Dates changed', cfp_dates_updated_body: 'body' },
      });

      expect(vi.mocked(logger.info)).toHaveBeenCalledWith(
        'cfp dates updated notification queued',
        expect.objectContaining({ cfp_type: 'events', cfp_label: 'Call for Events' })
      );
    });
  });

  describe('list_pending_notifications', () => {
    it('returns only undelivered rows for the conference', async () => {
      mock_query.mockResolvedValueOnce(rows([queued]));

      const result = await list_pending_notifications('conf-1');

      expect(result).toEqual([queued]);
      const [sql, params] = mock_query.mock.calls[0];
      expect(sql).toContain('WHERE conference_id = $1 AND delivered_at IS NULL');
      expect(sql).toContain('LIMIT $2');
      expect(params).toEqual(['conf-1', 50]);
    });

    it('applies the requested limit', async () => {
      mock_query.mockResolvedValueOnce(rows([]));

      expect(await list_pending_notifications('conf-1', 10)).toEqual([]);
      expect(mock_query.mock.calls[0][1]).toEqual(['conf-1', 10]);
    });
  });
});
