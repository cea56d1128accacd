import type pg from 'pg';
import { CFP_TYPE_LABELS } from '@cfp/shared';
import type { Cfp, Conference, EmailSettings, OutboxNotification } from '@cfp/shared';
import { query } from '../db/index.js';
import { logger } from '../lib/logger.js';
import { is_cfp_type } from './cfp-policy.js';

export interface CfpDatesUpdatedNotification {
  conference: Pick<Conference, 'id'>;
  cfp: Pick<Cfp, 'id' | 'cfp_type' | 'start_date' | 'end_date'>;
  email_settings: Pick<EmailSettings, 'cfp_dates_updated_subject' | 'cfp_dates_updated_body'>;
}

/**
 * Queues the conference's "cfp dates updated" email in the outbox. Subject and
 * body are stored as configured; delivery happens outside this service.
 */
export async function queue_cfp_dates_updated(
  client: pg.PoolClient,
  notification: CfpDatesUpdatedNotification
): Promise<OutboxNotification> {
  const { conference, cfp, email_settings } = notification;

  const result = await client.query<OutboxNotification>(
    `INSERT INTO notification_outbox (conference_id, cfp_id, kind, subject, body)
     VALUES ($1, $2, 'cfp_dates_updated', $3, $4)
     RETURNING id, conference_id, cfp_id, kind, subject, body, created_at`,
    [conference.id, cfp.id, email_settings.cfp_dates_updated_subject, email_settings.cfp_dates_updated_body]
  );

  const queued = result.rows[0];
  logger.info('cfp dates updated notification queued', {
    notification_id: queued.id,
    conference_id: conference.id,
    cfp_id: cfp.id,
    cfp_type: cfp.cfp_type,
    cfp_label: is_cfp_type(cfp.cfp_type) ? CFP_TYPE_LABELS[cfp.cfp_type] : cfp.cfp_type,
    start_date: cfp.start_date,
    end_date: cfp.end_date,
  });

  return queued;
}

export async function list_pending_notifications(conference_id: string, limit: number = 50): Promise<OutboxNotification[]> {
  const result = await query<OutboxNotification>(
    `SELECT id, conference_id, cfp_id, kind, subject, body, created_at
     FROM notification_outbox
     WHERE conference_id = $1 AND delivered_at IS NULL
     ORDER BY created_at ASC
     LIMIT $2`,
    [conference_id, limit]
  );
  return result.rows;
}
