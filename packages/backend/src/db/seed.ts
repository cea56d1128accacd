import { close_pool, query } from './index.js';
import { create_conference, update_email_settings } from '../services/conferences.js';
import { create_cfp } from '../services/cfps.js';
import { add_days, to_zoned_date } from '../lib/dates.js';
import { logger } from '../lib/logger.js';

// Creates a demo conference with an open call for events
async function seed_demo_conference(): Promise<void> {
  const short_title = process.env.SEED_SHORT_TITLE || 'democonf';
  const timezone = process.env.SEED_TIMEZONE || 'Europe/Berlin';

  const existing = await query<{ id: string }>('SELECT id FROM conferences WHERE short_title = $1', [short_title]);
  if (existing.rows.length > 0) {
    logger.info('Demo conference already exists, skipping seed', { short_title });
    return;
  }

  const today = to_zoned_date(new Date(), timezone);
  const context = await create_conference({
    name: 'Demo Conference',
    short_title,
    start_date: add_days(today, 60),
    end_date: add_days(today, 62),
    timezone,
  });

  await update_email_settings(context.conference.id, {
    send_on_cfp_dates_updated: true,
    cfp_dates_updated_subject: 'Call for events dates changed',
    cfp_dates_updated_body: 'The submission window of the call for events has moved.',
  });

  await create_cfp(context.conference.id, {
    cfp_type: 'events',
    start_date: add_days(today, -7),
    end_date: add_days(today, 30),
  });

  logger.info('Created demo conference', { conference_id: context.conference.id, short_title });
}

seed_demo_conference()
  .then(() => close_pool())
  .catch((err: unknown) => {
    logger.error('Seed failed', { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
