import type pg from 'pg';
import { query, with_transaction } from '../db/index.js';
import type { Cfp, Conference, EmailSettings, Program } from '@cfp/shared';
import type { CreateConferenceInput, UpdateEmailSettingsInput } from '../schemas/cfps.js';
import { logger } from '../lib/logger.js';
import { NotFoundError } from '../lib/errors.js';

export interface ConferenceContext {
  conference: Conference;
  program: Program;
  email_settings: EmailSettings;
  cfps: Cfp[];
}

// A conference without a stored settings row sends nothing
function disabled_email_settings(conference: Conference): EmailSettings {
  return {
    conference_id: conference.id,
    send_on_cfp_dates_updated: false,
    cfp_dates_updated_subject: '',
    cfp_dates_updated_body: '',
    updated_at: conference.created_at,
  };
}

export async function get_conference(conference_id: string): Promise<Conference | null> {
  const result = await query<Conference>('SELECT * FROM conferences WHERE id = $1', [conference_id]);
  return result.rows[0] ?? null;
}

/**
 * Loads a conference together with its program, email settings and the
 * program's cfps. Returns null when the conference or its program is missing.
 */
export async function get_conference_context(conference_id: string): Promise<ConferenceContext | null> {
  const conference = await get_conference(conference_id);
  if (!conference) {
    return null;
  }

  const program_result = await query<Program>('SELECT * FROM programs WHERE conference_id = $1', [conference_id]);
  const program = program_result.rows[0];
  if (!program) {
    logger.warn('conference has no program', { conference_id });
    return null;
  }

  const [settings_result, cfps_result] = await Promise.all([
    query<EmailSettings>('SELECT * FROM email_settings WHERE conference_id = $1', [conference_id]),
    query<Cfp>('SELECT * FROM cfps WHERE program_id = $1 ORDER BY created_at ASC', [program.id]),
  ]);

  return {
    conference,
    program,
    email_settings: settings_result.rows[0] ?? disabled_email_settings(conference),
    cfps: cfps_result.rows,
  };
}

/**
 * Same as get_conference_context, read on a transaction's client. The
 * conference and its email settings are share-locked until the transaction
 * ends, so the end date and the email toggle a save was checked against
 * cannot change underneath it.
 */
export async function lock_conference_context(
  client: pg.PoolClient,
  conference_id: string
): Promise<ConferenceContext | null> {
  const conference_result = await client.query<Conference>(
    'SELECT * FROM conferences WHERE id = $1 FOR SHARE',
    [conference_id]
  );
  const conference = conference_result.rows[0];
  if (!conference) {
    return null;
  }

  const program_result = await client.query<Program>('SELECT * FROM programs WHERE conference_id = $1', [
    conference_id,
  ]);
  const program = program_result.rows[0];
  if (!program) {
    logger.warn('conference has no program', { conference_id });
    return null;
  }

  const settings_result = await client.query<EmailSettings>(
    'SELECT * FROM email_settings WHERE conference_id = $1 FOR SHARE',
    [conference_id]
  );
  const cfps_result = await client.query<Cfp>('SELECT * FROM cfps WHERE program_id = $1 ORDER BY created_at ASC', [
    program.id,
  ]);

  return {
    conference,
    program,
    email_settings: settings_result.rows[0] ?? disabled_email_settings(conference),
    cfps: cfps_result.rows,
  };
}

// A conference always comes with exactly one program and a row of email settings
export async function create_conference(input: CreateConferenceInput): Promise<ConferenceContext> {
  return with_transaction(async (client) => {
    const conference_result = await client.query<Conference>(
      `INSERT INTO conferences (name, short_title, start_date, end_date, timezone)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING *`,
      [input.name, input.short_title, input.start_date, input.end_date, input.timezone]
    );
    const conference = conference_result.rows[0];

    const program_result = await client.query<Program>(
      'INSERT INTO programs (conference_id) VALUES ($1) RETURNING *',
      [conference.id]
    );

    const settings_result = await client.query<EmailSettings>(
      'INSERT INTO email_settings (conference_id) VALUES ($1) RETURNING *',
      [conference.id]
    );

    logger.info('conference created', { conference_id: conference.id, short_title: conference.short_title });

    return {
      conference,
      program: program_result.rows[0],
      email_settings: settings_result.rows[0],
      cfps: [],
    };
  });
}

export async function update_email_settings(
  conference_id: string,
  input: UpdateEmailSettingsInput
): Promise<EmailSettings> {
  const conference = await get_conference(conference_id);
  if (!conference) {
    throw new NotFoundError('Conference not found');
  }

  const result = await query<EmailSettings>(
    `INSERT INTO email_settings (conference_id, send_on_cfp_dates_updated, cfp_dates_updated_subject, cfp_dates_updated_body)
     VALUES ($1, COALESCE($2, FALSE), COALESCE($3, ''), COALESCE($4, ''))
     ON CONFLICT (conference_id) DO UPDATE SET
       send_on_cfp_dates_updated = COALESCE($2, email_settings.send_on_cfp_dates_updated),
       cfp_dates_updated_subject = COALESCE($3, email_settings.cfp_dates_updated_subject),
       cfp_dates_updated_body = COALESCE($4, email_settings.cfp_dates_updated_body),
       updated_at = NOW()
     RETURNING *`,
    [
      conference_id,
      input.send_on_cfp_dates_updated ?? null,
      input.cfp_dates_updated_subject ?? null,
      input.cfp_dates_updated_body ?? null,
    ]
  );

  logger.info('email settings updated', { conference_id });
  return result.rows[0];
}
