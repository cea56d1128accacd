import { query, with_transaction } from '../db/index.js';
import type { Cfp, CfpDates } from '@cfp/shared';
import type { CreateCfpInput, UpdateCfpInput } from '../schemas/cfps.js';
import { fixed_clock, system_clock, type Clock } from '../lib/clock.js';
import { CfpValidationError, NotFoundError, is_unique_violation } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import {
  get_conference,
  get_conference_context,
  lock_conference_context,
  type ConferenceContext,
} from './conferences.js';
import { queue_cfp_dates_updated } from './notifications.js';
import {
  cfp_weeks,
  for_booths,
  for_events,
  for_tracks,
  is_cfp_open,
  notify_on_cfp_date_update,
  remaining_days,
  validate_cfp,
  type CfpCandidate,
} from './cfp-policy.js';

export interface CfpWithConference extends Cfp {
  conference_id: string;
}

export interface ListCfpsResponse {
  cfps: Cfp[];
  for_events: Cfp | null;
  for_tracks: Cfp | null;
  for_booths: Cfp | null;
}

export interface UpdateCfpResult {
  cfp: Cfp;
  notified: boolean;
}

export interface CfpStatus {
  cfp: Cfp;
  open: boolean;
  remaining_days: number;
  weeks: number;
}

async function load_context(conference_id: string): Promise<ConferenceContext> {
  const context = await get_conference_context(conference_id);
  if (!context) {
    throw new NotFoundError('Conference not found');
  }
  return context;
}

function assert_valid(candidate: CfpCandidate, context: ConferenceContext): void {
  const result = validate_cfp(candidate, {
    conference: context.conference,
    program_cfps: context.cfps,
  });

  if (!result.valid) {
    logger.debug('cfp validation failed', { cfp_id: candidate.id, errors: result.errors });
    throw new CfpValidationError(result.errors);
  }
}

export async function list_cfps(conference_id: string): Promise<ListCfpsResponse> {
  const { cfps } = await load_context(conference_id);

  return {
    cfps,
    for_events: for_events(cfps),
    for_tracks: for_tracks(cfps),
    for_booths: for_booths(cfps),
  };
}

export async function get_cfp(id: string): Promise<CfpWithConference | null> {
  const result = await query<CfpWithConference>(
    `SELECT c.*, p.conference_id
     FROM cfps c
     JOIN programs p ON p.id = c.program_id
     WHERE c.id = $1`,
    [id]
  );
  return result.rows[0] ?? null;
}

export async function create_cfp(conference_id: string, input: CreateCfpInput): Promise<Cfp> {
  const context = await load_context(conference_id);

  assert_valid(
    { cfp_type: input.cfp_type, start_date: input.start_date, end_date: input.end_date },
    context
  );

  try {
    const result = await query<Cfp>(
      `INSERT INTO cfps (program_id, cfp_type, start_date, end_date, description)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING *`,
      [context.program.id, input.cfp_type, input.start_date, input.end_date, input.description ?? null]
    );

    const cfp = result.rows[0];
    logger.info('cfp created', { cfp_id: cfp.id, conference_id, cfp_type: cfp.cfp_type });
    return cfp;
  } catch (err) {
    // Lost a race against a concurrent insert of the same type
    if (is_unique_violation(err)) {
      throw new CfpValidationError([{ field: 'cfp_type', reason: 'taken' }]);
    }
    throw err;
  }
}

/**
 * Saves new values over a stored cfp. The stored row is locked and the
 * conference context read inside the write transaction, so validation and the
 * previous/proposed date comparison see what the update overwrites. When the
 * window moved and the dates-updated email is configured, the email is queued
 * in the same transaction.
 */
export async function update_cfp(id: string, input: UpdateCfpInput): Promise<UpdateCfpResult> {
  const log = logger.child({ cfp_id: id });

  try {
    const result = await with_transaction(async (client) => {
      const existing_result = await client.query<CfpWithConference>(
        `SELECT c.*, p.conference_id
         FROM cfps c
         JOIN programs p ON p.id = c.program_id
         WHERE c.id = $1
         FOR UPDATE OF c`,
        [id]
      );
      const existing = existing_result.rows[0];
      if (!existing) {
        throw new NotFoundError('Cfp not found');
      }

      const context = await lock_conference_context(client, existing.conference_id);
      if (!context) {
        throw new NotFoundError('Conference not found');
      }

      const previous: CfpDates = { start_date: existing.start_date, end_date: existing.end_date };
      const proposed: CfpCandidate = {
        id: existing.id,
        cfp_type: input.cfp_type ?? existing.cfp_type,
        start_date: input.start_date ?? existing.start_date,
        end_date: input.end_date ?? existing.end_date,
      };
      const description = input.description === undefined ? existing.description : input.description;

      assert_valid(proposed, context);

      const notify = notify_on_cfp_date_update(previous, proposed, context.email_settings);

      const update_result = await client.query<Cfp>(
        `UPDATE cfps
         SET cfp_type = $2, start_date = $3, end_date = $4, description = $5, updated_at = NOW()
         WHERE id = $1
         RETURNING *`,
        [id, proposed.cfp_type, proposed.start_date, proposed.end_date, description]
      );
      const updated = update_result.rows[0];

      if (notify) {
        await queue_cfp_dates_updated(client, {
          conference: context.conference,
          cfp: updated,
          email_settings: context.email_settings,
        });
      }

      return { cfp: updated, notified: notify };
    });

    log.info('cfp updated', { notified: result.notified });
    return result;
  } catch (err) {
    if (is_unique_violation(err)) {
      throw new CfpValidationError([{ field: 'cfp_type', reason: 'taken' }]);
    }
    throw err;
  }
}

export async function delete_cfp(id: string): Promise<boolean> {
  const result = await query<{ id: string }>('DELETE FROM cfps WHERE id = $1 RETURNING id', [id]);
  const deleted = result.rows.length > 0;
  if (deleted) {
    logger.info('cfp deleted', { cfp_id: id });
  }
  return deleted;
}

export async function get_cfp_status(id: string, clock: Clock = system_clock): Promise<CfpStatus> {
  const cfp = await get_cfp(id);
  if (!cfp) {
    throw new NotFoundError('Cfp not found');
  }

  const conference = await get_conference(cfp.conference_id);
  if (!conference) {
    throw new NotFoundError('Conference not found');
  }

  // One reading of the clock for every figure in the status
  const at = fixed_clock(clock.now());

  return {
    cfp,
    open: is_cfp_open(cfp, conference, at),
    remaining_days: remaining_days(cfp, conference, at),
    weeks: cfp_weeks(cfp),
  };
}
