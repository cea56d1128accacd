import { CFP_TYPES } from '@cfp/shared';
import type { Cfp, CfpDates, CfpType, Conference, EmailSettings } from '@cfp/shared';
import { system_clock, type Clock } from '../lib/clock.js';
import { add_days, days_between, to_zoned_date } from '../lib/dates.js';

export type CfpField = 'cfp_type' | 'start_date' | 'end_date';

export type CfpErrorReason =
  | 'blank'
  | 'inclusion'
  | 'taken'
  | 'after_conference_end'
  | 'not_before_end_date';

export interface FieldError {
  field: CfpField;
  reason: CfpErrorReason;
}

export type ValidationResult = { valid: true } | { valid: false; errors: FieldError[] };

// The fields of a Cfp the rules look at. id is absent for a record not yet saved.
export interface CfpCandidate {
  id?: string;
  cfp_type: string;
  start_date: string;
  end_date: string;
}

export interface CfpValidationContext {
  conference: Pick<Conference, 'end_date'>;
  // Every Cfp of the owning program; the candidate itself may be among them
  program_cfps: ReadonlyArray<Pick<Cfp, 'id' | 'cfp_type'>>;
}

export function is_cfp_type(value: string): value is CfpType {
  return CFP_TYPES.some((type) => type === value);
}

function validate_cfp_type(cfp: CfpCandidate, context: CfpValidationContext, errors: FieldError[]): void {
  if (cfp.cfp_type.trim() === '') {
    errors.push({ field: 'cfp_type', reason: 'blank' });
    return;
  }

  if (!is_cfp_type(cfp.cfp_type)) {
    errors.push({ field: 'cfp_type', reason: 'inclusion' });
  }

  const wanted = cfp.cfp_type.toLowerCase();
  const taken = context.program_cfps.some(
    (other) => other.id !== cfp.id && other.cfp_type.toLowerCase() === wanted
  );
  if (taken) {
    errors.push({ field: 'cfp_type', reason: 'taken' });
  }
}

function before_end_of_conference(cfp: CfpCandidate, context: CfpValidationContext, errors: FieldError[]): void {
  const conference_end = context.conference.end_date;

  if (cfp.end_date > conference_end) {
    errors.push({ field: 'end_date', reason: 'after_conference_end' });
  }
  if (cfp.start_date > conference_end) {
    errors.push({ field: 'start_date', reason: 'after_conference_end' });
  }
}

// Requires start_date strictly before end_date; a one-day window ending on its start is rejected
function start_after_end_date(cfp: CfpCandidate, errors: FieldError[]): void {
  if (cfp.start_date >= cfp.end_date) {
    errors.push({ field: 'start_date', reason: 'not_before_end_date' });
  }
}

export function validate_cfp(cfp: CfpCandidate, context: CfpValidationContext): ValidationResult {
  const errors: FieldError[] = [];

  validate_cfp_type(cfp, context, errors);

  const has_start = cfp.start_date !== '';
  const has_end = cfp.end_date !== '';
  if (!has_start) {
    errors.push({ field: 'start_date', reason: 'blank' });
  }
  if (!has_end) {
    errors.push({ field: 'end_date', reason: 'blank' });
  }

  if (has_start && has_end) {
    before_end_of_conference(cfp, context, errors);
    start_after_end_date(cfp, errors);
  }

  return errors.length === 0 ? { valid: true } : { valid: false, errors };
}

function find_by_type<T extends Pick<Cfp, 'cfp_type'>>(cfps: ReadonlyArray<T>, cfp_type: CfpType): T | null {
  return cfps.find((cfp) => cfp.cfp_type === cfp_type) ?? null;
}

export function for_events<T extends Pick<Cfp, 'cfp_type'>>(cfps: ReadonlyArray<T>): T | null {
  return find_by_type(cfps, 'events');
}

export function for_tracks<T extends Pick<Cfp, 'cfp_type'>>(cfps: ReadonlyArray<T>): T | null {
  return find_by_type(cfps, 'tracks');
}

export function for_booths<T extends Pick<Cfp, 'cfp_type'>>(cfps: ReadonlyArray<T>): T | null {
  return find_by_type(cfps, 'booths');
}

export interface CfpDateChanges {
  start_date_changed: boolean;
  end_date_changed: boolean;
}

export function cfp_date_changes(previous: CfpDates, proposed: CfpDates): CfpDateChanges {
  return {
    start_date_changed: previous.start_date !== proposed.start_date,
    end_date_changed: previous.end_date !== proposed.end_date,
  };
}

/**
 * Whether saving `proposed` over `previous` should email the conference's
 * "cfp dates updated" message. Only decides; nothing is sent here.
 */
export function notify_on_cfp_date_update(
  previous: CfpDates,
  proposed: CfpDates,
  email_settings: Pick<
    EmailSettings,
    'send_on_cfp_dates_updated' | 'cfp_dates_updated_subject' | 'cfp_dates_updated_body'
  >
): boolean {
  const changes = cfp_date_changes(previous, proposed);

  return (
    (changes.start_date_changed || changes.end_date_changed) &&
    email_settings.send_on_cfp_dates_updated &&
    email_settings.cfp_dates_updated_subject.trim() !== '' &&
    email_settings.cfp_dates_updated_body.trim() !== ''
  );
}

export function conference_today(conference: Pick<Conference, 'timezone'>, clock: Clock = system_clock): string {
  return to_zoned_date(clock.now(), conference.timezone);
}

export function is_cfp_open(
  cfp: CfpDates,
  conference: Pick<Conference, 'timezone'>,
  clock: Clock = system_clock
): boolean {
  const today = conference_today(conference, clock);
  return cfp.start_date <= today && today <= cfp.end_date;
}

export function remaining_days(
  cfp: CfpDates,
  conference: Pick<Conference, 'timezone'>,
  clock: Clock = system_clock
): number {
  return Math.max(0, days_between(conference_today(conference, clock), cfp.end_date));
}

// Calendar weeks covered by the window, counting both ends
export function cfp_weeks(cfp: CfpDates): number {
  const days = days_between(cfp.start_date, add_days(cfp.end_date, 1));
  return Math.max(1, Math.ceil(days / 7));
}
