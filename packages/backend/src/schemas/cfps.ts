import { z } from 'zod';
import { is_calendar_date, is_time_zone } from '../lib/dates.js';

const date_schema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format')
  .refine(is_calendar_date, 'Date is not a valid calendar date');

// cfp_type membership is checked by the cfp policy so it reports as a field error
export const create_cfp_schema = z.object({
  cfp_type: z.string(),
  start_date: date_schema,
  end_date: date_schema,
  description: z.string().max(5000).nullable().optional(),
});

export const update_cfp_schema = z.object({
  cfp_type: z.string().optional(),
  start_date: date_schema.optional(),
  end_date: date_schema.optional(),
  description: z.string().max(5000).nullable().optional(),
});

export const update_email_settings_schema = z.object({
  send_on_cfp_dates_updated: z.boolean().optional(),
  cfp_dates_updated_subject: z.string().max(500).optional(),
  cfp_dates_updated_body: z.string().max(20000).optional(),
});

export const create_conference_schema = z.object({
  name: z.string().min(1).max(200),
  short_title: z.string().min(1).max(100),
  start_date: date_schema,
  end_date: date_schema,
  timezone: z.string().refine(is_time_zone, 'Unknown time zone'),
});

export const uuid_param_schema = z.object({
  id: z.string().uuid(),
});

export const conference_param_schema = z.object({
  conference_id: z.string().uuid(),
});

export type CreateCfpInput = z.infer<typeof create_cfp_schema>;
export type UpdateCfpInput = z.infer<typeof update_cfp_schema>;
export type UpdateEmailSettingsInput = z.infer<typeof update_email_settings_schema>;
export type CreateConferenceInput = z.infer<typeof create_conference_schema>;
