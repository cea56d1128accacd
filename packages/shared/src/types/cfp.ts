import type { CFP_TYPES } from '../constants/cfp-types.js';

export type CfpType = (typeof CFP_TYPES)[number];

export interface Cfp {
  id: string;
  program_id: string;
  cfp_type: string;
  start_date: string; // YYYY-MM-DD
  end_date: string; // YYYY-MM-DD
  description: string | null;
  created_at: Date;
  updated_at: Date;
}

// The submission window of a Cfp, before or after an edit
export interface CfpDates {
  start_date: string;
  end_date: string;
}
