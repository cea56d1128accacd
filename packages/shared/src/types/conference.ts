export interface Conference {
  id: string;
  name: string;
  short_title: string;
  start_date: string; // YYYY-MM-DD
  end_date: string; // YYYY-MM-DD
  timezone: string; // IANA zone, e.g. 'Europe/Berlin'
  created_at: Date;
}

export interface Program {
  id: string;
  conference_id: string;
  created_at: Date;
}

export interface EmailSettings {
  conference_id: string;
  send_on_cfp_dates_updated: boolean;
  cfp_dates_updated_subject: string;
  cfp_dates_updated_body: string;
  updated_at: Date;
}
