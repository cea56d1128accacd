export type NotificationKind = 'cfp_dates_updated';

export interface OutboxNotification {
  id: string;
  conference_id: string;
  cfp_id: string | null;
  kind: NotificationKind;
  subject: string;
  body: string;
  created_at: Date;
}
