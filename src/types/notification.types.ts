import { Severity } from './decision.types';

export type NotificationCategory = 'alert' | 'notice' | 'update';

export interface Notification {
  category: NotificationCategory;
  type: string;
  severity: Severity;
  message: string;
  details: Record<string, unknown>;
  timestamp: Date;
}

export interface NotificationRecord extends Notification {
  channels: string[];
}
