import { Notification } from '../../types/notification.types';

export interface OutboundEvent {
  /** Event name integrations route on, e.g. "alert" or "shipment_alerts". */
  eventType: string;
  notification: Notification;
  /** Machine-oriented batch payload; skipped by human-facing channels. */
  detailed: boolean;
  /** Present only when the event warrants a text message. */
  smsText?: string;
  /** Present only when the event warrants an email. */
  email?: EmailContent;
}

export interface EmailContent {
  subject: string;
  body: string;
}

/**
 * A stakeholder-facing delivery channel.
 */
export interface INotificationChannel {
  readonly name: string;
  accepts(event: OutboundEvent): boolean;
  /**
   * @returns false when delivery failed; never throws
   */
  send(event: OutboundEvent): Promise<boolean>;
}

export function serializeNotification(notification: Notification): Record<string, unknown> {
  return {
    category: notification.category,
    type: notification.type,
    severity: notification.severity,
    message: notification.message,
    details: notification.details,
    timestamp: notification.timestamp.toISOString()
  };
}
