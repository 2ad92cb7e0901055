import { DashboardChannelConfig } from '../../config/app.config';
import { HttpNotificationChannel } from './http-notification.channel';
import { OutboundEvent, serializeNotification } from './notification-channel.interface';

export class DashboardChannel extends HttpNotificationChannel {
  constructor(private readonly settings: DashboardChannelConfig) {
    super('dashboard', 'Dashboard');
  }

  accepts(_event: OutboundEvent): boolean {
    return true;
  }

  async send(event: OutboundEvent): Promise<boolean> {
    const headers: Record<string, string> = {};
    if (this.settings.apiKey) {
      headers['Authorization'] = `Bearer ${this.settings.apiKey}`;
    }
    const delivered = await this.post(this.settings.url, headers, {
      event_type: event.eventType,
      data: serializeNotification(event.notification),
      org_id: this.settings.orgId ?? null
    });
    if (delivered) {
      this.logger.debug(`Dashboard update sent: ${event.eventType}`);
    }
    return delivered;
  }
}
