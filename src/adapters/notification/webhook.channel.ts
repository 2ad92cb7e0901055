import { WebhookChannelConfig } from '../../config/app.config';
import { HttpNotificationChannel } from './http-notification.channel';
import { OutboundEvent, serializeNotification } from './notification-channel.interface';

const ACCEPTED_STATUSES = [200, 201, 202];

export class WebhookChannel extends HttpNotificationChannel {
  constructor(
    private readonly settings: WebhookChannelConfig,
    private readonly agentName: string,
    private readonly now: () => Date = () => new Date()
  ) {
    super('webhook', 'Webhook');
  }

  accepts(_event: OutboundEvent): boolean {
    return true;
  }

  async send(event: OutboundEvent): Promise<boolean> {
    const headers: Record<string, string> = { ...this.settings.headers };
    if (this.settings.secret) {
      headers['X-Webhook-Secret'] = this.settings.secret;
    }
    return this.post(
      this.settings.url,
      headers,
      {
        event_type: event.eventType,
        data: serializeNotification(event.notification),
        agent: this.agentName,
        timestamp: this.now().toISOString()
      },
      ACCEPTED_STATUSES
    );
  }
}
