import { SmsChannelConfig } from '../../config/app.config';
import { HttpNotificationChannel } from './http-notification.channel';
import { OutboundEvent } from './notification-channel.interface';

export class SmsChannel extends HttpNotificationChannel {
  constructor(private readonly settings: SmsChannelConfig) {
    super('sms', 'SMS');
  }

  accepts(event: OutboundEvent): boolean {
    return event.smsText !== undefined;
  }

  async send(event: OutboundEvent): Promise<boolean> {
    if (event.smsText === undefined) {
      return false;
    }
    if (this.settings.recipients.length === 0) {
      this.logger.warn('No SMS recipients configured');
      return false;
    }

    const headers: Record<string, string> = {};
    if (this.settings.apiKey) {
      headers['Authorization'] = `Bearer ${this.settings.apiKey}`;
    }

    let delivered = 0;
    for (const recipient of this.settings.recipients) {
      const ok = await this.post(this.settings.url, headers, {
        from: this.settings.from,
        to: recipient,
        message: event.smsText
      });
      if (ok) delivered++;
    }

    this.logger.info(`SMS sent to ${delivered}/${this.settings.recipients.length} recipients`);
    return delivered === this.settings.recipients.length;
  }
}
