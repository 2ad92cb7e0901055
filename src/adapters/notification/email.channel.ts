import * as nodemailer from 'nodemailer';
import { EmailChannelConfig } from '../../config/app.config';
import { createLogger, errorMessage } from '../../utils/logger';
import { INotificationChannel, OutboundEvent } from './notification-channel.interface';

const logger = createLogger('Email');

/**
 * Plain-text mail to every configured recipient over SMTP. Port 465 uses
 * implicit TLS; other ports upgrade with STARTTLS.
 */
export class EmailChannel implements INotificationChannel {
  readonly name = 'email';
  private readonly transport: nodemailer.Transporter;

  constructor(private readonly settings: EmailChannelConfig) {
    const implicitTls = settings.smtpPort === 465;
    this.transport = nodemailer.createTransport({
      host: settings.smtpHost,
      port: settings.smtpPort,
      secure: implicitTls,
      requireTLS: !implicitTls,
      auth: settings.username && settings.password
        ? { user: settings.username, pass: settings.password }
        : undefined
    });
  }

  accepts(event: OutboundEvent): boolean {
    return event.email !== undefined;
  }

  async send(event: OutboundEvent): Promise<boolean> {
    if (event.email === undefined) {
      return false;
    }
    if (this.settings.recipients.length === 0) {
      logger.warn('No email recipients configured');
      return false;
    }

    try {
      await this.transport.sendMail({
        from: this.settings.from,
        to: this.settings.recipients.join(', '),
        subject: event.email.subject,
        text: event.email.body
      });
      logger.info(`Email sent: ${event.email.subject}`);
      return true;
    } catch (error) {
      logger.error(`Failed to send email "${event.email.subject}": ${errorMessage(error)}`);
      return false;
    }
  }
}
