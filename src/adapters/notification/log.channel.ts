import { createLogger } from '../../utils/logger';
import { INotificationChannel, OutboundEvent } from './notification-channel.interface';

const logger = createLogger('Notifications');

export class LogChannel implements INotificationChannel {
  readonly name = 'log';

  accepts(event: OutboundEvent): boolean {
    return !event.detailed;
  }

  async send(event: OutboundEvent): Promise<boolean> {
    const { severity, type, message } = event.notification;
    const line = `[${severity.toUpperCase()}] ${type}: ${message}`;
    if (severity === 'high') {
      logger.warn(line);
    } else {
      logger.info(line);
    }
    return true;
  }
}
