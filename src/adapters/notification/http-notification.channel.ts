import { createLogger, errorMessage, Logger } from '../../utils/logger';
import { INotificationChannel, OutboundEvent } from './notification-channel.interface';

const POST_TIMEOUT_MS = 10_000;

/**
 * Channels that deliver by POSTing JSON to a stakeholder endpoint.
 * Delivery is attempted once; failures are logged and reported as false.
 */
export abstract class HttpNotificationChannel implements INotificationChannel {
  protected readonly logger: Logger;

  protected constructor(readonly name: string, component: string) {
    this.logger = createLogger(component);
  }

  abstract accepts(event: OutboundEvent): boolean;
  abstract send(event: OutboundEvent): Promise<boolean>;

  protected async post(
    url: string,
    headers: Record<string, string>,
    body: unknown,
    acceptedStatuses?: number[]
  ): Promise<boolean> {
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(POST_TIMEOUT_MS)
      });
      const delivered = acceptedStatuses ? acceptedStatuses.includes(response.status) : response.ok;
      if (!delivered) {
        this.logger.error(`Delivery to ${url} failed: HTTP ${response.status}`);
      }
      return delivered;
    } catch (error) {
      this.logger.error(`Delivery to ${url} failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
