import { inject, injectable, injectAll } from 'tsyringe';
import { ICacheStore } from '../adapters/cache/cache-store.interface';
import {
  EmailContent,
  INotificationChannel,
  OutboundEvent,
  serializeNotification
} from '../adapters/notification/notification-channel.interface';
import { IDecisionLog } from '../adapters/persistence/decision-log.interface';
import { InventoryAlert, Severity, ShipmentIssue, WarehouseCapacityAlert } from '../types/decision.types';
import { Notification, NotificationCategory } from '../types/notification.types';
import { createLogger, errorMessage } from '../utils/logger';
import { INotificationService, RouteAlertStatus } from './notification.interface';

const logger = createLogger('Communication');

const NOTIFICATION_QUEUE = 'notifications';
const NOTIFICATION_QUEUE_LIMIT = 500;

const SEVERITY_RANK: Record<Severity, number> = { low: 1, medium: 2, high: 3 };

function highestSeverity(severities: Severity[]): Severity {
  return severities.reduce<Severity>(
    (worst, severity) => (SEVERITY_RANK[severity] > SEVERITY_RANK[worst] ? severity : worst),
    'low'
  );
}

function bySeverity<T extends { severity: Severity }>(entries: T[]): Record<Severity, T[]> {
  return {
    high: entries.filter(e => e.severity === 'high'),
    medium: entries.filter(e => e.severity === 'medium'),
    low: entries.filter(e => e.severity === 'low')
  };
}

function stockLine(alert: InventoryAlert): string {
  return `${alert.itemName} (${alert.quantity}/${alert.minThreshold} ${alert.unit})`;
}

function delayMinutes(issue: ShipmentIssue): string {
  return (issue.delaySeconds / 60).toFixed(1);
}

// Shipment statuses worth an email to stakeholders
const EMAILED_SHIPMENT_STATUSES = new Set(['delivered', 'cancelled', 'rerouted']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatValue(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

function conditionLines(title: string, conditions: unknown): string[] {
  if (!isRecord(conditions)) return [];
  return [
    `${title}:`,
    ...Object.entries(conditions).map(([key, value]) => `- ${key}: ${formatValue(value)}`),
    ''
  ];
}

function itemLine(item: unknown): string {
  const entry: Record<string, unknown> = isRecord(item) ? item : {};
  const name = formatValue(entry.name ?? 'Unknown');
  return `- ${name} (${formatValue(entry.quantity ?? 0)} ${formatValue(entry.unit ?? 'units')})`;
}

function alertEmail(notification: Notification): EmailContent {
  return {
    subject: `[${notification.severity.toUpperCase()}] ${notification.type} Alert`,
    body: `${notification.message}\n\nTimestamp: ${notification.timestamp.toISOString()}`
  };
}

function routeEmail(routeId: string, status: RouteAlertStatus, notification: Notification, details: Record<string, unknown>): EmailContent {
  const lines = [
    notification.message,
    '',
    `Route: ${routeId}`,
    `Status: ${status}`,
    `Timestamp: ${notification.timestamp.toISOString()}`,
    '',
    ...conditionLines('Weather Conditions', details.weather),
    ...conditionLines('Road Conditions', details.road)
  ];
  return {
    subject: `Route Alert: ${routeId} - ${status.toUpperCase()}`,
    body: lines.join('\n').trimEnd()
  };
}

function shipmentEmail(shipmentId: string, status: string, notification: Notification, details: Record<string, unknown>): EmailContent {
  const detailLines = Object.entries(details).flatMap(([key, value]) =>
    key === 'items' && Array.isArray(value)
      ? ['Items:', ...value.map(itemLine)]
      : [`- ${key}: ${formatValue(value)}`]
  );
  const lines = [
    notification.message,
    '',
    `Shipment ID: ${shipmentId}`,
    `Status: ${status}`,
    `Timestamp: ${notification.timestamp.toISOString()}`,
    '',
    'Details:',
    ...detailLines
  ];
  return {
    subject: `Shipment Update: ${shipmentId} - ${status.toUpperCase()}`,
    body: lines.join('\n')
  };
}

@injectable()
export class NotificationService implements INotificationService {
  constructor(
    @injectAll('INotificationChannel') private readonly channels: INotificationChannel[],
    @inject('ICacheStore') private readonly cache: ICacheStore,
    @inject('IDecisionLog') private readonly decisionLog: IDecisionLog
  ) {}

  async sendAlert(
    type: string,
    message: string,
    severity: Severity = 'medium',
    details: Record<string, unknown> = {}
  ): Promise<boolean> {
    const category: NotificationCategory = severity === 'low' ? 'notice' : 'alert';
    const notification = this.build(category, type, severity, message, details);
    return this.dispatch({
      eventType: 'alert',
      notification,
      detailed: false,
      smsText: severity === 'high' ? `[HIGH] ${type}: ${message}` : undefined,
      email: severity === 'low' ? undefined : alertEmail(notification)
    });
  }

  async sendInventoryAlerts(alerts: InventoryAlert[]): Promise<boolean> {
    if (alerts.length === 0) return true;
    logger.info(`Sending ${alerts.length} inventory alerts`);

    const groups = bySeverity(alerts);
    const results: boolean[] = [];

    for (const alert of groups.high) {
      results.push(await this.sendAlert(
        'inventory_critical',
        `CRITICAL: Inventory alert for ${alert.itemName} in ${alert.warehouseName}: ${alert.quantity}/${alert.minThreshold} ${alert.unit}`,
        'high',
        { ...alert }
      ));
    }
    if (groups.medium.length > 0) {
      results.push(await this.sendAlert(
        'inventory_warning',
        `Inventory alert: ${groups.medium.length} items below threshold: ${groups.medium.map(stockLine).join(', ')}`,
        'medium',
        { alerts: groups.medium }
      ));
    }
    if (groups.low.length > 0) {
      results.push(await this.sendAlert(
        'inventory_notice',
        `Inventory notice: ${groups.low.length} items approaching threshold: ${groups.low.map(stockLine).join(', ')}`,
        'low',
        { alerts: groups.low }
      ));
    }

    results.push(await this.dispatchBatch('inventory_alerts', `${alerts.length} inventory alerts`, alerts));
    return results.every(Boolean);
  }

  async sendShipmentAlerts(issues: ShipmentIssue[]): Promise<boolean> {
    if (issues.length === 0) return true;
    logger.info(`Sending ${issues.length} shipment alerts`);

    const groups = bySeverity(issues);
    const results: boolean[] = [];

    for (const issue of groups.high) {
      results.push(await this.sendAlert(
        'shipment_critical',
        `CRITICAL: Shipment ${issue.shipmentId} from ${issue.origin} to ${issue.destination} is delayed by ${delayMinutes(issue)} minutes`,
        'high',
        { ...issue }
      ));
    }
    if (groups.medium.length > 0) {
      const list = groups.medium.map(i => `${i.shipmentId} (${delayMinutes(i)} min)`).join(', ');
      results.push(await this.sendAlert(
        'shipment_warning',
        `Shipment alert: ${groups.medium.length} shipments delayed: ${list}`,
        'medium',
        { issues: groups.medium }
      ));
    }
    if (groups.low.length > 0) {
      const list = groups.low.map(i => `${i.shipmentId} (${delayMinutes(i)} min)`).join(', ');
      results.push(await this.sendAlert(
        'shipment_notice',
        `Shipment notice: ${groups.low.length} shipments slightly delayed: ${list}`,
        'low',
        { issues: groups.low }
      ));
    }

    results.push(await this.dispatchBatch('shipment_alerts', `${issues.length} shipment alerts`, issues));
    return results.every(Boolean);
  }

  async sendWarehouseCapacityAlerts(alerts: WarehouseCapacityAlert[]): Promise<boolean> {
    const results: boolean[] = [];
    for (const alert of alerts) {
      results.push(await this.sendAlert(
        'warehouse_capacity_low',
        `Warehouse ${alert.warehouseName} is at ${(alert.fillRatio * 100).toFixed(1)}% of capacity (${alert.totalQuantity}/${alert.capacity} units)`,
        alert.severity,
        { ...alert }
      ));
    }
    return results.every(Boolean);
  }

  async sendRouteAlert(
    routeId: string,
    status: RouteAlertStatus,
    message: string,
    details: Record<string, unknown>
  ): Promise<boolean> {
    logger.info(`Sending route alert for ${routeId}: ${status}`);
    const severity: Severity = status === 'disrupted' ? 'high' : 'medium';
    const notification = this.build('alert', `route_${status}`, severity, message, { routeId, status, ...details });
    return this.dispatch({
      eventType: 'route_alert',
      notification,
      detailed: false,
      smsText: severity === 'high' ? `Route ${routeId} ${status.toUpperCase()}: ${message}` : undefined,
      email: severity === 'high' ? routeEmail(routeId, status, notification, details) : undefined
    });
  }

  async sendShipmentUpdate(
    shipmentId: string,
    status: string,
    message: string,
    details: Record<string, unknown>
  ): Promise<boolean> {
    const notification = this.build('update', `shipment_${status}`, 'low', message, { shipmentId, status, ...details });
    logger.debug(`Sending shipment_update: ${notification.type}`);
    return this.dispatch({
      eventType: 'shipment_update',
      notification,
      detailed: false,
      email: EMAILED_SHIPMENT_STATUSES.has(status) ? shipmentEmail(shipmentId, status, notification, details) : undefined
    });
  }

  async sendInventoryUpdate(updateType: string, message: string, details: Record<string, unknown>): Promise<boolean> {
    return this.dispatchUpdate('inventory_update', updateType, message, details);
  }

  async sendLogisticsUpdate(updateType: string, message: string, details: Record<string, unknown>): Promise<boolean> {
    return this.dispatchUpdate('logistics_update', updateType, message, details);
  }

  async recentNotifications(limit: number): Promise<unknown[]> {
    return this.cache.readQueue(NOTIFICATION_QUEUE, limit);
  }

  private build(
    category: NotificationCategory,
    type: string,
    severity: Severity,
    message: string,
    details: Record<string, unknown>
  ): Notification {
    return { category, type, severity, message, details, timestamp: new Date() };
  }

  private async dispatchUpdate(
    eventType: string,
    type: string,
    message: string,
    details: Record<string, unknown>
  ): Promise<boolean> {
    logger.debug(`Sending ${eventType}: ${type}`);
    return this.dispatch({
      eventType,
      notification: this.build('update', type, 'low', message, details),
      detailed: false
    });
  }

  // Full batch for machine consumers; human-facing channels skip it
  private async dispatchBatch(
    eventType: string,
    message: string,
    entries: Array<{ severity: Severity }>
  ): Promise<boolean> {
    const severity = highestSeverity(entries.map(e => e.severity));
    return this.dispatch({
      eventType,
      notification: this.build('alert', eventType, severity, message, { alerts: entries }),
      detailed: true
    });
  }

  private async dispatch(event: OutboundEvent): Promise<boolean> {
    const delivered: string[] = [];
    let allDelivered = true;

    for (const channel of this.channels.filter(c => c.accepts(event))) {
      let sent = false;
      try {
        sent = await channel.send(event);
      } catch (error) {
        logger.error(`Channel ${channel.name} failed for ${event.eventType}: ${errorMessage(error)}`);
      }
      if (sent) {
        delivered.push(channel.name);
      } else {
        allDelivered = false;
      }
    }

    await this.record(event, delivered);
    return allDelivered;
  }

  private async record(event: OutboundEvent, channels: string[]): Promise<void> {
    try {
      await this.cache.pushToQueue(
        NOTIFICATION_QUEUE,
        { event_type: event.eventType, ...serializeNotification(event.notification), channels },
        NOTIFICATION_QUEUE_LIMIT
      );
    } catch (error) {
      logger.error(`Could not queue notification ${event.notification.type}: ${errorMessage(error)}`);
    }

    try {
      await this.decisionLog.recordNotification({ ...event.notification, channels });
    } catch (error) {
      logger.error(`Could not record notification ${event.notification.type}: ${errorMessage(error)}`);
    }
  }
}
