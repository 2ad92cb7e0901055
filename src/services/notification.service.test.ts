import 'reflect-metadata';
import { NotificationService } from './notification.service';
import { MemoryCacheStore } from '../adapters/cache/memory-cache.store';
import { INotificationChannel, OutboundEvent } from '../adapters/notification/notification-channel.interface';
import { IDecisionLog } from '../adapters/persistence/decision-log.interface';
import { InventoryAlert, ShipmentIssue } from '../types/decision.types';
import { NotificationRecord } from '../types/notification.types';

function mockChannel(name: string, accepts: (event: OutboundEvent) => boolean): jest.Mocked<INotificationChannel> {
  return {
    name,
    accepts: jest.fn<boolean, [OutboundEvent]>(accepts),
    send: jest.fn<Promise<boolean>, [OutboundEvent]>(async () => true)
  };
}

function sentEvents(channel: jest.Mocked<INotificationChannel>): OutboundEvent[] {
  return channel.send.mock.calls.map(([event]) => event);
}

describe('NotificationService', () => {
  let dashboard: jest.Mocked<INotificationChannel>;
  let sms: jest.Mocked<INotificationChannel>;
  let cache: MemoryCacheStore;
  let decisionLog: jest.Mocked<IDecisionLog>;
  let service: NotificationService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    dashboard = mockChannel('dashboard', () => true);
    sms = mockChannel('sms', event => event.smsText !== undefined);
    cache = new MemoryCacheStore();
    decisionLog = {
      initialize: jest.fn(),
      recordDecision: jest.fn(),
      recordNotification: jest.fn<Promise<void>, [NotificationRecord]>(async () => undefined),
      listDecisions: jest.fn(),
      ping: jest.fn(),
      close: jest.fn()
    };
    service = new NotificationService([dashboard, sms], cache, decisionLog);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('sendAlert', () => {
    // Test: High alerts reach every channel including SMS, and are recorded
    it('should send high alerts to all channels and record them', async () => {
      // Act
      const sent = await service.sendAlert('stock_out', 'Bolts empty', 'high', { warehouseId: 'W1' });

      // Assert
      expect(sent).toBe(true);
      expect(sentEvents(sms)[0].smsText).toBe('[HIGH] stock_out: Bolts empty');
      expect(sentEvents(dashboard)[0]).toMatchObject({
        eventType: 'alert',
        detailed: false,
        notification: {
          category: 'alert',
          type: 'stock_out',
          severity: 'high',
          message: 'Bolts empty',
          details: { warehouseId: 'W1' }
        }
      });

      const queued = await service.recentNotifications(10);
      expect(queued).toEqual([
        expect.objectContaining({ event_type: 'alert', type: 'stock_out', channels: ['dashboard', 'sms'] })
      ]);
      expect(decisionLog.recordNotification).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'stock_out', severity: 'high', channels: ['dashboard', 'sms'] })
      );
    });

    // Test: Low severity becomes a notice and skips SMS
    it('should send low severity alerts as notices without SMS', async () => {
      // Act
      await service.sendAlert('restock_soon', 'Nuts running low', 'low');

      // Assert
      expect(sms.send).not.toHaveBeenCalled();
      expect(sentEvents(dashboard)[0].notification.category).toBe('notice');
      expect(sentEvents(dashboard)[0].smsText).toBeUndefined();
    });

    // Test: A failing or throwing channel does not stop the others
    it('should report failure when a channel fails and keep delivering to the rest', async () => {
      // Arrange
      sms.send.mockRejectedValueOnce(new Error('gateway down'));

      // Act
      const sent = await service.sendAlert('stock_out', 'Bolts empty', 'high');

      // Assert
      expect(sent).toBe(false);
      expect(dashboard.send).toHaveBeenCalledTimes(1);
      expect(decisionLog.recordNotification).toHaveBeenCalledWith(
        expect.objectContaining({ channels: ['dashboard'] })
      );
    });

    // Test: Recording problems are logged, not thrown
    it('should still succeed when the decision log rejects', async () => {
      // Arrange
      decisionLog.recordNotification.mockRejectedValueOnce(new Error('db offline'));

      // Act
      const sent = await service.sendAlert('stock_out', 'Bolts empty');

      // Assert
      expect(sent).toBe(true);
      expect(console.error).toHaveBeenCalledWith('[Communication] Could not record notification stock_out: db offline');
    });
  });

  describe('sendInventoryAlerts', () => {
    const alert = (itemName: string, quantity: number, minThreshold: number, unit: string, severity: InventoryAlert['severity']): InventoryAlert => ({
      warehouseId: 'W1',
      warehouseName: 'North',
      itemId: itemName.toLowerCase(),
      itemName,
      quantity,
      minThreshold,
      unit,
      severity
    });

    // Test: Critical alerts individually, the rest grouped, then the detailed batch
    it('should send critical alerts one by one and group the rest', async () => {
      // Arrange
      const alerts = [
        alert('Bolts', 0, 50, 'box', 'high'),
        alert('Nuts', 5, 20, 'box', 'medium'),
        alert('Washers', 8, 30, 'pcs', 'medium')
      ];

      // Act
      const sent = await service.sendInventoryAlerts(alerts);

      // Assert
      expect(sent).toBe(true);
      const events = sentEvents(dashboard);
      expect(events.map(e => [e.eventType, e.notification.type, e.notification.message])).toEqual([
        ['alert', 'inventory_critical', 'CRITICAL: Inventory alert for Bolts in North: 0/50 box'],
        ['alert', 'inventory_warning', 'Inventory alert: 2 items below threshold: Nuts (5/20 box), Washers (8/30 pcs)'],
        ['inventory_alerts', 'inventory_alerts', '3 inventory alerts']
      ]);
      expect(events[2].detailed).toBe(true);
      expect(events[2].notification.severity).toBe('high');
      expect(sms.send).toHaveBeenCalledTimes(1);
    });

    // Test: Nothing to send
    it('should do nothing for an empty batch', async () => {
      expect(await service.sendInventoryAlerts([])).toBe(true);
      expect(dashboard.send).not.toHaveBeenCalled();
    });
  });

  describe('sendShipmentAlerts', () => {
    const issue = (shipmentId: string, delaySeconds: number, severity: ShipmentIssue['severity']): ShipmentIssue => ({
      shipmentId,
      origin: 'W1',
      destination: 'W2',
      routeId: 'R1',
      priority: severity === 'high' ? 9 : 5,
      delaySeconds,
      severity
    });

    // Test: Delay is reported in minutes with one decimal
    it('should format delays in minutes', async () => {
      // Act
      await service.sendShipmentAlerts([
        issue('S1', 5430, 'high'),
        issue('S2', 1800, 'medium'),
        issue('S3', 100, 'medium')
      ]);

      // Assert
      expect(sentEvents(dashboard).map(e => e.notification.message)).toEqual([
        'CRITICAL: Shipment S1 from W1 to W2 is delayed by 90.5 minutes',
        'Shipment alert: 2 shipments delayed: S2 (30.0 min), S3 (1.7 min)',
        '3 shipment alerts'
      ]);
    });
  });

  describe('sendWarehouseCapacityAlerts', () => {
    // Test: One alert per warehouse with the fill percentage
    it('should describe the fill level of each warehouse', async () => {
      // Act
      await service.sendWarehouseCapacityAlerts([
        {
          warehouseId: 'W1',
          warehouseName: 'North',
          totalQuantity: 150,
          capacity: 1000,
          fillRatio: 0.15,
          threshold: 0.2,
          severity: 'medium'
        }
      ]);

      // Assert
      expect(sentEvents(dashboard)[0].notification).toMatchObject({
        type: 'warehouse_capacity_low',
        severity: 'medium',
        message: 'Warehouse North is at 15.0% of capacity (150/1000 units)'
      });
    });
  });

  describe('sendRouteAlert', () => {
    // Test: Disruptions are high severity with SMS text
    it('should send disruptions as high severity route alerts', async () => {
      // Act
      await service.sendRouteAlert('R1', 'disrupted', 'Road closed', { reason: 'road_closed' });

      // Assert
      const [event] = sentEvents(dashboard);
      expect(event.eventType).toBe('route_alert');
      expect(event.smsText).toBe('Route R1 DISRUPTED: Road closed');
      expect(event.notification).toMatchObject({
        type: 'route_disrupted',
        severity: 'high',
        details: { routeId: 'R1', status: 'disrupted', reason: 'road_closed' }
      });
    });

    // Test: Restorations are medium severity without SMS
    it('should send restorations without SMS', async () => {
      // Act
      await service.sendRouteAlert('R1', 'restored', 'Route clear', {});

      // Assert
      expect(sentEvents(dashboard)[0].notification.severity).toBe('medium');
      expect(sms.send).not.toHaveBeenCalled();
    });
  });

  describe('updates', () => {
    // Test: Shipment updates are low severity update events
    it('should send shipment updates', async () => {
      // Act
      await service.sendShipmentUpdate('S1', 'delivered', 'Shipment S1 delivered', { destination: 'W2' });

      // Assert
      expect(sentEvents(dashboard)[0]).toMatchObject({
        eventType: 'shipment_update',
        notification: {
          category: 'update',
          type: 'shipment_delivered',
          severity: 'low',
          details: { shipmentId: 'S1', status: 'delivered', destination: 'W2' }
        }
      });
    });

    // Test: Inventory and logistics updates use their own event types
    it('should tag inventory and logistics updates', async () => {
      // Act
      await service.sendInventoryUpdate('transfer_created', 'Transfer T1 created', {});
      await service.sendLogisticsUpdate('schedule_adjusted', 'S1 rescheduled', {});

      // Assert
      expect(sentEvents(dashboard).map(e => [e.eventType, e.notification.type])).toEqual([
        ['inventory_update', 'transfer_created'],
        ['logistics_update', 'schedule_adjusted']
      ]);
    });
  });

  describe('email routing', () => {
    let email: jest.Mocked<INotificationChannel>;

    beforeEach(() => {
      email = mockChannel('email', event => event.email !== undefined);
      service = new NotificationService([email], cache, decisionLog);
    });

    // Test: Medium and high alerts are emailed, low ones are not
    it('should email alerts above low severity', async () => {
      // Act
      await service.sendAlert('stock_out', 'Bolts empty', 'high');
      await service.sendAlert('restock_soon', 'Nuts running low', 'low');

      // Assert
      const [event] = sentEvents(email);
      expect(email.send).toHaveBeenCalledTimes(1);
      expect(event.email).toEqual({
        subject: '[HIGH] stock_out Alert',
        body: `Bolts empty\n\nTimestamp: ${event.notification.timestamp.toISOString()}`
      });
    });

    // Test: Disruptions are emailed with their conditions, restorations are not
    it('should email route disruptions with weather and road conditions', async () => {
      // Act
      await service.sendRouteAlert('R1', 'disrupted', 'Road closed', {
        weather: { visibilityMeters: 150, severeWeather: true },
        road: { closed: true }
      });
      await service.sendRouteAlert('R1', 'restored', 'Route clear', {});

      // Assert
      const [event] = sentEvents(email);
      expect(email.send).toHaveBeenCalledTimes(1);
      expect(event.email?.subject).toBe('Route Alert: R1 - DISRUPTED');
      expect(event.email?.body).toBe([
        'Road closed',
        '',
        'Route: R1',
        'Status: disrupted',
        `Timestamp: ${event.notification.timestamp.toISOString()}`,
        '',
        'Weather Conditions:',
        '- visibilityMeters: 150',
        '- severeWeather: true',
        '',
        'Road Conditions:',
        '- closed: true'
      ].join('\n'));
    });

    // Test: Only delivered, cancelled and rerouted shipments are emailed
    it('should email final and rerouted shipment updates with their items', async () => {
      // Act
      await service.sendShipmentUpdate('S1', 'delivered', 'Shipment S1 delivered', {
        destination: 'W2',
        items: [{ name: 'Bolts', quantity: 5, unit: 'box' }, { id: 'x' }]
      });
      await service.sendShipmentUpdate('S2', 'in_transit', 'Shipment S2 in transit', {});

      // Assert
      const [event] = sentEvents(email);
      expect(email.send).toHaveBeenCalledTimes(1);
      expect(event.email?.subject).toBe('Shipment Update: S1 - DELIVERED');
      expect(event.email?.body).toBe([
        'Shipment S1 delivered',
        '',
        'Shipment ID: S1',
        'Status: delivered',
        `Timestamp: ${event.notification.timestamp.toISOString()}`,
        '',
        'Details:',
        '- destination: W2',
        'Items:',
        '- Bolts (5 box)',
        '- Unknown (0 units)'
      ].join('\n'));
    });
  });
});
