import { InventoryAlert, Severity, ShipmentIssue, WarehouseCapacityAlert } from '../types/decision.types';

export type RouteAlertStatus = 'disrupted' | 'restored';

/**
 * Formats agent findings into stakeholder notifications and fans them out
 * to every enabled channel. Each method resolves to true only when every
 * channel that took the notification delivered it.
 */
export interface INotificationService {
  sendAlert(
    type: string,
    message: string,
    severity?: Severity,
    details?: Record<string, unknown>
  ): Promise<boolean>;
  /** High alerts go out one by one; medium and low are grouped. */
  sendInventoryAlerts(alerts: InventoryAlert[]): Promise<boolean>;
  sendShipmentAlerts(issues: ShipmentIssue[]): Promise<boolean>;
  sendWarehouseCapacityAlerts(alerts: WarehouseCapacityAlert[]): Promise<boolean>;
  sendRouteAlert(
    routeId: string,
    status: RouteAlertStatus,
    message: string,
    details: Record<string, unknown>
  ): Promise<boolean>;
  sendShipmentUpdate(
    shipmentId: string,
    status: string,
    message: string,
    details: Record<string, unknown>
  ): Promise<boolean>;
  sendInventoryUpdate(updateType: string, message: string, details: Record<string, unknown>): Promise<boolean>;
  sendLogisticsUpdate(updateType: string, message: string, details: Record<string, unknown>): Promise<boolean>;
  /** Newest first, as queued in the cache. */
  recentNotifications(limit: number): Promise<unknown[]>;
}
