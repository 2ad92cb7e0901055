import {
  AlternativeRoute,
  DisruptionReason,
  RoadConditions,
  RouteStatus,
  Shipment,
  Warehouse,
  WeatherConditions
} from '../types/domain.types';
import {
  InventoryAlert,
  InventoryTransferDecision,
  RerouteDecision,
  RerouteReason,
  ScheduleAdjustmentDecision,
  ShipmentIssue,
  WarehouseCapacityAlert
} from '../types/decision.types';

/**
 * Pure evaluation of the agent's state against the configured thresholds.
 * Nothing here performs I/O; the agent executes what comes back.
 */
export interface IDecisionEngine {
  /** True when totalQuantity is strictly below the alert ratio of a known capacity. */
  isInventoryAlertEligible(totalQuantity: number, capacity: number): boolean;
  /** True when the delay strictly exceeds the reroute threshold. */
  isRerouteEligible(delaySeconds: number): boolean;

  evaluateWarehouseCapacity(warehouses: Record<string, Warehouse>): WarehouseCapacityAlert[];
  findLowStockItems(warehouses: Record<string, Warehouse>): InventoryAlert[];
  evaluateReplenishment(
    alerts: InventoryAlert[],
    warehouses: Record<string, Warehouse>
  ): InventoryTransferDecision[];

  /** Active shipments whose estimated arrival is already behind `now`. */
  findShipmentIssues(shipments: Record<string, Shipment>, now: Date): ShipmentIssue[];
  /** Why the shipment should be rerouted, or undefined when it should not. */
  rerouteReason(
    shipment: Shipment,
    issue: ShipmentIssue,
    routes: Record<string, RouteStatus>
  ): RerouteReason | undefined;
  selectBestRoute(
    alternatives: AlternativeRoute[],
    currentRouteId: string,
    priority: number,
    routes: Record<string, RouteStatus>
  ): AlternativeRoute | undefined;
  planReroute(
    shipment: Shipment,
    issue: ShipmentIssue,
    reason: RerouteReason,
    alternatives: AlternativeRoute[],
    routes: Record<string, RouteStatus>
  ): RerouteDecision | undefined;

  determineDisruption(weather: WeatherConditions, road: RoadConditions): DisruptionReason | undefined;
  assessRoute(routeId: string, weather: WeatherConditions, road: RoadConditions, now: Date): RouteStatus;

  balanceInventory(warehouses: Record<string, Warehouse>): InventoryTransferDecision[];
  optimizeSchedules(shipments: Record<string, Shipment>): ScheduleAdjustmentDecision[];

  /** Kilometres between two warehouses. */
  distanceBetween(fromId: string, toId: string, warehouses: Record<string, Warehouse>): number;
}
