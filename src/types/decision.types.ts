import { DeliverySchedule } from './domain.types';

export type Severity = 'low' | 'medium' | 'high';

export interface InventoryAlert {
  warehouseId: string;
  warehouseName: string;
  itemId: string;
  itemName: string;
  quantity: number;
  minThreshold: number;
  unit: string;
  severity: Severity;
}

export interface WarehouseCapacityAlert {
  warehouseId: string;
  warehouseName: string;
  totalQuantity: number;
  capacity: number;
  fillRatio: number;
  threshold: number;
  severity: Severity;
}

export interface ShipmentIssue {
  shipmentId: string;
  origin: string;
  destination: string;
  routeId: string;
  priority: number;
  delaySeconds: number;
  severity: Severity;
}

export type RerouteReason = 'route_disruption' | 'significant_delay';
export type TransferReason = 'low_stock' | 'inventory_balancing';

export interface RerouteDecision {
  kind: 'reroute';
  shipmentId: string;
  currentRouteId: string;
  newRouteId: string;
  reason: RerouteReason;
  delaySeconds: number;
  estimatedArrival: Date;
}

export interface InventoryTransferDecision {
  kind: 'inventory_transfer';
  sourceWarehouseId: string;
  destinationWarehouseId: string;
  itemId: string;
  quantity: number;
  priority: number;
  reason: TransferReason;
}

export interface ScheduleAdjustmentDecision {
  kind: 'schedule_adjustment';
  shipmentId: string;
  destination: string;
  schedule: DeliverySchedule;
}

export type Decision = RerouteDecision | InventoryTransferDecision | ScheduleAdjustmentDecision;

export type DecisionOutcome = 'executed' | 'failed';

/**
 * Persisted record of a decision and what happened when the agent acted on it.
 */
export interface DecisionLogEntry {
  id: string;
  kind: Decision['kind'];
  subjectId: string;
  reason: string;
  outcome: DecisionOutcome;
  details: Record<string, unknown>;
  createdAt: Date;
}

export function decisionSubject(decision: Decision): string {
  switch (decision.kind) {
    case 'reroute':
    case 'schedule_adjustment':
      return decision.shipmentId;
    case 'inventory_transfer':
      return `${decision.sourceWarehouseId}->${decision.destinationWarehouseId}:${decision.itemId}`;
  }
}

export function decisionReason(decision: Decision): string {
  switch (decision.kind) {
    case 'reroute':
    case 'inventory_transfer':
      return decision.reason;
    case 'schedule_adjustment':
      return 'schedule_optimization';
  }
}
