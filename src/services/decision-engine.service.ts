import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../config/app.config';
import {
  ACTIVE_STATUSES,
  AlternativeRoute,
  DeliverySchedule,
  DisruptionReason,
  RoadConditions,
  RouteStatus,
  Shipment,
  ShipmentStatus,
  totalQuantity,
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
import { utcDateKey } from '../utils/datetime.util';
import { distanceKey, haversineKm } from '../utils/geo.util';
import { createLogger } from '../utils/logger';
import { IDecisionEngine } from './decision-engine.interface';

const logger = createLogger('Decision Engine');

const UNKNOWN_DISTANCE_KM = 1000;
const REPLENISH_TARGET_FACTOR = 1.5;
const URGENT_PRIORITY = 8;
const STANDARD_PRIORITY = 5;
const BALANCING_PRIORITY = 3;
const IMBALANCE_MARGIN = 0.25;
const BALANCING_SLACK = 0.15;
const DELIVERY_DAY_START_HOUR_UTC = 9;
const STAGGER_MS = 2 * 60 * 60 * 1000;
const WINDOW_MS = 30 * 60 * 1000;

interface StockLevel {
  warehouseId: string;
  ratio: number;
  range: number;
}

@injectable()
export class DecisionEngineService implements IDecisionEngine {
  constructor(
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('DistanceMatrix') private readonly distances: Map<string, number>
  ) {}

  isInventoryAlertEligible(totalQuantity: number, capacity: number): boolean {
    if (capacity <= 0) return false;
    return totalQuantity / capacity < this.config.thresholds.inventoryAlertRatio;
  }

  isRerouteEligible(delaySeconds: number): boolean {
    return delaySeconds > this.config.thresholds.rerouteDelaySeconds;
  }

  evaluateWarehouseCapacity(warehouses: Record<string, Warehouse>): WarehouseCapacityAlert[] {
    const alerts: WarehouseCapacityAlert[] = [];
    for (const warehouse of Object.values(warehouses)) {
      const total = totalQuantity(warehouse);
      if (!this.isInventoryAlertEligible(total, warehouse.capacity)) continue;

      alerts.push({
        warehouseId: warehouse.id,
        warehouseName: warehouse.name,
        totalQuantity: total,
        capacity: warehouse.capacity,
        fillRatio: total / warehouse.capacity,
        threshold: this.config.thresholds.inventoryAlertRatio,
        severity: total === 0 ? 'high' : 'medium'
      });
    }
    return alerts;
  }

  findLowStockItems(warehouses: Record<string, Warehouse>): InventoryAlert[] {
    const alerts: InventoryAlert[] = [];
    for (const warehouse of Object.values(warehouses)) {
      for (const item of Object.values(warehouse.items)) {
        if (item.quantity >= item.minThreshold) continue;
        alerts.push({
          warehouseId: warehouse.id,
          warehouseName: warehouse.name,
          itemId: item.id,
          itemName: item.name || item.id,
          quantity: item.quantity,
          minThreshold: item.minThreshold,
          unit: item.unit,
          severity: item.quantity === 0 ? 'high' : 'medium'
        });
      }
    }
    return alerts;
  }

  evaluateReplenishment(
    alerts: InventoryAlert[],
    warehouses: Record<string, Warehouse>
  ): InventoryTransferDecision[] {
    const decisions: InventoryTransferDecision[] = [];

    for (const alert of alerts) {
      const sources = Object.values(warehouses)
        .filter(warehouse => warehouse.id !== alert.warehouseId)
        .flatMap(warehouse => {
          const item = warehouse.items[alert.itemId];
          const excess = item ? item.quantity - item.minThreshold : 0;
          return excess > 0
            ? [{ warehouseId: warehouse.id, excess, distance: this.distanceBetween(warehouse.id, alert.warehouseId, warehouses) }]
            : [];
        })
        .sort((a, b) => a.distance - b.distance || b.excess - a.excess);

      const best = sources[0];
      if (!best) {
        logger.info(`No warehouse can supply ${alert.itemId} to ${alert.warehouseId}; needs an external supplier`);
        continue;
      }

      const wanted = Math.ceil(alert.minThreshold * REPLENISH_TARGET_FACTOR) - alert.quantity;
      const quantity = Math.min(wanted, best.excess);
      if (quantity <= 0) continue;

      decisions.push({
        kind: 'inventory_transfer',
        sourceWarehouseId: best.warehouseId,
        destinationWarehouseId: alert.warehouseId,
        itemId: alert.itemId,
        quantity,
        priority: alert.severity === 'high' ? URGENT_PRIORITY : STANDARD_PRIORITY,
        reason: 'low_stock'
      });
      logger.info(`Transfer ${quantity} ${alert.unit} of ${alert.itemId} from ${best.warehouseId} to ${alert.warehouseId}`);
    }

    return decisions;
  }

  findShipmentIssues(shipments: Record<string, Shipment>, now: Date): ShipmentIssue[] {
    const issues: ShipmentIssue[] = [];
    for (const shipment of Object.values(shipments)) {
      if (!ACTIVE_STATUSES.has(shipment.status)) continue;
      // Already being handled
      if (shipment.status === ShipmentStatus.REROUTING || shipment.status === ShipmentStatus.ON_HOLD) continue;
      if (!shipment.estimatedArrival || shipment.estimatedArrival.getTime() >= now.getTime()) continue;

      issues.push({
        shipmentId: shipment.id,
        origin: shipment.origin,
        destination: shipment.destination,
        routeId: shipment.routeId,
        priority: shipment.priority,
        delaySeconds: (now.getTime() - shipment.estimatedArrival.getTime()) / 1000,
        severity: shipment.priority >= URGENT_PRIORITY ? 'high' : 'medium'
      });
    }
    return issues;
  }

  rerouteReason(
    shipment: Shipment,
    issue: ShipmentIssue,
    routes: Record<string, RouteStatus>
  ): RerouteReason | undefined {
    if (routes[shipment.routeId]?.isDisrupted) return 'route_disruption';
    if (this.isRerouteEligible(issue.delaySeconds)) return 'significant_delay';
    return undefined;
  }

  selectBestRoute(
    alternatives: AlternativeRoute[],
    currentRouteId: string,
    priority: number,
    routes: Record<string, RouteStatus>
  ): AlternativeRoute | undefined {
    const candidates = alternatives.filter(route => route.routeId !== currentRouteId);
    const usable = candidates.filter(route => !routes[route.routeId]?.isDisrupted);
    const pool = usable.length > 0 ? usable : candidates;

    const byDuration = (a: AlternativeRoute, b: AlternativeRoute): number =>
      a.estimatedDurationHours - b.estimatedDurationHours;
    const byFuel = (a: AlternativeRoute, b: AlternativeRoute): number =>
      a.fuelConsumptionLiters - b.fuelConsumptionLiters;

    // Urgent shipments go fastest, low priority ones cheapest
    const compare =
      priority >= URGENT_PRIORITY
        ? byDuration
        : priority >= STANDARD_PRIORITY
          ? (a: AlternativeRoute, b: AlternativeRoute) => byDuration(a, b) || byFuel(a, b)
          : byFuel;

    return [...pool].sort(compare)[0];
  }

  planReroute(
    shipment: Shipment,
    issue: ShipmentIssue,
    reason: RerouteReason,
    alternatives: AlternativeRoute[],
    routes: Record<string, RouteStatus>
  ): RerouteDecision | undefined {
    const best = this.selectBestRoute(alternatives, shipment.routeId, shipment.priority, routes);
    if (!best) {
      logger.warn(`No alternative routes for shipment ${shipment.id}; cannot reroute despite ${reason}`);
      return undefined;
    }

    logger.info(`Reroute shipment ${shipment.id} from ${shipment.routeId} to ${best.routeId} (${reason})`);
    return {
      kind: 'reroute',
      shipmentId: shipment.id,
      currentRouteId: shipment.routeId,
      newRouteId: best.routeId,
      reason,
      delaySeconds: issue.delaySeconds,
      estimatedArrival: best.estimatedArrival
    };
  }

  determineDisruption(weather: WeatherConditions, road: RoadConditions): DisruptionReason | undefined {
    const { minVisibilityMeters, maxWindSpeedKmh } = this.config.thresholds;
    if (weather.severeWeather) return 'severe_weather';
    if (weather.visibilityMeters < minVisibilityMeters) return 'low_visibility';
    if (weather.windSpeedKmh > maxWindSpeedKmh) return 'high_winds';
    if (road.closed) return 'road_closed';
    if (road.severeDamage) return 'road_damage';
    if (road.flooding) return 'flooding';
    return undefined;
  }

  assessRoute(routeId: string, weather: WeatherConditions, road: RoadConditions, now: Date): RouteStatus {
    const disruptionReason = this.determineDisruption(weather, road);
    return {
      routeId,
      weather,
      road,
      isDisrupted: disruptionReason !== undefined,
      disruptionReason,
      lastUpdated: now
    };
  }

  balanceInventory(warehouses: Record<string, Warehouse>): InventoryTransferDecision[] {
    const decisions: InventoryTransferDecision[] = [];

    for (const [itemId, levels] of this.stockLevelsByItem(warehouses)) {
      if (levels.length === 0) continue;
      const mean = levels.reduce((sum, level) => sum + level.ratio, 0) / levels.length;

      const excess = new Map<string, number>();
      const deficits: Array<[string, number]> = [];
      for (const { warehouseId, ratio, range } of levels) {
        if (ratio > mean + IMBALANCE_MARGIN) {
          const amount = Math.trunc((ratio - mean - BALANCING_SLACK) * range);
          if (amount > 0) excess.set(warehouseId, amount);
        } else if (ratio < mean - IMBALANCE_MARGIN) {
          const amount = Math.trunc((mean - BALANCING_SLACK - ratio) * range);
          if (amount > 0) deficits.push([warehouseId, amount]);
        }
      }

      for (const [destinationId, deficit] of deficits) {
        let sourceId: string | undefined;
        let nearest = Infinity;
        for (const [candidateId, remaining] of excess) {
          if (remaining <= 0) continue;
          const distance = this.distanceBetween(candidateId, destinationId, warehouses);
          if (distance < nearest) {
            sourceId = candidateId;
            nearest = distance;
          }
        }
        if (sourceId === undefined) continue;

        const available = excess.get(sourceId) ?? 0;
        const quantity = Math.min(available, deficit);
        excess.set(sourceId, available - quantity);

        decisions.push({
          kind: 'inventory_transfer',
          sourceWarehouseId: sourceId,
          destinationWarehouseId: destinationId,
          itemId,
          quantity,
          priority: BALANCING_PRIORITY,
          reason: 'inventory_balancing'
        });
        logger.info(`Balance ${quantity} of ${itemId} from ${sourceId} to ${destinationId}`);
      }
    }

    return decisions;
  }

  optimizeSchedules(shipments: Record<string, Shipment>): ScheduleAdjustmentDecision[] {
    const groups = new Map<string, Array<Shipment & { estimatedArrival: Date }>>();
    for (const shipment of Object.values(shipments)) {
      const eta = shipment.estimatedArrival;
      if (!eta || !ACTIVE_STATUSES.has(shipment.status)) continue;
      const key = `${shipment.destination}|${utcDateKey(eta)}`;
      const group = groups.get(key) ?? [];
      group.push({ ...shipment, estimatedArrival: eta });
      groups.set(key, group);
    }

    const decisions: ScheduleAdjustmentDecision[] = [];
    for (const group of groups.values()) {
      if (group.length < 2) continue;

      const earliest = Math.min(...group.map(s => s.estimatedArrival.getTime()));
      const day = new Date(earliest);
      const opening = Date.UTC(day.getUTCFullYear(), day.getUTCMonth(), day.getUTCDate(), DELIVERY_DAY_START_HOUR_UTC);
      const start = Math.max(opening, earliest);

      const ordered = [...group].sort((a, b) => b.priority - a.priority);
      const adjustments = ordered.flatMap((shipment, index): ScheduleAdjustmentDecision[] => {
        const arrival = start + index * STAGGER_MS;
        if (shipment.estimatedArrival.getTime() === arrival) return [];
        const schedule: DeliverySchedule = {
          estimatedArrival: new Date(arrival),
          deliveryWindowStart: new Date(arrival - WINDOW_MS),
          deliveryWindowEnd: new Date(arrival + WINDOW_MS)
        };
        return [{ kind: 'schedule_adjustment', shipmentId: shipment.id, destination: shipment.destination, schedule }];
      });

      if (adjustments.length > 0) {
        logger.info(`Staggering ${group.length} deliveries to ${group[0].destination} on ${utcDateKey(new Date(earliest))}`);
      }
      decisions.push(...adjustments);
    }
    return decisions;
  }

  distanceBetween(fromId: string, toId: string, warehouses: Record<string, Warehouse>): number {
    if (fromId === toId) return 0;

    const known = this.distances.get(distanceKey(fromId, toId));
    if (known !== undefined) return known;

    const from = warehouses[fromId]?.coordinates;
    const to = warehouses[toId]?.coordinates;
    if (from && to) return haversineKm(from, to);

    return UNKNOWN_DISTANCE_KM;
  }

  // Fill ratio of every item stocked in two or more warehouses with a usable threshold range
  private stockLevelsByItem(warehouses: Record<string, Warehouse>): Map<string, StockLevel[]> {
    const stocked = new Map<string, number>();
    const levels = new Map<string, StockLevel[]>();

    for (const warehouse of Object.values(warehouses)) {
      for (const item of Object.values(warehouse.items)) {
        stocked.set(item.id, (stocked.get(item.id) ?? 0) + 1);
        const range = item.maxThreshold - item.minThreshold;
        if (range <= 0) continue;
        const entries = levels.get(item.id) ?? [];
        entries.push({ warehouseId: warehouse.id, ratio: (item.quantity - item.minThreshold) / range, range });
        levels.set(item.id, entries);
      }
    }

    for (const itemId of [...levels.keys()]) {
      if ((stocked.get(itemId) ?? 0) < 2) levels.delete(itemId);
    }
    return levels;
  }
}
