import { randomUUID } from 'crypto';
import { inject, injectable } from 'tsyringe';
import { ICacheStore } from '../adapters/cache/cache-store.interface';
import { IInventoryConnector } from '../adapters/inventory/inventory-connector.interface';
import { IDecisionLog } from '../adapters/persistence/decision-log.interface';
import { ITransportConnector } from '../adapters/transport/transport-connector.interface';
import { IWeatherConnector } from '../adapters/weather/weather-connector.interface';
import { AppConfig } from '../config/app.config';
import {
  Decision,
  decisionReason,
  decisionSubject,
  DecisionOutcome,
  InventoryTransferDecision,
  RerouteDecision,
  ScheduleAdjustmentDecision
} from '../types/decision.types';
import {
  ACTIVE_STATUSES,
  RouteStatus,
  Shipment,
  ShipmentStatus,
  Warehouse
} from '../types/domain.types';
import { isSuccess, Result } from '../types/result.types';
import { AgentSnapshot, AgentSnapshotSchema } from '../types/state.types';
import { createLogger, errorMessage } from '../utils/logger';
import { IDataNormalizer } from './data-normalizer.interface';
import { IDecisionEngine } from './decision-engine.interface';
import {
  AgentState,
  AgentStatus,
  CycleReport,
  CycleTask,
  ILogisticsAgent
} from './logistics-agent.interface';
import { INotificationService } from './notification.interface';

const logger = createLogger('Core Agent');

const TASK_ERRORS: Record<CycleTask, { type: string; action: string }> = {
  inventory: { type: 'inventory_check_error', action: 'check inventory' },
  shipments: { type: 'shipment_monitor_error', action: 'monitor shipments' },
  routes: { type: 'route_update_error', action: 'update route conditions' },
  optimization: { type: 'optimization_error', action: 'optimize logistics' }
};

function unwrap<T>(result: Result<T>, action: string): T {
  if (isSuccess(result)) return result.data;
  throw new Error(`Could not ${action}: ${result.message}`);
}

@injectable()
export class LogisticsAgentService implements ILogisticsAgent {
  private warehouses: Record<string, Warehouse> = {};
  private shipments: Record<string, Shipment> = {};
  private routes: Record<string, RouteStatus> = {};
  private lastRuns: AgentSnapshot['lastRuns'] = {};

  private running = false;
  private cycles = 0;
  private lastCycleAt?: Date;
  private inFlight?: Promise<CycleReport>;
  private wake?: () => void;

  constructor(
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('IInventoryConnector') private readonly inventory: IInventoryConnector,
    @inject('ITransportConnector') private readonly transport: ITransportConnector,
    @inject('IWeatherConnector') private readonly weather: IWeatherConnector,
    @inject('IDataNormalizer') private readonly normalizer: IDataNormalizer,
    @inject('IDecisionEngine') private readonly engine: IDecisionEngine,
    @inject('INotificationService') private readonly notifications: INotificationService,
    @inject('ICacheStore') private readonly cache: ICacheStore,
    @inject('IDecisionLog') private readonly decisionLog: IDecisionLog
  ) {}

  private get stateKey(): string {
    return `agent:state:${this.config.agentName}`;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    await this.restoreState();

    logger.info(`${this.config.agentName} started; cycle every ${this.config.intervals.mainLoopSeconds}s`);
    while (this.running) {
      try {
        await this.runCycle(new Date());
      } catch (error) {
        logger.error(`Cycle aborted: ${errorMessage(error)}`);
        await this.notifications.sendAlert('agent_error', `Agent error: ${errorMessage(error)}`, 'high');
      }
      if (!this.running) break;
      await this.sleep(this.config.intervals.mainLoopSeconds * 1000);
    }
    logger.info(`${this.config.agentName} stopped`);
  }

  stop(): void {
    this.running = false;
    this.wake?.();
  }

  runCycle(now: Date = new Date()): Promise<CycleReport> {
    if (!this.inFlight) {
      this.inFlight = this.executeCycle(now).finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  getStatus(): AgentStatus {
    return {
      agentName: this.config.agentName,
      running: this.running,
      cycles: this.cycles,
      lastCycleAt: this.lastCycleAt,
      warehouses: Object.keys(this.warehouses).length,
      activeShipments: Object.keys(this.shipments).length,
      monitoredRoutes: Object.keys(this.routes).length,
      disruptedRoutes: Object.values(this.routes).filter(r => r.isDisrupted).map(r => r.routeId),
      lastRuns: { ...this.lastRuns },
      optimizationEnabled: this.config.optimizationEnabled
    };
  }

  getState(): AgentState {
    return { warehouses: this.warehouses, shipments: this.shipments, routes: this.routes };
  }

  private async executeCycle(now: Date): Promise<CycleReport> {
    const report: CycleReport = { startedAt: now, completed: [], failed: [] };
    const { inventorySeconds, shipmentSeconds, weatherSeconds } = this.config.intervals;

    if (this.isDue(this.lastRuns.inventory, inventorySeconds, now)) {
      this.lastRuns.inventory = now;
      await this.runTask('inventory', report, () => this.checkInventory(now));
    }
    if (this.isDue(this.lastRuns.shipments, shipmentSeconds, now)) {
      this.lastRuns.shipments = now;
      await this.runTask('shipments', report, () => this.monitorShipments(now));
    }
    if (this.isDue(this.lastRuns.routes, weatherSeconds, now)) {
      this.lastRuns.routes = now;
      await this.runTask('routes', report, () => this.updateRouteConditions(now));
    }
    if (this.config.optimizationEnabled) {
      await this.runTask('optimization', report, () => this.optimizeOperations(now));
    }

    this.cycles++;
    this.lastCycleAt = now;
    await this.saveState(now);
    return report;
  }

  private isDue(lastRun: Date | undefined, intervalSeconds: number, now: Date): boolean {
    return lastRun === undefined || now.getTime() - lastRun.getTime() >= intervalSeconds * 1000;
  }

  // A failing check is reported and the cycle moves on
  private async runTask(task: CycleTask, report: CycleReport, work: () => Promise<void>): Promise<void> {
    try {
      await work();
      report.completed.push(task);
    } catch (error) {
      report.failed.push(task);
      const { type, action } = TASK_ERRORS[task];
      logger.error(`Failed to ${action}: ${errorMessage(error)}`);
      if (await this.claim(`alert:${type}`)) {
        await this.notifications.sendAlert(type, `Failed to ${action}: ${errorMessage(error)}`, 'medium');
      }
    }
  }

  private async checkInventory(now: Date): Promise<void> {
    logger.info('Checking inventory levels across warehouses');
    const payload = unwrap(await this.inventory.getAllInventory(), 'fetch inventory');
    const inventory = this.normalizer.normalizeInventory(payload);

    for (const [warehouseId, items] of Object.entries(inventory)) {
      const warehouse = this.warehouses[warehouseId] ?? (await this.loadWarehouse(warehouseId));
      this.warehouses[warehouseId] = warehouse;
      for (const item of Object.values(items)) {
        warehouse.items[item.id] = { ...item, lastUpdated: item.lastUpdated ?? now };
      }
    }

    const capacityAlerts = await this.fresh(
      this.engine.evaluateWarehouseCapacity(this.warehouses),
      alert => `alert:capacity:${alert.warehouseId}:${alert.severity}`
    );
    if (capacityAlerts.length > 0) {
      await this.notifications.sendWarehouseCapacityAlerts(capacityAlerts);
    }

    const lowStock = this.engine.findLowStockItems(this.warehouses);
    for (const alert of lowStock) {
      logger.warn(
        `${alert.itemName} in ${alert.warehouseName} is below threshold (${alert.quantity}/${alert.minThreshold} ${alert.unit})`
      );
    }
    for (const decision of this.engine.evaluateReplenishment(lowStock, this.warehouses)) {
      await this.executeTransfer(decision, now);
    }

    const stockAlerts = await this.fresh(lowStock, alert => `alert:stock:${alert.warehouseId}:${alert.itemId}`);
    await this.notifications.sendInventoryAlerts(stockAlerts);
  }

  private async loadWarehouse(warehouseId: string): Promise<Warehouse> {
    const result = await this.inventory.getWarehouseInfo(warehouseId);
    if (isSuccess(result)) {
      return { id: warehouseId, ...result.data, items: {} };
    }
    logger.warn(`No details for warehouse ${warehouseId}, capacity unknown: ${result.message}`);
    return { id: warehouseId, name: `Warehouse ${warehouseId}`, location: 'Unknown', capacity: 0, items: {} };
  }

  private async monitorShipments(now: Date): Promise<void> {
    logger.info('Monitoring active shipments');
    const payload = unwrap(await this.transport.getActiveShipments(), 'fetch active shipments');
    const incoming = this.normalizer.normalizeShipments(payload, now);

    for (const update of Object.values(incoming)) {
      const known = this.shipments[update.id];
      if (known) {
        known.status = update.status;
        known.routeId = update.routeId;
        known.estimatedArrival = update.estimatedArrival;
        known.lastUpdated = now;
        if (update.status === ShipmentStatus.DELIVERED) {
          known.actualArrival = update.actualArrival ?? now;
        }
      } else if (ACTIVE_STATUSES.has(update.status)) {
        // Finished shipments never seen active are not ours to complete
        this.shipments[update.id] = { ...update, lastUpdated: now };
      }
    }

    for (const shipment of Object.values(this.shipments)) {
      if (incoming[shipment.id] && ACTIVE_STATUSES.has(shipment.status)) continue;
      delete this.shipments[shipment.id];
      await this.completeShipment(shipment, now);
    }

    const issues = this.engine.findShipmentIssues(this.shipments, now);
    if (issues.length === 0) return;

    for (const issue of issues) {
      logger.warn(
        `Shipment ${issue.shipmentId} is delayed by ${(issue.delaySeconds / 60).toFixed(1)} minutes, priority ${issue.priority}`
      );
      const shipment = this.shipments[issue.shipmentId];
      const reason = shipment ? this.engine.rerouteReason(shipment, issue, this.routes) : undefined;
      if (!shipment || !reason) continue;

      const alternatives = await this.transport.getAlternativeRoutes(shipment.origin, shipment.destination);
      if (!isSuccess(alternatives)) {
        logger.error(`Cannot reroute shipment ${shipment.id}: ${alternatives.message}`);
        continue;
      }
      const decision = this.engine.planReroute(shipment, issue, reason, alternatives.data, this.routes);
      if (decision) {
        await this.executeReroute(decision, now);
      }
    }

    const fresh = await this.fresh(issues, issue => `alert:shipment:${issue.shipmentId}`);
    await this.notifications.sendShipmentAlerts(fresh);
  }

  private async completeShipment(shipment: Shipment, now: Date): Promise<void> {
    logger.info(`Shipment ${shipment.id} completed with status ${shipment.status}`);

    const destination = this.warehouses[shipment.destination];
    if (shipment.status === ShipmentStatus.DELIVERED && destination) {
      for (const item of shipment.items) {
        const stocked = destination.items[item.id];
        if (!stocked) continue;
        stocked.quantity += item.quantity;
        stocked.lastUpdated = now;
        logger.info(`Added ${item.quantity} of ${item.id} to warehouse ${destination.id}`);
      }
    }

    await this.notifications.sendShipmentUpdate(
      shipment.id,
      shipment.status,
      `Shipment ${shipment.id} has been ${shipment.status}`,
      {
        origin: shipment.origin,
        destination: shipment.destination,
        items: shipment.items,
        completedAt: now.toISOString()
      }
    );
  }

  private async updateRouteConditions(now: Date): Promise<void> {
    const routeIds = new Set(
      Object.values(this.shipments)
        .map(shipment => shipment.routeId)
        .filter(routeId => routeId.length > 0)
    );
    logger.info(`Updating conditions for ${routeIds.size} routes`);

    for (const routeId of Object.keys(this.routes)) {
      if (!routeIds.has(routeId)) delete this.routes[routeId];
    }

    const failures: string[] = [];
    for (const routeId of routeIds) {
      const weather = await this.weather.getRouteWeather(routeId);
      const road = await this.transport.getRoadConditions(routeId);
      if (!isSuccess(weather) || !isSuccess(road)) {
        failures.push(`${routeId}: ${isSuccess(weather) ? road.message : weather.message}`);
        continue;
      }

      const conditions = this.normalizer.normalizeRouteConditions(weather.data, road.data);
      const previous = this.routes[routeId];
      const status = this.engine.assessRoute(routeId, conditions.weather, conditions.road, now);
      this.routes[routeId] = status;

      if (status.isDisrupted) {
        logger.warn(`Route ${routeId} is disrupted: ${status.disruptionReason}`);
        if (await this.claim(`alert:route:${routeId}`)) {
          await this.notifications.sendRouteAlert(
            routeId,
            'disrupted',
            `Route ${routeId} is currently disrupted (${status.disruptionReason})`,
            { reason: status.disruptionReason, weather: status.weather, road: status.road }
          );
        }
      } else if (previous?.isDisrupted) {
        await this.notifications.sendRouteAlert(routeId, 'restored', `Route ${routeId} is no longer disrupted`, {
          weather: status.weather,
          road: status.road
        });
      }
    }

    if (failures.length > 0) {
      throw new Error(`No conditions for ${failures.length} of ${routeIds.size} routes (${failures.join('; ')})`);
    }
  }

  private async optimizeOperations(now: Date): Promise<void> {
    logger.debug('Running logistics optimization');

    for (const decision of this.engine.balanceInventory(this.warehouses)) {
      await this.executeTransfer(decision, now);
    }

    const adjustments = this.engine.optimizeSchedules(this.shipments);
    let adjusted = 0;
    for (const decision of adjustments) {
      if (await this.executeScheduleAdjustment(decision, now)) adjusted++;
    }
    if (adjusted > 0) {
      await this.notifications.sendLogisticsUpdate(
        'schedules_adjusted',
        `Schedules adjusted for ${adjusted}/${adjustments.length} shipments`,
        { shipmentIds: adjustments.map(d => d.shipmentId), adjusted }
      );
    }
  }

  private async executeReroute(decision: RerouteDecision, now: Date): Promise<void> {
    if (!(await this.claim(`decision:reroute:${decision.shipmentId}`))) return;

    logger.info(`Rerouting shipment ${decision.shipmentId} to ${decision.newRouteId}`);
    const result = await this.transport.updateRoute(decision.shipmentId, decision.newRouteId, decision.reason);
    if (!result.success) {
      await this.recordDecision(decision, 'failed', now, { error: result.message });
      await this.notifications.sendAlert(
        'reroute_failure',
        `Failed to reroute shipment ${decision.shipmentId}: ${result.message}`,
        'high'
      );
      return;
    }

    const shipment = this.shipments[decision.shipmentId];
    if (shipment) {
      shipment.routeId = decision.newRouteId;
      shipment.status = ShipmentStatus.REROUTING;
      shipment.estimatedArrival = decision.estimatedArrival;
      shipment.lastUpdated = now;
    }
    await this.recordDecision(decision, 'executed', now);
    await this.notifications.sendShipmentUpdate(
      decision.shipmentId,
      'rerouted',
      `Shipment ${decision.shipmentId} has been rerouted due to ${decision.reason}`,
      {
        oldRoute: decision.currentRouteId,
        newRoute: decision.newRouteId,
        reason: decision.reason,
        newEta: decision.estimatedArrival.toISOString()
      }
    );
  }

  private async executeTransfer(decision: InventoryTransferDecision, now: Date): Promise<void> {
    const key = `decision:transfer:${decision.sourceWarehouseId}:${decision.destinationWarehouseId}:${decision.itemId}`;
    if (!(await this.claim(key))) return;

    const unit = this.warehouses[decision.sourceWarehouseId]?.items[decision.itemId]?.unit ?? 'unit';
    const result = await this.inventory.createTransfer({
      sourceWarehouseId: decision.sourceWarehouseId,
      destinationWarehouseId: decision.destinationWarehouseId,
      items: [{ id: decision.itemId, quantity: decision.quantity, unit }]
    });

    if (!isSuccess(result)) {
      await this.recordDecision(decision, 'failed', now, { error: result.message });
      await this.notifications.sendAlert(
        'transfer_failure',
        `Failed to initiate inventory transfer from ${decision.sourceWarehouseId} to ${decision.destinationWarehouseId}: ${result.message}`,
        'medium'
      );
      return;
    }

    await this.recordDecision(decision, 'executed', now, { transferId: result.data });
    await this.notifications.sendInventoryUpdate(
      'transfer_initiated',
      `Inventory transfer initiated from ${decision.sourceWarehouseId} to ${decision.destinationWarehouseId}`,
      {
        transferId: result.data,
        sourceWarehouse: decision.sourceWarehouseId,
        destinationWarehouse: decision.destinationWarehouseId,
        itemId: decision.itemId,
        quantity: decision.quantity,
        unit,
        reason: decision.reason
      }
    );
  }

  private async executeScheduleAdjustment(decision: ScheduleAdjustmentDecision, now: Date): Promise<boolean> {
    if (!(await this.claim(`decision:schedule:${decision.shipmentId}`))) return false;

    const result = await this.transport.updateSchedule(decision.shipmentId, decision.schedule);
    if (!result.success) {
      logger.error(`Schedule update for shipment ${decision.shipmentId} failed: ${result.message}`);
      await this.recordDecision(decision, 'failed', now, { error: result.message });
      return false;
    }

    const shipment = this.shipments[decision.shipmentId];
    if (shipment) {
      shipment.estimatedArrival = decision.schedule.estimatedArrival;
    }
    await this.recordDecision(decision, 'executed', now);
    return true;
  }

  private async recordDecision(
    decision: Decision,
    outcome: DecisionOutcome,
    now: Date,
    extra: Record<string, unknown> = {}
  ): Promise<void> {
    try {
      await this.decisionLog.recordDecision({
        id: randomUUID(),
        kind: decision.kind,
        subjectId: decisionSubject(decision),
        reason: decisionReason(decision),
        outcome,
        details: { ...decision, ...extra },
        createdAt: now
      });
    } catch (error) {
      logger.error(`Could not record ${decision.kind} decision for ${decisionSubject(decision)}: ${errorMessage(error)}`);
    }
  }

  // Entries whose alert was not already sent within the cooldown
  private async fresh<T>(entries: T[], keyOf: (entry: T) => string): Promise<T[]> {
    const kept: T[] = [];
    for (const entry of entries) {
      if (await this.claim(keyOf(entry))) kept.push(entry);
    }
    return kept;
  }

  private async claim(key: string): Promise<boolean> {
    try {
      return await this.cache.claim(key, this.config.alertCooldownSeconds);
    } catch (error) {
      logger.warn(`Cooldown check for ${key} unavailable: ${errorMessage(error)}`);
      return true;
    }
  }

  private async restoreState(): Promise<void> {
    try {
      const snapshot = await this.cache.getJson(this.stateKey, AgentSnapshotSchema);
      if (!snapshot) return;
      this.warehouses = snapshot.warehouses;
      this.shipments = snapshot.shipments;
      this.routes = snapshot.routes;
      this.lastRuns = snapshot.lastRuns;
      logger.info(
        `Restored state from ${snapshot.savedAt.toISOString()}: ${Object.keys(this.warehouses).length} warehouses, ${Object.keys(this.shipments).length} shipments`
      );
    } catch (error) {
      logger.warn(`Could not restore state: ${errorMessage(error)}`);
    }
  }

  private async saveState(now: Date): Promise<void> {
    const snapshot: AgentSnapshot = {
      warehouses: this.warehouses,
      shipments: this.shipments,
      routes: this.routes,
      lastRuns: this.lastRuns,
      savedAt: now
    };
    try {
      await this.cache.setJson(this.stateKey, snapshot);
    } catch (error) {
      logger.warn(`Could not save state: ${errorMessage(error)}`);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }
}
