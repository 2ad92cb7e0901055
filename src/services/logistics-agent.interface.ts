import { RouteStatus, Shipment, Warehouse } from '../types/domain.types';

export type CycleTask = 'inventory' | 'shipments' | 'routes' | 'optimization';

export interface CycleReport {
  startedAt: Date;
  completed: CycleTask[];
  failed: CycleTask[];
}

export interface AgentStatus {
  agentName: string;
  running: boolean;
  cycles: number;
  lastCycleAt?: Date;
  warehouses: number;
  activeShipments: number;
  monitoredRoutes: number;
  disruptedRoutes: string[];
  lastRuns: Partial<Record<Exclude<CycleTask, 'optimization'>, Date>>;
  optimizationEnabled: boolean;
}

export interface AgentState {
  warehouses: Readonly<Record<string, Warehouse>>;
  shipments: Readonly<Record<string, Shipment>>;
  routes: Readonly<Record<string, RouteStatus>>;
}

/**
 * The polling agent: keeps the logistics picture current and acts on it.
 */
export interface ILogisticsAgent {
  /** Restores the last snapshot and loops until stop() is called. */
  start(): Promise<void>;
  /** Ends the loop after the running cycle. */
  stop(): void;
  /**
   * Runs every check that is due at `now`. A call made while a cycle is
   * running gets that cycle's report instead of starting another.
   */
  runCycle(now?: Date): Promise<CycleReport>;
  getStatus(): AgentStatus;
}
