import { AlternativeRoute, DeliverySchedule } from '../../types/domain.types';
import { Result } from '../../types/result.types';
import { ConnectionCheck } from '../http/rest-connector';

/**
 * Connector for the transportation management system.
 */
export interface ITransportConnector {
  /**
   * Raw active shipments, in whichever shape the system returns them.
   */
  getActiveShipments(): Promise<Result<Record<string, unknown>>>;
  /**
   * Raw road conditions along a route: one object or a list of samples.
   */
  getRoadConditions(routeId: string): Promise<Result<unknown>>;
  getAlternativeRoutes(origin: string, destination: string): Promise<Result<AlternativeRoute[]>>;
  updateRoute(shipmentId: string, routeId: string, reason: string): Promise<Result<void>>;
  updateSchedule(shipmentId: string, schedule: DeliverySchedule): Promise<Result<void>>;
  checkConnection(): Promise<ConnectionCheck>;
}
