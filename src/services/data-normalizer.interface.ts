import { InventoryItem, RoadConditions, Shipment, WeatherConditions } from '../types/domain.types';

export type WarehouseInventory = Record<string, Record<string, InventoryItem>>;

export interface NormalizedRouteConditions {
  weather: WeatherConditions;
  road: RoadConditions;
}

/**
 * Converts connector payloads into the domain model.
 * Records that cannot be interpreted are skipped with a warning.
 */
export interface IDataNormalizer {
  /** Items keyed by warehouse id, then item id. */
  normalizeInventory(payload: Record<string, unknown>): WarehouseInventory;
  /** Shipments keyed by id. */
  normalizeShipments(payload: Record<string, unknown>, now: Date): Record<string, Shipment>;
  /**
   * Each side may be a single reading or a list of readings along the route;
   * lists collapse to their worst case.
   */
  normalizeRouteConditions(weather: unknown, road: unknown): NormalizedRouteConditions;
}
