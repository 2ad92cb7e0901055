// Domain types - clean models isolated from external system formats

export interface GeoLocation {
  latitude: number;
  longitude: number;
  name?: string;
}

export interface InventoryItem {
  id: string;
  name: string;
  category: string;
  quantity: number;
  unit: string;
  minThreshold: number;
  maxThreshold: number;
  lastUpdated?: Date;
}

export interface Warehouse {
  id: string;
  name: string;
  location: string;
  coordinates?: GeoLocation;
  capacity: number;                      // units; 0 when unknown
  items: Record<string, InventoryItem>;  // keyed by item id
}

export enum ShipmentStatus {
  PENDING = 'pending',
  PREPARING = 'preparing',
  IN_TRANSIT = 'in_transit',
  DELAYED = 'delayed',
  REROUTING = 'rerouting',
  ON_HOLD = 'on_hold',
  DELIVERED = 'delivered',
  CANCELLED = 'cancelled'
}

export interface ShipmentItem {
  id: string;
  name?: string;
  quantity: number;
  unit?: string;
}

export interface Shipment {
  id: string;
  origin: string;
  destination: string;
  items: ShipmentItem[];
  status: ShipmentStatus;
  priority: number;  // 1-10
  routeId: string;
  estimatedArrival?: Date;
  actualArrival?: Date;
  lastUpdated: Date;
}

export interface WeatherConditions {
  severeWeather: boolean;
  visibilityMeters: number;
  windSpeedKmh: number;
  precipitationMm: number;
  temperatureC: number;
}

export type TrafficLevel = 'light' | 'normal' | 'heavy' | 'severe';

export interface RoadConditions {
  closed: boolean;
  severeDamage: boolean;
  flooding: boolean;
  construction: boolean;
  trafficLevel: TrafficLevel;
}

export type DisruptionReason =
  | 'severe_weather'
  | 'low_visibility'
  | 'high_winds'
  | 'road_closed'
  | 'road_damage'
  | 'flooding';

export interface RouteStatus {
  routeId: string;
  weather: WeatherConditions;
  road: RoadConditions;
  isDisrupted: boolean;
  disruptionReason?: DisruptionReason;
  lastUpdated: Date;
}

export interface AlternativeRoute {
  routeId: string;
  estimatedDurationHours: number;
  estimatedArrival: Date;
  distanceKm: number;
  fuelConsumptionLiters: number;
}

export interface DeliverySchedule {
  estimatedArrival: Date;
  deliveryWindowStart: Date;
  deliveryWindowEnd: Date;
}

export const ACTIVE_STATUSES: ReadonlySet<ShipmentStatus> = new Set([
  ShipmentStatus.PENDING,
  ShipmentStatus.PREPARING,
  ShipmentStatus.IN_TRANSIT,
  ShipmentStatus.DELAYED,
  ShipmentStatus.REROUTING,
  ShipmentStatus.ON_HOLD
]);

export function totalQuantity(warehouse: Warehouse): number {
  return Object.values(warehouse.items).reduce((sum, item) => sum + item.quantity, 0);
}
