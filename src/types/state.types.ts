import { z } from 'zod';
import { ShipmentStatus } from './domain.types';

// Snapshot of the agent's in-memory state as stored in the cache between runs

const InventoryItemSnapshotSchema = z.object({
  id: z.string(),
  name: z.string(),
  category: z.string(),
  quantity: z.number(),
  unit: z.string(),
  minThreshold: z.number(),
  maxThreshold: z.number(),
  lastUpdated: z.coerce.date().optional()
});

const WarehouseSnapshotSchema = z.object({
  id: z.string(),
  name: z.string(),
  location: z.string(),
  coordinates: z.object({
    latitude: z.number(),
    longitude: z.number(),
    name: z.string().optional()
  }).optional(),
  capacity: z.number(),
  items: z.record(InventoryItemSnapshotSchema)
});

const ShipmentSnapshotSchema = z.object({
  id: z.string(),
  origin: z.string(),
  destination: z.string(),
  items: z.array(z.object({
    id: z.string(),
    name: z.string().optional(),
    quantity: z.number(),
    unit: z.string().optional()
  })),
  status: z.nativeEnum(ShipmentStatus),
  priority: z.number(),
  routeId: z.string(),
  estimatedArrival: z.coerce.date().optional(),
  actualArrival: z.coerce.date().optional(),
  lastUpdated: z.coerce.date()
});

const RouteStatusSnapshotSchema = z.object({
  routeId: z.string(),
  weather: z.object({
    severeWeather: z.boolean(),
    visibilityMeters: z.number(),
    windSpeedKmh: z.number(),
    precipitationMm: z.number(),
    temperatureC: z.number()
  }),
  road: z.object({
    closed: z.boolean(),
    severeDamage: z.boolean(),
    flooding: z.boolean(),
    construction: z.boolean(),
    trafficLevel: z.enum(['light', 'normal', 'heavy', 'severe'])
  }),
  isDisrupted: z.boolean(),
  disruptionReason: z.enum([
    'severe_weather',
    'low_visibility',
    'high_winds',
    'road_closed',
    'road_damage',
    'flooding'
  ]).optional(),
  lastUpdated: z.coerce.date()
});

export const AgentSnapshotSchema = z.object({
  warehouses: z.record(WarehouseSnapshotSchema),
  shipments: z.record(ShipmentSnapshotSchema),
  routes: z.record(RouteStatusSnapshotSchema),
  lastRuns: z.object({
    inventory: z.coerce.date().optional(),
    shipments: z.coerce.date().optional(),
    routes: z.coerce.date().optional()
  }),
  savedAt: z.coerce.date()
});

export type AgentSnapshot = z.infer<typeof AgentSnapshotSchema>;
