import { injectable } from 'tsyringe';
import { z } from 'zod';
import {
  InventoryItem,
  RoadConditions,
  Shipment,
  ShipmentStatus,
  TrafficLevel,
  WeatherConditions
} from '../types/domain.types';
import { parseDateTime } from '../utils/datetime.util';
import { createLogger } from '../utils/logger';
import {
  IDataNormalizer,
  NormalizedRouteConditions,
  WarehouseInventory
} from './data-normalizer.interface';

const logger = createLogger('Data Processing');

const IdSchema = z.union([z.string().min(1), z.number()]).transform(String);
const NumberSchema = z.coerce.number().finite();

// Zod schemas for validating connector records
const RawItemSchema = z.object({
  id: IdSchema.optional(),
  name: z.string().optional(),
  category: z.string().optional(),
  quantity: NumberSchema.optional(),
  unit: z.string().optional(),
  min_threshold: NumberSchema.optional(),
  max_threshold: NumberSchema.optional(),
  last_updated: z.unknown().optional()
});

const RawWarehouseSchema = z.object({
  id: IdSchema,
  items: z.array(z.unknown()).default([])
});

const RawShipmentSchema = z.object({
  id: IdSchema.optional(),
  origin: IdSchema.nullish(),
  destination: IdSchema.nullish(),
  status: z.string().nullish(),
  priority: NumberSchema.nullish(),
  route: IdSchema.nullish(),
  route_id: IdSchema.nullish(),
  items: z.array(z.object({
    id: IdSchema,
    name: z.string().nullish(),
    quantity: NumberSchema.nullish(),
    unit: z.string().nullish()
  })).nullish(),
  estimated_arrival: z.unknown().optional(),
  actual_arrival: z.unknown().optional(),
  last_updated: z.unknown().optional()
});

const RawWeatherSchema = z.object({
  severe_weather: z.boolean().optional(),
  visibility_meters: NumberSchema.optional(),
  wind_speed_kmh: NumberSchema.optional(),
  precipitation_mm: NumberSchema.optional(),
  temperature_c: NumberSchema.optional()
});

type RawWeather = z.infer<typeof RawWeatherSchema>;

const RawRoadSchema = z.object({
  closed: z.boolean().optional(),
  severe_damage: z.boolean().optional(),
  flooding: z.boolean().optional(),
  construction: z.boolean().optional(),
  traffic_level: z.string().optional()
});

// Thresholds used to infer severe weather when the feed does not state it
const SEVERE_VISIBILITY_METERS = 200;
const SEVERE_WIND_KMH = 80;
const SEVERE_PRECIPITATION_MM = 50;

const TRAFFIC_RANK: Record<TrafficLevel, number> = {
  light: 1,
  normal: 2,
  heavy: 3,
  severe: 4
};

const STATUS_BY_NAME = new Map<string, ShipmentStatus>(
  Object.values(ShipmentStatus).map(status => [status, status])
);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}

function toTrafficLevel(value: string | undefined): TrafficLevel {
  switch (value?.toLowerCase()) {
    case 'light':
      return 'light';
    case 'heavy':
      return 'heavy';
    case 'severe':
      return 'severe';
    default:
      return 'normal';
  }
}

/**
 * A payload side is either one reading, a list of readings, or an object
 * wrapping the list under "conditions".
 */
function toSamples(payload: unknown): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload)) {
    return Array.isArray(payload.conditions) ? payload.conditions : [payload];
  }
  return [];
}

@injectable()
export class DataNormalizerService implements IDataNormalizer {
  normalizeInventory(payload: Record<string, unknown>): WarehouseInventory {
    const normalized: WarehouseInventory = {};

    if (Array.isArray(payload.warehouses)) {
      // { warehouses: [{ id, items: [...] }] }
      for (const entry of payload.warehouses) {
        const parsed = RawWarehouseSchema.safeParse(entry);
        if (!parsed.success) {
          logger.warn(`Skipping warehouse record: ${describeIssues(parsed.error)}`);
          continue;
        }
        const items: Record<string, InventoryItem> = {};
        for (const rawItem of parsed.data.items) {
          const item = this.normalizeItem(rawItem);
          if (item) items[item.id] = item;
        }
        normalized[parsed.data.id] = items;
      }
      return normalized;
    }

    // { inventory: { warehouseId: { itemId: item } } } or the bare map
    const byWarehouse = isRecord(payload.inventory) ? payload.inventory : payload;
    for (const [warehouseId, warehouseItems] of Object.entries(byWarehouse)) {
      if (!isRecord(warehouseItems)) {
        logger.warn(`Skipping warehouse ${warehouseId}: items are not an object`);
        continue;
      }
      const items: Record<string, InventoryItem> = {};
      for (const [itemId, rawItem] of Object.entries(warehouseItems)) {
        const item = this.normalizeItem(rawItem, itemId);
        if (item) items[item.id] = item;
      }
      normalized[warehouseId] = items;
    }
    return normalized;
  }

  normalizeShipments(payload: Record<string, unknown>, now: Date): Record<string, Shipment> {
    const normalized: Record<string, Shipment> = {};

    const entries: Array<[string | undefined, unknown]> = Array.isArray(payload.shipments)
      ? payload.shipments.map((shipment): [string | undefined, unknown] => [undefined, shipment])
      : Object.entries(isRecord(payload.active_shipments) ? payload.active_shipments : payload);

    for (const [key, rawShipment] of entries) {
      const shipment = this.normalizeShipment(rawShipment, key, now);
      if (shipment) normalized[shipment.id] = shipment;
    }
    return normalized;
  }

  normalizeRouteConditions(weather: unknown, road: unknown): NormalizedRouteConditions {
    return {
      weather: this.aggregateWeather(toSamples(weather)),
      road: this.aggregateRoad(toSamples(road))
    };
  }

  private normalizeItem(raw: unknown, fallbackId?: string): InventoryItem | undefined {
    const parsed = RawItemSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Skipping inventory item${fallbackId ? ` ${fallbackId}` : ''}: ${describeIssues(parsed.error)}`);
      return undefined;
    }
    const item = parsed.data;
    const id = item.id ?? fallbackId;
    if (!id) {
      logger.warn('Skipping inventory item without id');
      return undefined;
    }

    return {
      id,
      name: item.name ?? '',
      category: item.category ?? '',
      quantity: Math.trunc(item.quantity ?? 0),
      unit: item.unit ?? 'unit',
      minThreshold: Math.trunc(item.min_threshold ?? 0),
      maxThreshold: Math.trunc(item.max_threshold ?? 1000),
      lastUpdated: parseDateTime(item.last_updated)
    };
  }

  private normalizeShipment(raw: unknown, fallbackId: string | undefined, now: Date): Shipment | undefined {
    const parsed = RawShipmentSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Skipping shipment record${fallbackId ? ` ${fallbackId}` : ''}: ${describeIssues(parsed.error)}`);
      return undefined;
    }
    const shipment = parsed.data;
    const id = shipment.id ?? fallbackId;
    if (!id) {
      logger.warn('Skipping shipment without id');
      return undefined;
    }

    const rawStatus = shipment.status ?? 'pending';
    const status = STATUS_BY_NAME.get(rawStatus.trim().toLowerCase().replace(/[\s-]+/g, '_'));
    if (!status) {
      logger.warn(`Skipping shipment ${id}: unknown status "${rawStatus}"`);
      return undefined;
    }

    const priority = Math.min(10, Math.max(1, Math.trunc(shipment.priority ?? 5)));

    return {
      id,
      origin: shipment.origin ?? '',
      destination: shipment.destination ?? '',
      items: (shipment.items ?? []).map(item => ({
        id: item.id,
        name: item.name ?? undefined,
        quantity: Math.trunc(item.quantity ?? 0),
        unit: item.unit ?? undefined
      })),
      status,
      priority,
      routeId: shipment.route || shipment.route_id || '',
      estimatedArrival: parseDateTime(shipment.estimated_arrival),
      actualArrival: parseDateTime(shipment.actual_arrival),
      lastUpdated: parseDateTime(shipment.last_updated) ?? now
    };
  }

  private aggregateWeather(samples: unknown[]): WeatherConditions {
    const readings = samples.flatMap(sample => {
      const parsed = RawWeatherSchema.safeParse(sample);
      if (!parsed.success) {
        logger.warn(`Ignoring weather reading: ${describeIssues(parsed.error)}`);
        return [];
      }
      return [parsed.data];
    });

    const values = (pick: (reading: RawWeather) => number | undefined): number[] =>
      readings.flatMap(reading => {
        const value = pick(reading);
        return value === undefined ? [] : [value];
      });

    const visibilities = values(r => r.visibility_meters);
    const winds = values(r => r.wind_speed_kmh);
    const precipitations = values(r => r.precipitation_mm);
    const temperatures = values(r => r.temperature_c);
    const severeFlags = readings.flatMap(r => (r.severe_weather === undefined ? [] : [r.severe_weather]));

    const conditions: WeatherConditions = {
      severeWeather: false,
      visibilityMeters: visibilities.length > 0 ? Math.min(...visibilities) : 10000,
      windSpeedKmh: winds.length > 0 ? Math.max(...winds) : 0,
      precipitationMm: precipitations.length > 0 ? Math.max(...precipitations) : 0,
      temperatureC: temperatures.length > 0
        ? temperatures.reduce((sum, t) => sum + t, 0) / temperatures.length
        : 20
    };

    conditions.severeWeather = severeFlags.length > 0
      ? severeFlags.some(flag => flag)
      : conditions.visibilityMeters < SEVERE_VISIBILITY_METERS ||
        conditions.windSpeedKmh > SEVERE_WIND_KMH ||
        conditions.precipitationMm > SEVERE_PRECIPITATION_MM;

    return conditions;
  }

  private aggregateRoad(samples: unknown[]): RoadConditions {
    const conditions: RoadConditions = {
      closed: false,
      severeDamage: false,
      flooding: false,
      construction: false,
      trafficLevel: samples.length > 0 ? 'light' : 'normal'
    };

    for (const sample of samples) {
      const parsed = RawRoadSchema.safeParse(sample);
      if (!parsed.success) {
        logger.warn(`Ignoring road reading: ${describeIssues(parsed.error)}`);
        continue;
      }
      const reading = parsed.data;
      conditions.closed ||= reading.closed ?? false;
      conditions.severeDamage ||= reading.severe_damage ?? false;
      conditions.flooding ||= reading.flooding ?? false;
      conditions.construction ||= reading.construction ?? false;

      const level = toTrafficLevel(reading.traffic_level);
      if (TRAFFIC_RANK[level] > TRAFFIC_RANK[conditions.trafficLevel]) {
        conditions.trafficLevel = level;
      }
    }

    return conditions;
  }
}
