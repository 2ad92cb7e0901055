import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { AppConfig } from '../../config/app.config';
import { AlternativeRoute, DeliverySchedule } from '../../types/domain.types';
import { isSuccess, Result } from '../../types/result.types';
import { parseDateTime } from '../../utils/datetime.util';
import { RestConnector } from '../http/rest-connector';
import { ITransportConnector } from './transport-connector.interface';

const MAX_ALTERNATIVES = 5;

const ShipmentsPayloadSchema = z.record(z.unknown());

const AlternativeRoutesSchema = z.object({
  routes: z.array(z.object({
    route_id: z.union([z.string().min(1), z.number()]).transform(String),
    estimated_duration_hours: z.coerce.number().nonnegative(),
    estimated_arrival: z.string().optional(),
    distance_km: z.coerce.number().nonnegative().default(0),
    fuel_consumption_liters: z.coerce.number().nonnegative().default(0)
  })).default([])
});

@injectable()
export class RestTransportConnector extends RestConnector implements ITransportConnector {
  constructor(@inject('AppConfig') config: AppConfig) {
    super('Transport API', config.apis.transport, config);
  }

  protected authenticate(_url: URL, headers: Record<string, string>): void {
    headers['Authorization'] = `Bearer ${this.credentials.apiKey}`;
    if (this.credentials.apiSecret) {
      headers['X-API-Secret'] = this.credentials.apiSecret;
    }
  }

  async getActiveShipments(): Promise<Result<Record<string, unknown>>> {
    const result = await this.call('GET', 'shipments/active', ShipmentsPayloadSchema);
    if (!result.success) {
      this.logger.error(`Failed to retrieve active shipments: ${result.message}`);
    }
    return result;
  }

  async getRoadConditions(routeId: string): Promise<Result<unknown>> {
    const result = await this.call('GET', `routes/${encodeURIComponent(routeId)}/conditions`, z.unknown());
    if (!result.success) {
      this.logger.error(`Failed to retrieve road conditions for route ${routeId}: ${result.message}`);
    }
    return result;
  }

  async getAlternativeRoutes(origin: string, destination: string): Promise<Result<AlternativeRoute[]>> {
    this.logger.info(`Retrieving alternative routes from ${origin} to ${destination}`);
    const result = await this.call('GET', 'routes/alternatives', AlternativeRoutesSchema, {
      query: { origin, destination, max_alternatives: MAX_ALTERNATIVES }
    });
    if (!isSuccess(result)) {
      this.logger.error(`Failed to retrieve alternative routes: ${result.message}`);
      return { success: false, message: result.message };
    }

    const requestedAt = Date.now();
    const routes: AlternativeRoute[] = result.data.routes.map(route => ({
      routeId: route.route_id,
      estimatedDurationHours: route.estimated_duration_hours,
      // Without an explicit arrival, assume departure now
      estimatedArrival:
        parseDateTime(route.estimated_arrival) ??
        new Date(requestedAt + route.estimated_duration_hours * 3_600_000),
      distanceKm: route.distance_km,
      fuelConsumptionLiters: route.fuel_consumption_liters
    }));

    return {
      success: true,
      data: routes,
      message: `Found ${routes.length} alternative routes`
    };
  }

  async updateRoute(shipmentId: string, routeId: string, reason: string): Promise<Result<void>> {
    this.logger.info(`Updating route for shipment ${shipmentId} to ${routeId}`);
    const result = await this.execute('PUT', `shipments/${encodeURIComponent(shipmentId)}/route`, {
      body: {
        route_id: routeId,
        updated_by: this.config.agentName,
        reason
      }
    });
    if (!result.success) {
      this.logger.error(`Failed to update route for shipment ${shipmentId}: ${result.message}`);
    }
    return result;
  }

  async updateSchedule(shipmentId: string, schedule: DeliverySchedule): Promise<Result<void>> {
    this.logger.info(`Updating schedule for shipment ${shipmentId}`);
    const result = await this.execute('PUT', `shipments/${encodeURIComponent(shipmentId)}/schedule`, {
      body: {
        estimated_arrival: schedule.estimatedArrival.toISOString(),
        delivery_window_start: schedule.deliveryWindowStart.toISOString(),
        delivery_window_end: schedule.deliveryWindowEnd.toISOString(),
        updated_by: this.config.agentName,
        reason: 'schedule_optimization'
      }
    });
    if (!result.success) {
      this.logger.error(`Failed to update schedule for shipment ${shipmentId}: ${result.message}`);
    }
    return result;
  }
}
