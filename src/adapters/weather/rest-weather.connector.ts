import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { AppConfig } from '../../config/app.config';
import { Result } from '../../types/result.types';
import { RestConnector } from '../http/rest-connector';
import { IWeatherConnector } from './weather-connector.interface';

@injectable()
export class RestWeatherConnector extends RestConnector implements IWeatherConnector {
  constructor(@inject('AppConfig') config: AppConfig) {
    super('Weather API', config.apis.weather, config);
  }

  // The weather service takes its key as a query parameter
  protected authenticate(url: URL, _headers: Record<string, string>): void {
    url.searchParams.set('key', this.credentials.apiKey);
  }

  async getRouteWeather(routeId: string): Promise<Result<unknown>> {
    const result = await this.call('GET', 'route-weather', z.unknown(), {
      query: { route_id: routeId, include_forecast: true, resolution: 'medium' }
    });
    if (!result.success) {
      this.logger.error(`Failed to retrieve weather along route ${routeId}: ${result.message}`);
    }
    return result;
  }
}
