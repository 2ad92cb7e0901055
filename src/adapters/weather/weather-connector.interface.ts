import { Result } from '../../types/result.types';
import { ConnectionCheck } from '../http/rest-connector';

/**
 * Connector for the weather service.
 */
export interface IWeatherConnector {
  /**
   * Raw weather along a route, including the forecast: one object or a list of samples.
   */
  getRouteWeather(routeId: string): Promise<Result<unknown>>;
  checkConnection(): Promise<ConnectionCheck>;
}
