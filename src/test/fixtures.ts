import { AppConfig, loadConfig } from '../config/app.config';

// Shared test fixtures. Not part of the runtime tree.

export const TEST_ENV: NodeJS.ProcessEnv = {
  INVENTORY_API_URL: 'http://inventory.test/api',
  INVENTORY_API_KEY: 'inventory-key',
  INVENTORY_API_SECRET: 'test-secret',
  TRANSPORT_API_URL: 'http://transport.test/api/',
  TRANSPORT_API_KEY: 'transport-key',
  TRANSPORT_API_SECRET: 'test-secret',
  WEATHER_API_URL: 'http://weather.test/v1',
  WEATHER_API_KEY: 'weather-key',
  API_RETRY_ATTEMPTS: '3',
  API_RETRY_DELAY_SECONDS: '0',
  AGENT_NAME: 'TestAgent'
};

export function buildTestConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...overrides });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

export function errorResponse(status: number, statusText = 'Error'): Response {
  return new Response(null, { status, statusText });
}
