import { inject, injectable } from 'tsyringe';
import { ICacheStore } from '../adapters/cache/cache-store.interface';
import { ConnectionCheck } from '../adapters/http/rest-connector';
import { IInventoryConnector } from '../adapters/inventory/inventory-connector.interface';
import { IDecisionLog } from '../adapters/persistence/decision-log.interface';
import { ITransportConnector } from '../adapters/transport/transport-connector.interface';
import { IWeatherConnector } from '../adapters/weather/weather-connector.interface';
import { AppConfig } from '../config/app.config';
import { createLogger, errorMessage } from '../utils/logger';
import { IInstallationVerifier, VerificationCheck, VerificationReport } from './installation-verifier.interface';

const logger = createLogger('Verify');

@injectable()
export class InstallationVerifierService implements IInstallationVerifier {
  constructor(
    @inject('AppConfig') private readonly config: AppConfig,
    @inject('IInventoryConnector') private readonly inventory: IInventoryConnector,
    @inject('ITransportConnector') private readonly transport: ITransportConnector,
    @inject('IWeatherConnector') private readonly weather: IWeatherConnector,
    @inject('ICacheStore') private readonly cache: ICacheStore,
    @inject('IDecisionLog') private readonly decisionLog: IDecisionLog
  ) {}

  async verify(): Promise<VerificationReport> {
    const checks: VerificationCheck[] = [
      {
        name: 'configuration',
        ok: true,
        message: `Configuration loaded for ${this.config.agentName}`
      },
      await this.connector('inventory', () => this.inventory.checkConnection()),
      await this.connector('transport', () => this.transport.checkConnection()),
      await this.connector('weather', () => this.weather.checkConnection()),
      await this.checkCache(),
      await this.checkDatabase()
    ];

    for (const check of checks) {
      if (check.ok) {
        logger.info(`${check.name}: ${check.message}`);
      } else {
        logger.error(`${check.name}: ${check.message}`);
      }
    }
    return { ok: checks.every(check => check.ok), checks };
  }

  private async connector(name: string, check: () => Promise<ConnectionCheck>): Promise<VerificationCheck> {
    const { ok, message } = await check();
    return { name, ok, message };
  }

  private async checkCache(): Promise<VerificationCheck> {
    const redis = this.config.redis;
    if (!redis) {
      return { name: 'redis', ok: true, message: 'REDIS_HOST not set; using the in-memory cache' };
    }
    try {
      await this.cache.connect();
      const ok = await this.cache.ping();
      return {
        name: 'redis',
        ok,
        message: ok ? `Redis reachable at ${redis.host}:${redis.port}` : 'Redis did not answer PING'
      };
    } catch (error) {
      return { name: 'redis', ok: false, message: `Redis unreachable at ${redis.host}:${redis.port}: ${errorMessage(error)}` };
    }
  }

  private async checkDatabase(): Promise<VerificationCheck> {
    const database = this.config.database;
    if (!database) {
      return { name: 'postgres', ok: true, message: 'DB_HOST not set; decisions are kept in memory' };
    }
    const ok = await this.decisionLog.ping();
    return {
      name: 'postgres',
      ok,
      message: ok
        ? `PostgreSQL reachable at ${database.host}:${database.port}/${database.database}`
        : `PostgreSQL unreachable at ${database.host}:${database.port}/${database.database}`
    };
  }
}
