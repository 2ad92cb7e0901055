import 'reflect-metadata';
import { container } from 'tsyringe';
import { ICacheStore } from '../adapters/cache/cache-store.interface';
import { MemoryCacheStore } from '../adapters/cache/memory-cache.store';
import { RedisCacheStore } from '../adapters/cache/redis-cache.store';
import { IInventoryConnector } from '../adapters/inventory/inventory-connector.interface';
import { RestInventoryConnector } from '../adapters/inventory/rest-inventory.connector';
import { DashboardChannel } from '../adapters/notification/dashboard.channel';
import { EmailChannel } from '../adapters/notification/email.channel';
import { LogChannel } from '../adapters/notification/log.channel';
import { INotificationChannel } from '../adapters/notification/notification-channel.interface';
import { SmsChannel } from '../adapters/notification/sms.channel';
import { WebhookChannel } from '../adapters/notification/webhook.channel';
import { IDecisionLog } from '../adapters/persistence/decision-log.interface';
import { MemoryDecisionLog } from '../adapters/persistence/memory-decision-log.adapter';
import { PostgresDecisionLog } from '../adapters/persistence/postgres-decision-log.adapter';
import { ITransportConnector } from '../adapters/transport/transport-connector.interface';
import { RestTransportConnector } from '../adapters/transport/rest-transport.connector';
import { IWeatherConnector } from '../adapters/weather/weather-connector.interface';
import { RestWeatherConnector } from '../adapters/weather/rest-weather.connector';
import { CsvProcessorService } from '../services/csv-processor.service';
import { ICsvProcessor } from '../services/csv-processor.interface';
import { DataNormalizerService } from '../services/data-normalizer.service';
import { IDataNormalizer } from '../services/data-normalizer.interface';
import { DecisionEngineService } from '../services/decision-engine.service';
import { IDecisionEngine } from '../services/decision-engine.interface';
import { InstallationVerifierService } from '../services/installation-verifier.service';
import { IInstallationVerifier } from '../services/installation-verifier.interface';
import { LogisticsAgentService } from '../services/logistics-agent.service';
import { ILogisticsAgent } from '../services/logistics-agent.interface';
import { NotificationService } from '../services/notification.service';
import { INotificationService } from '../services/notification.interface';
import { AppConfig } from './app.config';

export async function setupDI(config: AppConfig): Promise<void> {
  // Register configuration values
  container.register('AppConfig', { useValue: config });

  // Register connectors
  container.register<IInventoryConnector>('IInventoryConnector', {
    useClass: RestInventoryConnector
  });

  container.register<ITransportConnector>('ITransportConnector', {
    useClass: RestTransportConnector
  });

  container.register<IWeatherConnector>('IWeatherConnector', {
    useClass: RestWeatherConnector
  });

  // Register stores: Redis and PostgreSQL when configured, in-memory otherwise
  container.register<ICacheStore>('ICacheStore', {
    useValue: config.redis ? new RedisCacheStore(config.redis) : new MemoryCacheStore()
  });

  container.register<IDecisionLog>('IDecisionLog', {
    useValue: config.database ? new PostgresDecisionLog(config.database) : new MemoryDecisionLog()
  });

  // Register notification channels; the log channel is always on
  const channels: INotificationChannel[] = [new LogChannel()];
  const { dashboard, webhook, sms, email } = config.notifications;
  if (dashboard) channels.push(new DashboardChannel(dashboard));
  if (webhook) channels.push(new WebhookChannel(webhook, config.agentName));
  if (sms) channels.push(new SmsChannel(sms));
  if (email) channels.push(new EmailChannel(email));
  for (const channel of channels) {
    container.register<INotificationChannel>('INotificationChannel', { useValue: channel });
  }

  // Register services
  container.register<ICsvProcessor>('ICsvProcessor', {
    useClass: CsvProcessorService
  });

  const distances = config.warehouseDistancesPath
    ? await container.resolve<ICsvProcessor>('ICsvProcessor').readDistanceMatrix(config.warehouseDistancesPath)
    : new Map<string, number>();
  container.register('DistanceMatrix', { useValue: distances });

  container.register<IDataNormalizer>('IDataNormalizer', {
    useClass: DataNormalizerService
  });

  container.register<IDecisionEngine>('IDecisionEngine', {
    useClass: DecisionEngineService
  });

  container.registerSingleton<INotificationService>('INotificationService', NotificationService);

  container.registerSingleton<ILogisticsAgent>('ILogisticsAgent', LogisticsAgentService);

  container.register<IInstallationVerifier>('IInstallationVerifier', {
    useClass: InstallationVerifierService
  });
}
