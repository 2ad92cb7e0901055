import 'dotenv/config';
import { z } from 'zod';
import { LogLevel, parseLogLevel } from '../utils/logger';
import { RetryOptions } from '../utils/retry.util';

export interface ApiCredentials {
  url: string;
  apiKey: string;
  apiSecret?: string;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
}

export interface RedisConfig {
  host: string;
  port: number;
  password?: string;
}

export interface DashboardChannelConfig {
  url: string;
  apiKey?: string;
  orgId?: string;
}

export interface WebhookChannelConfig {
  url: string;
  secret?: string;
  headers: Record<string, string>;
}

export interface SmsChannelConfig {
  url: string;
  apiKey?: string;
  from: string;
  recipients: string[];
}

export interface EmailChannelConfig {
  smtpHost: string;
  smtpPort: number;
  username?: string;
  password?: string;
  from: string;
  recipients: string[];
}

export interface AppConfig {
  agentName: string;
  logLevel: LogLevel;
  /** Rotating log file written next to the console output. */
  logFile?: string;
  apis: {
    inventory: ApiCredentials;
    transport: ApiCredentials;
    weather: ApiCredentials;
  };
  http: {
    timeoutMs: number;
    retry: RetryOptions;
  };
  intervals: {
    mainLoopSeconds: number;
    inventorySeconds: number;
    shipmentSeconds: number;
    weatherSeconds: number;
  };
  thresholds: {
    rerouteDelaySeconds: number;
    inventoryAlertRatio: number;
    minVisibilityMeters: number;
    maxWindSpeedKmh: number;
  };
  alertCooldownSeconds: number;
  optimizationEnabled: boolean;
  warehouseDistancesPath?: string;
  apiPort?: number;
  database?: DatabaseConfig;
  redis?: RedisConfig;
  notifications: {
    dashboard?: DashboardChannelConfig;
    webhook?: WebhookChannelConfig;
    sms?: SmsChannelConfig;
    email?: EmailChannelConfig;
  };
}

/**
 * Raised when the environment cannot produce a usable configuration.
 * Lists every offending variable, not just the first.
 */
export class ConfigurationError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
  }
}

const HeadersSchema = z.record(z.string());

class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: NodeJS.ProcessEnv) {}

  optional(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  required(name: string, reason?: string): string {
    const value = this.optional(name);
    if (value === undefined) {
      this.problems.push(`${name} environment variable is required${reason ? ` ${reason}` : ''}`);
      return '';
    }
    return value;
  }

  integer(name: string, fallback: number, min = 0): number {
    const raw = this.optional(name);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      this.problems.push(`${name} must be an integer >= ${min} (got "${raw}")`);
      return fallback;
    }
    return value;
  }

  ratio(name: string, fallback: number): number {
    const raw = this.optional(name);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value <= 0 || value > 1) {
      this.problems.push(`${name} must be a number in (0, 1] (got "${raw}")`);
      return fallback;
    }
    return value;
  }

  flag(name: string, fallback: boolean): boolean {
    const raw = this.optional(name);
    if (raw === undefined) return fallback;
    return raw.toLowerCase() === 'true';
  }

  list(name: string): string[] {
    return (this.optional(name) ?? '')
      .split(',')
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0);
  }

  headers(name: string): Record<string, string> {
    const raw = this.optional(name);
    if (raw === undefined) return {};
    const problem = `${name} must be a JSON object of string header values`;
    let candidate: unknown;
    try {
      candidate = JSON.parse(raw);
    } catch (error) {
      this.problems.push(`${problem}: ${error instanceof Error ? error.message : String(error)}`);
      return {};
    }
    const parsed = HeadersSchema.safeParse(candidate);
    if (!parsed.success) {
      this.problems.push(problem);
      return {};
    }
    return parsed.data;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const read = new EnvReader(env);

  const apis = {
    inventory: {
      url: read.required('INVENTORY_API_URL'),
      apiKey: read.required('INVENTORY_API_KEY'),
      apiSecret: read.required('INVENTORY_API_SECRET')
    },
    transport: {
      url: read.required('TRANSPORT_API_URL'),
      apiKey: read.required('TRANSPORT_API_KEY'),
      apiSecret: read.required('TRANSPORT_API_SECRET')
    },
    weather: {
      url: read.required('WEATHER_API_URL'),
      apiKey: read.required('WEATHER_API_KEY')
    }
  };

  const rawLevel = read.optional('LOG_LEVEL') ?? 'INFO';
  const logLevel = parseLogLevel(rawLevel);
  if (!logLevel) {
    read.problems.push(`LOG_LEVEL must be one of DEBUG, INFO, WARNING, ERROR, CRITICAL (got "${rawLevel}")`);
  }

  const attempts = read.integer('API_RETRY_ATTEMPTS', 3, 1);
  const retryDelayMs = read.integer('API_RETRY_DELAY_SECONDS', 5) * 1000;

  const dbHost = read.optional('DB_HOST');
  const redisHost = read.optional('REDIS_HOST');
  const apiPortRaw = read.optional('API_PORT');

  const config: AppConfig = {
    agentName: read.optional('AGENT_NAME') ?? 'LogisticsCoordinator',
    logLevel: logLevel ?? 'INFO',
    logFile: read.optional('LOG_FILE'),
    apis,
    http: {
      timeoutMs: read.integer('API_TIMEOUT_SECONDS', 30, 1) * 1000,
      retry: {
        maxRetries: attempts - 1,
        baseDelay: retryDelayMs,
        maxDelay: Math.max(retryDelayMs, 60_000),
        jitterFactor: 0.1
      }
    },
    intervals: {
      mainLoopSeconds: read.integer('MAIN_LOOP_INTERVAL', 60, 1),
      inventorySeconds: read.integer('INVENTORY_CHECK_INTERVAL', 300, 1),
      shipmentSeconds: read.integer('SHIPMENT_CHECK_INTERVAL', 120, 1),
      weatherSeconds: read.integer('WEATHER_CHECK_INTERVAL', 3600, 1)
    },
    thresholds: {
      rerouteDelaySeconds: read.integer('REROUTE_DELAY_THRESHOLD', 3600),
      inventoryAlertRatio: read.ratio('INVENTORY_ALERT_THRESHOLD', 0.2),
      minVisibilityMeters: read.integer('MIN_VISIBILITY_METERS', 200),
      maxWindSpeedKmh: read.integer('MAX_WIND_SPEED_KMH', 80)
    },
    alertCooldownSeconds: read.integer('ALERT_COOLDOWN_SECONDS', 3600),
    optimizationEnabled: read.flag('OPTIMIZATION_ENABLED', true),
    warehouseDistancesPath: read.optional('WAREHOUSE_DISTANCES_PATH'),
    apiPort: apiPortRaw === undefined ? undefined : read.integer('API_PORT', 0, 0),
    database: dbHost
      ? {
          host: dbHost,
          port: read.integer('DB_PORT', 5432, 1),
          database: read.optional('DB_NAME') ?? 'logistics',
          user: read.optional('DB_USER') ?? 'postgres',
          password: read.optional('DB_PASSWORD')
        }
      : undefined,
    redis: redisHost
      ? {
          host: redisHost,
          port: read.integer('REDIS_PORT', 6379, 1),
          password: read.optional('REDIS_PASSWORD')
        }
      : undefined,
    notifications: {
      dashboard: read.flag('NOTIFY_DASHBOARD', false)
        ? {
            url: read.required('NOTIFY_DASHBOARD_API_URL', 'when NOTIFY_DASHBOARD=true'),
            apiKey: read.optional('NOTIFY_DASHBOARD_API_KEY'),
            orgId: read.optional('NOTIFY_DASHBOARD_ORG_ID')
          }
        : undefined,
      webhook: read.flag('NOTIFY_API_WEBHOOK', false)
        ? {
            url: read.required('NOTIFY_WEBHOOK_URL', 'when NOTIFY_API_WEBHOOK=true'),
            secret: read.optional('NOTIFY_WEBHOOK_SECRET'),
            headers: read.headers('NOTIFY_WEBHOOK_HEADERS')
          }
        : undefined,
      sms: read.flag('NOTIFY_SMS', false)
        ? {
            url: read.required('NOTIFY_SMS_API_URL', 'when NOTIFY_SMS=true'),
            apiKey: read.optional('NOTIFY_SMS_API_KEY'),
            from: read.optional('NOTIFY_SMS_FROM') ?? 'LogisticsAgent',
            recipients: read.list('NOTIFY_SMS_RECIPIENTS')
          }
        : undefined,
      email: read.flag('NOTIFY_EMAIL', false)
        ? {
            smtpHost: read.required('NOTIFY_EMAIL_SMTP_SERVER', 'when NOTIFY_EMAIL=true'),
            smtpPort: read.integer('NOTIFY_EMAIL_SMTP_PORT', 587, 1),
            username: read.optional('NOTIFY_EMAIL_USERNAME'),
            password: read.optional('NOTIFY_EMAIL_PASSWORD'),
            from: read.optional('NOTIFY_EMAIL_FROM') ?? 'logistics@example.com',
            recipients: read.list('NOTIFY_EMAIL_RECIPIENTS')
          }
        : undefined
    }
  };

  if (read.problems.length > 0) {
    throw new ConfigurationError(read.problems);
  }

  return config;
}
