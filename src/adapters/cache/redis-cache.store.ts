import { createClient } from 'redis';
import { z } from 'zod';
import { RedisConfig } from '../../config/app.config';
import { createLogger, errorMessage } from '../../utils/logger';
import { ICacheStore } from './cache-store.interface';

const logger = createLogger('Redis');

const CONNECT_TIMEOUT_MS = 5000;
const MAX_STARTUP_RETRIES = 3;
const MAX_RECONNECT_DELAY_MS = 5000;

/**
 * Gives up after a few attempts until the first successful connection, so a
 * wrong REDIS_HOST fails start-up instead of retrying forever. Once the client
 * has been ready it keeps reconnecting with a growing delay.
 */
export function reconnectDelay(retries: number, hasConnected: boolean): number | Error {
  if (!hasConnected && retries >= MAX_STARTUP_RETRIES) {
    return new Error(`Redis unreachable after ${retries} reconnect attempts`);
  }
  return Math.min(100 * 2 ** retries, MAX_RECONNECT_DELAY_MS);
}

/**
 * Redis-backed cache (production use)
 */
export class RedisCacheStore implements ICacheStore {
  private readonly client: ReturnType<typeof createClient>;
  private hasConnected = false;

  constructor(config: RedisConfig) {
    // Without the offline queue, commands issued during an outage reject
    // at once instead of waiting for the reconnect
    this.client = createClient({
      socket: {
        host: config.host,
        port: config.port,
        connectTimeout: CONNECT_TIMEOUT_MS,
        reconnectStrategy: (retries: number) => reconnectDelay(retries, this.hasConnected)
      },
      password: config.password,
      disableOfflineQueue: true
    });
    this.client.on('error', (error: unknown) => {
      logger.error(`Redis client error: ${errorMessage(error)}`);
    });
    this.client.on('ready', () => {
      this.hasConnected = true;
    });
  }

  async connect(): Promise<void> {
    if (!this.client.isOpen) {
      await this.client.connect();
    }
  }

  async getJson<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const data = await this.client.get(key);
    if (!data) return null;
    const parsed = schema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      logger.warn(`Ignoring cached value for ${key}: ${parsed.error.issues.length} validation issue(s)`);
      return null;
    }
    return parsed.data;
  }

  async setJson(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const payload = JSON.stringify(value);
    if (ttlSeconds) {
      await this.client.set(key, payload, { EX: ttlSeconds });
    } else {
      await this.client.set(key, payload);
    }
  }

  async claim(key: string, ttlSeconds: number): Promise<boolean> {
    if (ttlSeconds <= 0) return true;
    const reply = await this.client.set(key, '1', { NX: true, EX: ttlSeconds });
    return reply === 'OK';
  }

  async pushToQueue(queue: string, payload: unknown, maxLength: number): Promise<void> {
    await this.client
      .multi()
      .lPush(queue, JSON.stringify(payload))
      .lTrim(queue, 0, maxLength - 1)
      .exec();
  }

  async readQueue(queue: string, limit: number): Promise<unknown[]> {
    const entries = await this.client.lRange(queue, 0, limit - 1);
    return entries.map((entry): unknown => JSON.parse(entry));
  }

  async ping(): Promise<boolean> {
    return (await this.client.ping()) === 'PONG';
  }

  async close(): Promise<void> {
    if (!this.client.isOpen) return;
    if (this.client.isReady) {
      await this.client.quit();
    } else {
      // QUIT cannot be sent while reconnecting
      await this.client.disconnect();
    }
  }
}
