import { z } from 'zod';
import { ICacheStore } from './cache-store.interface';

interface Entry {
  payload: string;
  expiresAt?: number;
}

/**
 * In-process cache (single agent, no Redis)
 */
export class MemoryCacheStore implements ICacheStore {
  private readonly entries = new Map<string, Entry>();
  private readonly queues = new Map<string, string[]>();

  constructor(private readonly now: () => number = Date.now) {}

  async connect(): Promise<void> {
    // nothing to connect
  }

  async getJson<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    const entry = this.live(key);
    if (!entry) return null;
    const parsed = schema.safeParse(JSON.parse(entry.payload));
    return parsed.success ? parsed.data : null;
  }

  async setJson(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, {
      payload: JSON.stringify(value),
      expiresAt: ttlSeconds ? this.now() + ttlSeconds * 1000 : undefined
    });
  }

  async claim(key: string, ttlSeconds: number): Promise<boolean> {
    if (ttlSeconds <= 0) return true;
    if (this.live(key)) return false;
    this.entries.set(key, { payload: '1', expiresAt: this.now() + ttlSeconds * 1000 });
    return true;
  }

  async pushToQueue(queue: string, payload: unknown, maxLength: number): Promise<void> {
    const list = this.queues.get(queue) ?? [];
    list.unshift(JSON.stringify(payload));
    this.queues.set(queue, list.slice(0, maxLength));
  }

  async readQueue(queue: string, limit: number): Promise<unknown[]> {
    const list = this.queues.get(queue) ?? [];
    return list.slice(0, limit).map((payload): unknown => JSON.parse(payload));
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
    this.queues.clear();
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry?.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}
