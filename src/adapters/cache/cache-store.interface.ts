import { z } from 'zod';

/**
 * Key-value cache plus a capped list queue. Redis in production,
 * an in-process map when no Redis host is configured.
 */
export interface ICacheStore {
  connect(): Promise<void>;
  /**
   * @returns the stored value, or null when absent, expired or not matching the schema
   */
  getJson<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null>;
  setJson(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  /**
   * Atomically takes a key for ttlSeconds.
   * @returns true when the key was free, false when someone already holds it
   */
  claim(key: string, ttlSeconds: number): Promise<boolean>;
  /** Prepends to a list and trims it to maxLength entries. */
  pushToQueue(queue: string, payload: unknown, maxLength: number): Promise<void>;
  /** Newest entries first. */
  readQueue(queue: string, limit: number): Promise<unknown[]>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
