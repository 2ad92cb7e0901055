import { z } from 'zod';
import { MemoryCacheStore } from './memory-cache.store';

describe('MemoryCacheStore', () => {
  let clock: number;
  let store: MemoryCacheStore;

  beforeEach(() => {
    clock = 1_000_000;
    store = new MemoryCacheStore(() => clock);
  });

  // Test: Values round-trip through the schema
  it('should return stored values that match the schema', async () => {
    // Arrange
    await store.setJson('state', { count: 3 });

    // Act
    const value = await store.getJson('state', z.object({ count: z.number() }));

    // Assert
    expect(value).toEqual({ count: 3 });
  });

  // Test: Schema mismatches read as absent
  it('should return null when the stored value fails validation', async () => {
    // Arrange
    await store.setJson('state', { count: 'three' });

    // Act
    const value = await store.getJson('state', z.object({ count: z.number() }));

    // Assert
    expect(value).toBeNull();
  });

  // Test: TTLs expire against the injected clock
  it('should expire values after their ttl', async () => {
    // Arrange
    await store.setJson('state', 1, 10);

    // Act
    clock += 10_000;
    const value = await store.getJson('state', z.number());

    // Assert
    expect(value).toBeNull();
  });

  // Test: A claim is exclusive until it expires
  it('should grant a claim once per ttl window', async () => {
    // Act
    const first = await store.claim('alert:shipment:S1', 60);
    const second = await store.claim('alert:shipment:S1', 60);
    clock += 60_000;
    const third = await store.claim('alert:shipment:S1', 60);

    // Assert
    expect([first, second, third]).toEqual([true, false, true]);
  });

  // Test: A zero cooldown disables de-duplication
  it('should always grant a zero-ttl claim', async () => {
    // Act
    const first = await store.claim('k', 0);
    const second = await store.claim('k', 0);

    // Assert
    expect([first, second]).toEqual([true, true]);
  });

  // Test: Queue keeps the newest entries, newest first
  it('should cap the queue and read newest first', async () => {
    // Arrange
    for (const n of [1, 2, 3, 4]) {
      await store.pushToQueue('notifications', { n }, 3);
    }

    // Act
    const entries = await store.readQueue('notifications', 10);

    // Assert
    expect(entries).toEqual([{ n: 4 }, { n: 3 }, { n: 2 }]);
  });
});
