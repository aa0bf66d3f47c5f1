import type { KeyValueStore } from '../../src/stores/KeyValueStore';

interface Entry {
  value: string;
  ttlSeconds?: number;
}

/**
 * In-process stand-in for Redis. Time does not pass: TTLs are recorded,
 * never expired.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  readonly entries = new Map<string, Entry>();
  /** When set, every command rejects with this error */
  failWith?: Error;

  async get(key: string): Promise<string | null> {
    this.check();
    return this.entries.get(key)?.value ?? null;
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.check();
    this.entries.set(key, { value, ttlSeconds });
  }

  async del(key: string): Promise<void> {
    this.check();
    this.entries.delete(key);
  }

  async incr(key: string): Promise<number> {
    this.check();
    const entry = this.entries.get(key);
    const next = (entry ? Number(entry.value) : 0) + 1;
    this.entries.set(key, { value: String(next), ttlSeconds: entry?.ttlSeconds });
    return next;
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    this.check();
    const entry = this.entries.get(key);
    if (entry) {
      entry.ttlSeconds = ttlSeconds;
    }
  }

  async ttl(key: string): Promise<number> {
    this.check();
    const entry = this.entries.get(key);
    if (!entry) {
      return -2;
    }
    return entry.ttlSeconds ?? -1;
  }

  private check(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}
