import Redis from 'ioredis';
import type { KeyValueStore } from './KeyValueStore';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'RedisKeyValueStore' });

/**
 * Redis-backed key-value store
 *
 * Commands fail fast while disconnected (no offline queue) so callers can
 * degrade instead of hanging on a dead connection.
 */
export class RedisKeyValueStore implements KeyValueStore {
  private client: Redis;

  constructor(url: string) {
    this.client = new Redis(url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      connectTimeout: 5000
    });

    this.client.on('error', (error) => {
      logger.warn({ error: error.message }, 'Redis connection error');
    });
    this.client.on('ready', () => {
      logger.info('Redis connection ready');
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, 'EX', ttlSeconds);
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async incr(key: string): Promise<number> {
    return this.client.incr(key);
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    await this.client.expire(key, ttlSeconds);
  }

  async ttl(key: string): Promise<number> {
    return this.client.ttl(key);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
