/**
 * Key-Value Store Interface
 * Minimal surface the session store and rate limiter need from Redis.
 * Every operation is a single atomic command on the server.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;

  /** Set with expiry in seconds */
  setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void>;

  del(key: string): Promise<void>;

  /** Increment and return the new counter value */
  incr(key: string): Promise<number>;

  expire(key: string, ttlSeconds: number): Promise<void>;

  /** Remaining seconds; negative when the key has no expiry or does not exist */
  ttl(key: string): Promise<number>;
}
