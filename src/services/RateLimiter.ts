import type { KeyValueStore } from '../stores/KeyValueStore';
import {
  RATE_LIMITS,
  RATE_LIMIT_KEY_PREFIX,
  type RateLimitBucket,
  type RateLimitRule
} from '../config/constants';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'RateLimiter' });

export interface RateLimitDecision {
  allowed: boolean;
  /** Seconds until the window resets; only set when denied */
  retryAfterSeconds?: number;
  count?: number;
}

/**
 * Fixed-window rate limiter keyed by (client, bucket).
 *
 * Fail-open: with no store, or when the store errors, every request is allowed.
 */
export class RateLimiter {
  constructor(
    private store: KeyValueStore | null,
    private rules: Record<RateLimitBucket, RateLimitRule> = RATE_LIMITS
  ) {}

  async allow(clientKey: string, bucket: RateLimitBucket): Promise<RateLimitDecision> {
    if (!this.store) {
      return { allowed: true };
    }

    const rule = this.rules[bucket];
    const key = `${RATE_LIMIT_KEY_PREFIX}${bucket}:${clientKey}`;

    try {
      const count = await this.store.incr(key);

      // First hit opens the window
      if (count === 1) {
        await this.store.expire(key, rule.windowSeconds);
      }

      if (count <= rule.limit) {
        return { allowed: true, count };
      }

      const ttl = await this.store.ttl(key);
      const retryAfterSeconds = ttl > 0 ? ttl : rule.windowSeconds;

      logger.warn(
        { clientKey, bucket, count, limit: rule.limit, retryAfterSeconds },
        'Rate limit exceeded'
      );

      return { allowed: false, retryAfterSeconds, count };
    } catch (error) {
      logger.error({ bucket, error }, 'Rate limiter backend error, allowing request');
      return { allowed: true };
    }
  }
}
