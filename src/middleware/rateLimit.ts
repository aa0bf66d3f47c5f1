import { Request, Response, NextFunction, RequestHandler } from 'express';
import type { RateLimiter } from '../services/RateLimiter';
import type { RateLimitBucket } from '../config/constants';
import { resolveClientIp } from '../utils/clientIp';

/**
 * Reject with 429 once the client's fixed window for `bucket` is used up
 */
export function rateLimit(limiter: RateLimiter, bucket: RateLimitBucket): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const clientIp = resolveClientIp(req.headers, req.socket.remoteAddress, req.app.get('trust proxy') === true);

    try {
      const decision = await limiter.allow(clientIp, bucket);
      if (decision.allowed) {
        next();
        return;
      }

      const retryAfter = decision.retryAfterSeconds ?? 60;
      res.setHeader('Retry-After', String(retryAfter));
      res.status(429).json({ error: 'Rate limit exceeded', retry_after: retryAfter });
    } catch (error) {
      next(error);
    }
  };
}
