import { Router, Request, Response, NextFunction } from 'express';
import type { SessionStore } from '../services/SessionStore';
import type { RateLimiter } from '../services/RateLimiter';
import { SessionIdSchema } from '../models/Session';
import { rateLimit } from '../middleware/rateLimit';
import { parseInput } from '../middleware/validate';

export interface SessionRouterDeps {
  sessions: SessionStore;
  limiter: RateLimiter;
}

export function createSessionRouter({ sessions, limiter }: SessionRouterDeps): Router {
  const router = Router();

  /**
   * POST /api/session
   * Start a conversation with empty history
   */
  router.post('/session', rateLimit(limiter, 'session'), async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = await sessions.create();
      res.json({ session_id: sessionId });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/session/:id
   */
  router.delete('/session/:id', rateLimit(limiter, 'session'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = parseInput(SessionIdSchema, req.params.id);
      await sessions.delete(sessionId);
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
