import { Router, Request, Response, NextFunction } from 'express';
import type { ChatOrchestrator, TurnProfile } from '../services/ChatOrchestrator';
import type { SessionStore } from '../services/SessionStore';
import type { RateLimiter } from '../services/RateLimiter';
import { ChatRequestSchema, type ChatRequest } from '../models/ChatRequest';
import { rateLimit } from '../middleware/rateLimit';
import { parseInput } from '../middleware/validate';
import { SSE_DONE, abortOnDisconnect, openEventStream, sseFrame } from './sse';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ChatRoutes' });

export interface ChatRouterDeps {
  orchestrator: ChatOrchestrator;
  sessions: SessionStore;
  limiter: RateLimiter;
  profile: TurnProfile;
}

export function createChatRouter({ orchestrator, sessions, limiter, profile }: ChatRouterDeps): Router {
  const router = Router();

  /**
   * POST /api/chat
   * Streams the answer as server-sent events, terminated by `data: [DONE]`
   */
  router.post('/chat', rateLimit(limiter, 'chat'), async (req: Request, res: Response, next: NextFunction) => {
    let request: ChatRequest;
    let sessionId: string;
    try {
      request = parseInput(ChatRequestSchema, req.body);
      sessionId = request.session_id ?? (await sessions.create());
    } catch (error) {
      next(error);
      return;
    }

    openEventStream(res, { 'X-Session-Id': sessionId });
    const controller = abortOnDisconnect(res);

    const turn = orchestrator.startTurn(
      { message: request.message, sessionId, signal: controller.signal },
      profile
    );

    try {
      for await (const fragment of turn.fragments()) {
        res.write(sseFrame({ content: fragment }));
      }
    } catch (error) {
      logger.error({ sessionId, error: errorMessage(error) }, 'Chat turn failed');
      if (!controller.signal.aborted) {
        res.write(sseFrame({ error: 'Failed to generate response' }));
      }
    }

    if (!res.writableEnded) {
      res.write(SSE_DONE);
      res.end();
    }
  });

  return router;
}
