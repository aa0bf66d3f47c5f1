import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import type { ChatOrchestrator, TurnProfile } from '../services/ChatOrchestrator';
import type { RateLimiter } from '../services/RateLimiter';
import type { DeepgramTokenProvider } from '../providers/deepgram/DeepgramTokenProvider';
import { VoiceChatRequestSchema, type VoiceChatRequest } from '../models/ChatRequest';
import { FALLBACK_VOICE_REPLY } from '../config/constants';
import { rateLimit } from '../middleware/rateLimit';
import { parseInput } from '../middleware/validate';
import { abortOnDisconnect } from './sse';
import { ForbiddenError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'VoiceRoutes' });

export interface VoiceRouterDeps {
  orchestrator: ChatOrchestrator;
  limiter: RateLimiter;
  tokens: DeepgramTokenProvider;
  voiceEnabled: boolean;
  profile: TurnProfile;
}

export function createVoiceRouter({ orchestrator, limiter, tokens, voiceEnabled, profile }: VoiceRouterDeps): Router {
  const router = Router();

  const requireVoice: RequestHandler = (_req, _res, next) => {
    next(voiceEnabled ? undefined : new ForbiddenError('Voice features are disabled'));
  };

  /**
   * GET /api/deepgram-token
   * Short-lived key the browser uses for speech recognition
   */
  router.get(
    '/deepgram-token',
    requireVoice,
    rateLimit(limiter, 'voice-token'),
    async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const key = await tokens.mint();
        res.setHeader('Cache-Control', 'no-store');
        res.json({ key });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/voice/chat
   * Plain-text stream of the spoken answer, for clients doing their own TTS
   */
  router.post(
    '/voice/chat',
    requireVoice,
    rateLimit(limiter, 'voice-chat'),
    async (req: Request, res: Response, next: NextFunction) => {
      let request: VoiceChatRequest;
      try {
        request = parseInput(VoiceChatRequestSchema, req.body);
      } catch (error) {
        next(error);
        return;
      }

      res.status(200);
      res.setHeader('Content-Type', 'text/plain; charset=utf-8');
      res.setHeader('Cache-Control', 'no-cache');
      res.flushHeaders();

      const controller = abortOnDisconnect(res);
      const turn = orchestrator.startTurn(
        { message: request.message, sessionId: request.session_id, signal: controller.signal },
        profile
      );

      let written = false;
      try {
        for await (const fragment of turn.fragments()) {
          written = true;
          res.write(fragment);
        }
      } catch (error) {
        logger.error({ sessionId: request.session_id, error: errorMessage(error) }, 'Voice chat turn failed');
        if (!written && !controller.signal.aborted) {
          res.write(FALLBACK_VOICE_REPLY);
        }
      }

      if (!res.writableEnded) {
        res.end();
      }
    }
  );

  return router;
}
