import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { logger } from './utils/logger';
import { generateCorrelationId } from './utils/correlationId';
import type { ChatOrchestrator, TurnProfile } from './services/ChatOrchestrator';
import type { SessionStore } from './services/SessionStore';
import type { RateLimiter } from './services/RateLimiter';
import type { DeepgramTokenProvider } from './providers/deepgram/DeepgramTokenProvider';
import { createSessionRouter } from './api/session.routes';
import { createChatRouter } from './api/chat.routes';
import { createVoiceRouter } from './api/voice.routes';
import { errorHandler } from './middleware/errorHandler';

export interface AppDeps {
  orchestrator: ChatOrchestrator;
  sessions: SessionStore;
  limiter: RateLimiter;
  tokens: DeepgramTokenProvider;
  profiles: { chat: TurnProfile; voice: TurnProfile };
  voiceEnabled: boolean;
  corsOrigin?: string;
  trustProxy?: boolean;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.set('trust proxy', deps.trustProxy ?? true);

  // Middleware
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*', exposedHeaders: ['X-Session-Id', 'Retry-After'] }));
  app.use(express.json({ limit: '100kb' }));
  app.use(pinoHttp({
    logger,
    genReqId: () => generateCorrelationId(),
    autoLogging: false // Disable automatic request logging
  }));

  // Routes
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/config', (_req, res) => {
    res.json({ voiceEnabled: deps.voiceEnabled });
  });

  app.use('/api', createSessionRouter({ sessions: deps.sessions, limiter: deps.limiter }));
  app.use('/api', createChatRouter({
    orchestrator: deps.orchestrator,
    sessions: deps.sessions,
    limiter: deps.limiter,
    profile: deps.profiles.chat
  }));
  app.use('/api', createVoiceRouter({
    orchestrator: deps.orchestrator,
    limiter: deps.limiter,
    tokens: deps.tokens,
    voiceEnabled: deps.voiceEnabled,
    profile: deps.profiles.voice
  }));

  app.use(errorHandler);

  return app;
}
