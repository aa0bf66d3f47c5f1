import OpenAI from 'openai';
import { loadEnv } from './config/env';
import { logger } from './utils/logger';
import { createApp } from './app';
import { RedisKeyValueStore } from './stores/RedisKeyValueStore';
import { OpenAILLMProvider } from './providers/openai/OpenAILLMProvider';
import { OpenAIEmbedder } from './providers/openai/OpenAIEmbedder';
import { UpstashVectorIndex } from './providers/upstash/UpstashVectorIndex';
import { DeepgramTTSProvider } from './providers/deepgram/DeepgramTTSProvider';
import { DeepgramTokenProvider } from './providers/deepgram/DeepgramTokenProvider';
import { SessionStore } from './services/SessionStore';
import { RateLimiter } from './services/RateLimiter';
import { Retriever } from './services/Retriever';
import { QueryInterpreter } from './services/QueryInterpreter';
import { ResponseGenerator } from './services/ResponseGenerator';
import { ChatOrchestrator, type TurnProfile } from './services/ChatOrchestrator';
import { VoiceWebSocketServer } from './websocket/VoiceWebSocketServer';

const env = loadEnv();

// Infrastructure clients
const redis = env.REDIS_URL ? new RedisKeyValueStore(env.REDIS_URL) : null;
const openai = new OpenAI({ apiKey: env.OPENAI_API_KEY });

const llm = new OpenAILLMProvider(openai, env.OPENAI_CHAT_MODEL);
const embedder = new OpenAIEmbedder(openai, env.OPENAI_EMBEDDING_MODEL, env.OPENAI_EMBEDDING_DIMENSIONS);
const vectorIndex = new UpstashVectorIndex(
  {
    url: env.UPSTASH_VECTOR_REST_URL,
    token: env.UPSTASH_VECTOR_REST_TOKEN,
    namespace: env.UPSTASH_NAMESPACE
  },
  embedder
);

// Services
const sessions = new SessionStore(redis, {
  ttlSeconds: env.SESSION_TTL_SECONDS,
  maxMessages: env.MAX_HISTORY_MESSAGES
});
const limiter = new RateLimiter(redis);
const orchestrator = new ChatOrchestrator({
  sessions,
  interpreter: new QueryInterpreter(llm, { model: env.OPENAI_INTERPRETER_MODEL }),
  retriever: new Retriever(vectorIndex, { minScore: env.RETRIEVAL_MIN_SCORE }),
  generator: new ResponseGenerator(llm)
});
const tokens = new DeepgramTokenProvider({
  apiKey: env.DEEPGRAM_API_KEY,
  projectId: env.DEEPGRAM_PROJECT_ID
});

const chatProfile: TurnProfile = {
  prompt: 'chat',
  topK: env.RETRIEVAL_TOP_K,
  maxTokens: env.CHAT_MAX_TOKENS,
  model: env.OPENAI_CHAT_MODEL,
  persist: true
};
const voiceProfile: TurnProfile = {
  prompt: 'voice',
  topK: env.VOICE_RETRIEVAL_TOP_K,
  maxTokens: env.VOICE_MAX_TOKENS,
  model: env.OPENAI_VOICE_MODEL,
  persist: true
};

const app = createApp({
  orchestrator,
  sessions,
  limiter,
  tokens,
  profiles: { chat: chatProfile, voice: voiceProfile },
  voiceEnabled: env.VOICE_ENABLED,
  corsOrigin: env.CORS_ORIGIN,
  trustProxy: env.TRUST_PROXY
});

const server = app.listen(env.PORT, () => {
  logger.info(
    {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      history: sessions.enabled,
      voiceEnabled: env.VOICE_ENABLED,
      voiceCredentials: tokens.configured
    },
    'Server started successfully'
  );
});

const tts =
  env.VOICE_ENABLED && env.DEEPGRAM_API_KEY
    ? new DeepgramTTSProvider({
        apiKey: env.DEEPGRAM_API_KEY,
        model: env.DEEPGRAM_TTS_MODEL,
        sampleRate: env.DEEPGRAM_TTS_SAMPLE_RATE
      })
    : null;

const voiceServer = new VoiceWebSocketServer(server, {
  voice: tts
    ? {
        orchestrator,
        sessions,
        tts,
        limiter,
        profile: voiceProfile,
        safetyTimeoutMs: env.VOICE_SAFETY_TIMEOUT_MS
      }
    : null,
  trustProxy: env.TRUST_PROXY
});

if (redis) {
  redis.connect().catch((error: unknown) => {
    logger.warn({ error }, 'Redis unavailable at startup, running without history and rate limits');
  });
}

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down gracefully');
  voiceServer.close();
  if (redis) {
    await redis.close().catch((error: unknown) => logger.warn({ error }, 'Failed to close Redis connection'));
  }
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => {
    logger.error({ error }, 'Shutdown failed');
    process.exit(1);
  });
});

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    logger.error({ error }, 'Shutdown failed');
    process.exit(1);
  });
});
