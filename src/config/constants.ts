export const SESSION_KEY_PREFIX = 'chat_session:';
export const RATE_LIMIT_KEY_PREFIX = 'rl:';

// Exchanges (user + assistant pairs) rendered into prompts
export const HISTORY_PROMPT_EXCHANGES = 5;
export const HISTORY_MESSAGE_MAX_CHARS = 500;

export const MAX_MESSAGE_LENGTH = 2000;

export const VOICE_TOKEN_TTL_SECONDS = 30;
export const VOICE_TOKEN_SCOPES = ['usage:write'];

export type RateLimitBucket = 'voice-token' | 'chat' | 'voice-chat' | 'session';

export interface RateLimitRule {
  limit: number;
  windowSeconds: number;
}

export const RATE_LIMITS: Record<RateLimitBucket, RateLimitRule> = {
  'voice-token': { limit: 5, windowSeconds: 60 },
  chat: { limit: 20, windowSeconds: 60 },
  'voice-chat': { limit: 30, windowSeconds: 60 },
  session: { limit: 10, windowSeconds: 60 }
};

export const FALLBACK_VOICE_REPLY = "I'm sorry, I'm having trouble responding right now.";
