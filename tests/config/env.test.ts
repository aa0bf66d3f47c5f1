import { describe, it, expect } from 'vitest';
import { EnvValidationError, parseEnv } from '../../src/config/env';

const base = {
  OPENAI_API_KEY: 'test-key',
  UPSTASH_VECTOR_REST_URL: 'https://vector.example.com',
  UPSTASH_VECTOR_REST_TOKEN: 'test-token'
};

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv(base);

    expect(env.PORT).toBe(3001);
    expect(env.OPENAI_CHAT_MODEL).toBe('gpt-4.1-mini');
    expect(env.OPENAI_VOICE_MODEL).toBe('gpt-4o-mini');
    expect(env.RETRIEVAL_TOP_K).toBe(5);
    expect(env.VOICE_RETRIEVAL_TOP_K).toBe(6);
    expect(env.RETRIEVAL_MIN_SCORE).toBe(0.3);
    expect(env.SESSION_TTL_SECONDS).toBe(3600);
    expect(env.MAX_HISTORY_MESSAGES).toBe(10);
    expect(env.VOICE_ENABLED).toBe(false);
    expect(env.TRUST_PROXY).toBe(true);
    expect(env.REDIS_URL).toBeUndefined();
  });

  it('coerces numbers and flags', () => {
    const env = parseEnv({ ...base, PORT: '8080', VOICE_ENABLED: '1', DEEPGRAM_API_KEY: 'test-secret' });

    expect(env.PORT).toBe(8080);
    expect(env.VOICE_ENABLED).toBe(true);
  });

  it('reports every missing variable', () => {
    try {
      parseEnv({});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EnvValidationError);
      if (error instanceof EnvValidationError) {
        expect(error.issues.map((issue) => issue.split(':')[0])).toEqual([
          'OPENAI_API_KEY',
          'UPSTASH_VECTOR_REST_URL',
          'UPSTASH_VECTOR_REST_TOKEN'
        ]);
      }
    }
  });

  it('requires a Deepgram key when voice is enabled', () => {
    expect(() => parseEnv({ ...base, VOICE_ENABLED: 'true' })).toThrow(
      'DEEPGRAM_API_KEY: required when VOICE_ENABLED=true'
    );
  });

  it('rejects a relevance floor outside [0, 1]', () => {
    expect(() => parseEnv({ ...base, RETRIEVAL_MIN_SCORE: '1.5' })).toThrow(EnvValidationError);
  });
});
