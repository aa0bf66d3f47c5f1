/**
 * Environment Configuration
 *
 * Validates and provides type-safe access to environment variables
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  // ===== OpenAI (generation, interpretation, embeddings) =====
  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_CHAT_MODEL: z.string().default('gpt-4.1-mini'),
  OPENAI_VOICE_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_INTERPRETER_MODEL: z.string().default('gpt-4.1-nano'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  OPENAI_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  CHAT_MAX_TOKENS: z.coerce.number().int().positive().default(800),
  VOICE_MAX_TOKENS: z.coerce.number().int().positive().default(150),

  // ===== Vector index (document chunks) =====
  UPSTASH_VECTOR_REST_URL: z.string().url(),
  UPSTASH_VECTOR_REST_TOKEN: z.string().min(1, 'UPSTASH_VECTOR_REST_TOKEN is required'),
  UPSTASH_NAMESPACE: z.string().default('portfolio_rag'),

  // ===== Retrieval =====
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
  VOICE_RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(6),
  RETRIEVAL_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.3),

  // ===== Redis (session history + rate limiting) =====
  // Optional: without it history is disabled and rate limiting fails open
  REDIS_URL: z.string().url().optional(),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  MAX_HISTORY_MESSAGES: z.coerce.number().int().positive().default(10),

  // ===== Voice (Deepgram) =====
  VOICE_ENABLED: booleanFlag('false'),
  DEEPGRAM_API_KEY: z.string().optional(),
  DEEPGRAM_PROJECT_ID: z.string().optional(),
  DEEPGRAM_TTS_MODEL: z.string().default('aura-2-odysseus-en'),
  DEEPGRAM_TTS_SAMPLE_RATE: z.coerce.number().int().positive().default(16000),
  VOICE_SAFETY_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  // ===== Server Configuration =====
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CORS_ORIGIN: z.string().default('*'),
  TRUST_PROXY: booleanFlag('true'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export type Env = z.infer<typeof envSchema>;

export class EnvValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Environment validation failed:\n  - ${issues.join('\n  - ')}`);
    this.name = 'EnvValidationError';
  }
}

/**
 * Parse a raw environment map. Throws EnvValidationError listing every issue.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new EnvValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const env = parsed.data;
  const issues: string[] = [];

  // Provider-specific requirements
  if (env.VOICE_ENABLED && !env.DEEPGRAM_API_KEY) {
    issues.push('DEEPGRAM_API_KEY: required when VOICE_ENABLED=true');
  }

  if (issues.length > 0) {
    throw new EnvValidationError(issues);
  }

  return env;
}

/**
 * Load .env, validate process.env and exit the process on failure
 */
export function loadEnv(): Env {
  dotenv.config();

  try {
    const env = parseEnv(process.env);

    // Log configuration (non-sensitive info only)
    console.log('✅ Environment configuration loaded:');
    console.log(`   - Server Port: ${env.PORT}`);
    console.log(`   - Node Environment: ${env.NODE_ENV}`);
    console.log(`   - Chat Model: ${env.OPENAI_CHAT_MODEL}`);
    console.log(`   - Vector Namespace: ${env.UPSTASH_NAMESPACE}`);
    console.log(`   - Session History: ${env.REDIS_URL ? 'redis' : 'disabled (REDIS_URL not set)'}`);
    console.log(`   - Voice: ${env.VOICE_ENABLED ? 'enabled' : 'disabled'}`);
    if (env.VOICE_ENABLED && !env.DEEPGRAM_PROJECT_ID) {
      console.warn('⚠️  DEEPGRAM_PROJECT_ID not set. Browser voice tokens cannot be minted.');
    }

    return env;
  } catch (error) {
    if (error instanceof EnvValidationError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue}`);
      });
      process.exit(1);
    }
    throw error;
  }
}
