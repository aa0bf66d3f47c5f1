import { createLogger } from './logger';

const logger = createLogger({ service: 'Retry' });

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Return false to give up immediately on this error */
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  label?: string;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Run an idempotent operation with bounded exponential backoff.
 * Rethrows the last error once attempts are exhausted.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    attempts = 3,
    baseDelayMs = 200,
    maxDelayMs = 2000,
    shouldRetry = () => true,
    sleep = defaultSleep,
    label = 'operation'
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === attempts || !shouldRetry(error)) {
        break;
      }
      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      logger.warn({ label, attempt, delay, error }, 'Attempt failed, retrying');
      await sleep(delay);
    }
  }

  throw lastError;
}
