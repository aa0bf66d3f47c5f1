import { z } from 'zod';
import { VOICE_TOKEN_SCOPES, VOICE_TOKEN_TTL_SECONDS } from '../../config/constants';
import { ServiceUnavailableError, UpstreamError, errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { withRetry, type RetryOptions } from '../../utils/retry';

const logger = createLogger({ service: 'DeepgramTokenProvider' });

export const DEEPGRAM_API_URL = 'https://api.deepgram.com/v1';

const KeyResponseSchema = z.object({ key: z.string().min(1) });

export interface DeepgramTokenConfig {
  apiKey?: string;
  projectId?: string;
  fetchImpl?: typeof fetch;
  retry?: RetryOptions;
}

/**
 * Mints short-lived, speech-only Deepgram keys for the browser so the
 * long-lived key never leaves the server.
 */
export class DeepgramTokenProvider {
  private fetchImpl: typeof fetch;

  constructor(private config: DeepgramTokenConfig) {
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get configured(): boolean {
    return Boolean(this.config.apiKey && this.config.projectId);
  }

  async mint(): Promise<string> {
    const { apiKey, projectId } = this.config;
    if (!apiKey || !projectId) {
      throw new ServiceUnavailableError('Voice credentials are not configured');
    }

    return withRetry(() => this.requestKey(apiKey, projectId), {
      attempts: 3,
      baseDelayMs: 200,
      maxDelayMs: 2000,
      label: 'deepgram-token',
      ...this.config.retry,
      shouldRetry: (error) => error instanceof UpstreamError && error.retryable
    });
  }

  private async requestKey(apiKey: string, projectId: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${DEEPGRAM_API_URL}/projects/${projectId}/keys`, {
        method: 'POST',
        headers: {
          Authorization: `Token ${apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({
          comment: 'short-lived-browser',
          scopes: VOICE_TOKEN_SCOPES,
          time_to_live_in_seconds: VOICE_TOKEN_TTL_SECONDS
        })
      });
    } catch (error) {
      throw new UpstreamError('deepgram', errorMessage(error), true, { cause: error });
    }

    if (!response.ok) {
      logger.warn({ status: response.status }, 'Deepgram key request rejected');
      throw new UpstreamError('deepgram', `HTTP ${response.status}`, response.status >= 500);
    }

    const parsed = KeyResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError('deepgram', 'key missing from response');
    }

    logger.info({ ttlSeconds: VOICE_TOKEN_TTL_SECONDS }, 'Voice token minted');
    return parsed.data.key;
  }
}
