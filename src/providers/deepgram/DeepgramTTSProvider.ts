import type { TTSProvider } from '../TTSProvider';
import { UpstreamError, errorMessage, isAbortError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'DeepgramTTSProvider' });

export const DEEPGRAM_SPEAK_URL = 'https://api.deepgram.com/v1/speak';

export interface DeepgramTTSConfig {
  apiKey: string;
  model?: string;
  sampleRate?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Deepgram Aura Text-to-Speech Provider
 *
 * REST `/v1/speak`, returns headerless linear16 PCM so fragments can be
 * played back to back by the browser.
 */
export class DeepgramTTSProvider implements TTSProvider {
  private apiKey: string;
  private model: string;
  private sampleRate: number;
  private fetchImpl: typeof fetch;

  constructor(config: DeepgramTTSConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model ?? 'aura-2-odysseus-en';
    this.sampleRate = config.sampleRate ?? 16000;
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async synthesize(text: string, signal?: AbortSignal): Promise<Buffer> {
    const params = new URLSearchParams({
      model: this.model,
      encoding: 'linear16',
      sample_rate: String(this.sampleRate),
      container: 'none'
    });

    let response: Response;
    try {
      response = await this.fetchImpl(`${DEEPGRAM_SPEAK_URL}?${params}`, {
        method: 'POST',
        headers: {
          Authorization: `Token ${this.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({ text }),
        signal
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      logger.error({ error: errorMessage(error) }, 'Deepgram TTS request failed');
      throw new UpstreamError('deepgram-tts', errorMessage(error), true, { cause: error });
    }

    if (!response.ok) {
      const detail = await response.text();
      logger.error({ status: response.status, detail }, 'Deepgram TTS API error');
      throw new UpstreamError('deepgram-tts', `HTTP ${response.status}`, response.status >= 500);
    }

    return Buffer.from(await response.arrayBuffer());
  }

  getAudioFormat() {
    return {
      encoding: 'linear16',
      sampleRate: this.sampleRate,
      channels: 1
    };
  }

  getName(): string {
    return `Deepgram TTS (${this.model})`;
  }
}
