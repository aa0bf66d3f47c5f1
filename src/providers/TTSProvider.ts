/**
 * Text-to-Speech Provider Interface
 * Allows swapping between Deepgram Aura, OpenAI TTS, etc.
 */

export interface TTSProvider {
  /**
   * Generate speech audio from text
   * @param signal - Aborts the synthesis request
   * @returns Raw PCM audio buffer (16-bit, mono)
   */
  synthesize(text: string, signal?: AbortSignal): Promise<Buffer>;

  /**
   * Get audio format details
   */
  getAudioFormat(): {
    encoding: string;
    sampleRate: number;
    channels: number;
  };

  /**
   * Get provider name for logging
   */
  getName(): string;
}
