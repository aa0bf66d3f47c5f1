import { ClientVoiceMessageSchema, type ServerVoiceMessage } from '../models/VoiceMessage';
import type { VoiceStateChange } from '../models/VoiceState';
import type { ChatOrchestrator, TurnProfile } from '../services/ChatOrchestrator';
import type { SessionStore } from '../services/SessionStore';
import type { RateLimiter } from '../services/RateLimiter';
import type { TTSProvider } from '../providers/TTSProvider';
import { VoiceTurnController, type Clock } from '../services/VoiceTurnController';
import { errorMessage } from '../utils/errors';
import type { Logger } from '../utils/logger';

export interface VoiceConnectionDeps {
  orchestrator: ChatOrchestrator;
  sessions: SessionStore;
  tts: TTSProvider;
  /** Each final transcript is charged to the client's `voice-chat` bucket */
  limiter: RateLimiter;
  profile: TurnProfile;
  safetyTimeoutMs: number;
  clock?: Clock;
}

/**
 * One browser voice session: decodes client messages into controller
 * events and encodes controller output as server messages.
 */
export class VoiceConnection {
  readonly controller: VoiceTurnController;
  private limiter: RateLimiter;

  constructor(
    deps: VoiceConnectionDeps,
    private send: (message: ServerVoiceMessage) => void,
    private logger: Logger,
    private clientKey: string,
    sessionId?: string
  ) {
    this.limiter = deps.limiter;
    const format = deps.tts.getAudioFormat();

    this.controller = new VoiceTurnController(
      {
        orchestrator: deps.orchestrator,
        sessions: deps.sessions,
        tts: deps.tts,
        clock: deps.clock,
        output: {
          play: (fragment) =>
            this.send({
              type: 'audio',
              id: fragment.id,
              text: fragment.text,
              audio: fragment.audio.toString('base64'),
              encoding: format.encoding,
              sample_rate: format.sampleRate
            }),
          stop: () => this.send({ type: 'stop_audio' })
        }
      },
      { sessionId, profile: deps.profile, safetyTimeoutMs: deps.safetyTimeoutMs }
    );

    this.controller.on('state', (change: VoiceStateChange) => {
      this.send({ type: 'state', state: change.to, reason: change.reason });
    });
    this.controller.on('response_text', (text: string) => {
      this.send({ type: 'response_text', text });
    });
    this.controller.on('error', (message: string) => {
      this.send({ type: 'error', message });
    });
  }

  /**
   * Handle one raw text frame from the browser
   */
  handleMessage(raw: string): Promise<void> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.send({ type: 'error', message: 'Invalid JSON' });
      return Promise.resolve();
    }

    const parsed = ClientVoiceMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.send({ type: 'error', message: 'Unknown message' });
      return Promise.resolve();
    }

    const message = parsed.data;
    switch (message.type) {
      case 'transcript':
        // Interim results are display-only on the client
        return message.is_final ? this.handleFinalTranscript(message.text) : Promise.resolve();
      case 'speech_started':
        return this.controller.handleSpeechStarted();
      case 'playback_finished':
        return this.controller.handlePlaybackFinished(message.id);
    }
  }

  private async handleFinalTranscript(text: string): Promise<void> {
    if (!text.trim()) {
      return;
    }

    const decision = await this.limiter.allow(this.clientKey, 'voice-chat');
    if (!decision.allowed) {
      this.send({ type: 'error', message: 'Rate limit exceeded', retry_after: decision.retryAfterSeconds });
      return;
    }

    await this.controller.handleTranscript(text);
  }

  tick(): void {
    this.controller.tick();
  }

  close(): void {
    this.logger.debug({ state: this.controller.getState() }, 'Voice connection closed');
    this.controller.dispose();
  }

  reportFailure(error: unknown): void {
    this.logger.error({ error: errorMessage(error) }, 'Voice message handling failed');
  }
}
