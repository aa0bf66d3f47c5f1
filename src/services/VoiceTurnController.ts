import { EventEmitter } from 'events';
import type { ChatOrchestrator, TurnProfile } from './ChatOrchestrator';
import type { SessionStore } from './SessionStore';
import type { TTSProvider } from '../providers/TTSProvider';
import type { SessionTurn } from '../models/Session';
import { VoiceState, type AudioFragment, type VoiceStateChange } from '../models/VoiceState';
import { SpeechSegmenter } from './SpeechSegmenter';
import { errorMessage, isAbortError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'VoiceTurnController' });

export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

/**
 * Where synthesized speech goes (the browser, over the voice socket).
 * Receives one fragment at a time and reports back through `handlePlaybackFinished`.
 */
export interface AudioOutput {
  play(fragment: AudioFragment): void;
  /** Drop anything still playing */
  stop(): void;
}

export interface VoiceTurnControllerDeps {
  orchestrator: ChatOrchestrator;
  sessions: SessionStore;
  tts: TTSProvider;
  output: AudioOutput;
  clock?: Clock;
}

export interface VoiceTurnControllerOptions {
  sessionId?: string;
  profile: TurnProfile;
  safetyTimeoutMs: number;
}

interface ActiveTurn {
  message: string;
  controller: AbortController;
  /** Synthesized, not yet handed to the output */
  queue: AudioFragment[];
  playing?: AudioFragment;
  /** Text of every fragment handed to the output */
  spoken: string[];
  generationDone: boolean;
  persisted: boolean;
}

/**
 * Voice Turn Controller
 *
 * Drives one voice conversation: finalized transcript → retrieval and
 * generation → sentence-by-sentence synthesis → playback, with barge-in.
 *
 * Events:
 * - `state` (VoiceStateChange)
 * - `response_text` (string) when a fragment is handed to the output
 * - `error` (string)
 */
export class VoiceTurnController extends EventEmitter {
  private state: VoiceState = VoiceState.LISTENING;
  private turn?: ActiveTurn;
  private fragmentSeq = 0;
  private lastProgressAt: number;
  private disposed = false;
  /** Session writes, applied one after another */
  private persistence: Promise<void> = Promise.resolve();
  private clock: Clock;

  constructor(
    private deps: VoiceTurnControllerDeps,
    private options: VoiceTurnControllerOptions
  ) {
    super();
    this.clock = deps.clock ?? systemClock;
    this.lastProgressAt = this.clock.now();
  }

  getState(): VoiceState {
    return this.state;
  }

  /**
   * Finalized transcript from the browser's speech recognition.
   * Resolves once generation and synthesis for the turn have ended.
   */
  async handleTranscript(text: string): Promise<void> {
    const message = text.trim();
    if (!message || this.disposed) {
      return;
    }

    // The previous turn is cancelled before anything is awaited, so a burst of
    // transcripts leaves exactly one turn running
    if (this.state !== VoiceState.LISTENING && this.state !== VoiceState.INTERRUPTED) {
      this.interrupt('transcript while busy').catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, 'Failed to persist interrupted turn');
      });
    }

    const turn: ActiveTurn = {
      message,
      controller: new AbortController(),
      queue: [],
      spoken: [],
      generationDone: false,
      persisted: false
    };
    this.turn = turn;
    this.transition(VoiceState.TRANSCRIPT_RECEIVED, 'final transcript');

    await this.runTurn(turn);
  }

  /**
   * The visitor started talking
   */
  async handleSpeechStarted(): Promise<void> {
    if (this.state === VoiceState.GENERATING || this.state === VoiceState.SPEAKING) {
      await this.interrupt('speech started');
    }
  }

  /**
   * The output finished playing a fragment; hand over the next one
   */
  async handlePlaybackFinished(fragmentId: number): Promise<void> {
    const turn = this.turn;
    if (!turn || turn.playing?.id !== fragmentId) {
      return;
    }

    turn.playing = undefined;
    this.touch();
    this.handOver(turn);
    await this.maybeFinish(turn);
  }

  /**
   * Safety timeout check, driven by an interval in production
   */
  tick(): void {
    if (this.state === VoiceState.LISTENING) {
      return;
    }

    const idleMs = this.clock.now() - this.lastProgressAt;
    if (idleMs < this.options.safetyTimeoutMs) {
      return;
    }

    logger.warn({ state: this.state, idleMs }, 'Voice turn stalled, resetting to listening');
    this.cancelTurn();
    this.transition(VoiceState.LISTENING, 'safety timeout');
  }

  dispose(): void {
    this.disposed = true;
    this.turn?.controller.abort();
    this.turn = undefined;
    this.removeAllListeners();
  }

  private async runTurn(turn: ActiveTurn): Promise<void> {
    const { signal } = turn.controller;
    this.transition(VoiceState.GENERATING, 'generating response');

    // Earlier exchanges land in history before this turn reads it
    await this.persistence;
    if (signal.aborted || this.turn !== turn) {
      return;
    }

    const chatTurn = this.deps.orchestrator.startTurn(
      { message: turn.message, sessionId: this.options.sessionId, signal },
      { ...this.options.profile, persist: false }
    );
    const segmenter = new SpeechSegmenter();

    // Units are synthesized one after another, in the order they were spoken
    let synthesis: Promise<void> = Promise.resolve();
    const enqueue = (unit: string) => {
      synthesis = synthesis.then(() => this.synthesize(turn, unit));
    };

    let failure: unknown;
    try {
      for await (const fragment of chatTurn.fragments()) {
        if (signal.aborted) {
          break;
        }
        this.touch();
        segmenter.push(fragment).forEach(enqueue);
      }

      const rest = segmenter.flush();
      if (rest && !signal.aborted) {
        enqueue(rest);
      }
    } catch (error) {
      failure = error;
    }

    await synthesis;

    if (signal.aborted || this.turn !== turn) {
      return;
    }

    if (failure !== undefined) {
      logger.error({ error: errorMessage(failure) }, 'Voice turn failed');
      this.cancelTurn();
      this.reportError('Failed to generate response');
      this.transition(VoiceState.LISTENING, 'turn failed');
      return;
    }

    turn.generationDone = true;
    await this.maybeFinish(turn);
  }

  private async synthesize(turn: ActiveTurn, text: string): Promise<void> {
    const { signal } = turn.controller;
    if (signal.aborted) {
      return;
    }

    try {
      const audio = await this.deps.tts.synthesize(text, signal);
      if (signal.aborted || this.turn !== turn) {
        return;
      }

      turn.queue.push({ id: ++this.fragmentSeq, text, audio });
      this.touch();
      this.handOver(turn);
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        return;
      }
      logger.warn({ error: errorMessage(error), text }, 'Speech synthesis failed, skipping sentence');
      this.reportError('Speech synthesis failed');
    }
  }

  /**
   * Give the output the next queued fragment, if it is free
   */
  private handOver(turn: ActiveTurn): void {
    if (this.turn !== turn || turn.playing) {
      return;
    }

    const next = turn.queue.shift();
    if (!next) {
      return;
    }

    turn.playing = next;
    turn.spoken.push(next.text);
    this.deps.output.play(next);
    this.emit('response_text', next.text);

    if (this.state !== VoiceState.SPEAKING) {
      this.transition(VoiceState.SPEAKING, 'first audio handed to output');
    }
  }

  private async maybeFinish(turn: ActiveTurn): Promise<void> {
    if (this.turn !== turn || !turn.generationDone || turn.playing || turn.queue.length > 0) {
      return;
    }

    this.turn = undefined;
    this.transition(VoiceState.LISTENING, 'turn complete');
    await this.persistExchange(turn);
  }

  /**
   * Cancels synchronously; the returned promise settles once the cut-off
   * exchange is persisted
   */
  private interrupt(reason: string): Promise<void> {
    const turn = this.turn;
    if (!turn) {
      return Promise.resolve();
    }

    logger.info({ reason, spokenFragments: turn.spoken.length, queued: turn.queue.length }, 'Voice turn interrupted');
    this.cancelTurn();
    this.transition(VoiceState.INTERRUPTED, reason);
    return this.persistExchange(turn);
  }

  private cancelTurn(): void {
    const turn = this.turn;
    if (turn) {
      turn.controller.abort();
      turn.queue = [];
      turn.playing = undefined;
      this.turn = undefined;
    }
    this.deps.output.stop();
  }

  /**
   * Persist the user message plus whatever was actually handed to the output
   */
  private persistExchange(turn: ActiveTurn): Promise<void> {
    const { sessionId } = this.options;
    if (!sessionId || turn.persisted) {
      return this.persistence;
    }
    turn.persisted = true;

    const turns: SessionTurn[] = [{ role: 'user', content: turn.message }];
    const spoken = turn.spoken.join(' ').trim();
    if (spoken) {
      turns.push({ role: 'assistant', content: spoken });
    }

    // Appends are read-modify-write; chaining keeps them from overwriting each other
    this.persistence = this.persistence
      .then(() => this.deps.sessions.append(sessionId, ...turns))
      .catch((error: unknown) => {
        logger.error({ sessionId, error: errorMessage(error) }, 'Failed to persist voice exchange');
      });
    return this.persistence;
  }

  private transition(to: VoiceState, reason: string): void {
    const change: VoiceStateChange = { from: this.state, to, reason };
    this.state = to;
    this.touch();
    logger.debug(change, 'Voice state changed');
    this.emit('state', change);
  }

  private touch(): void {
    this.lastProgressAt = this.clock.now();
  }

  private reportError(message: string): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', message);
    }
  }
}
