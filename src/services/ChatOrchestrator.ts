import { EventEmitter } from 'events';
import type { SessionStore } from './SessionStore';
import type { QueryInterpreter } from './QueryInterpreter';
import type { Retriever } from './Retriever';
import type { ResponseGenerator } from './ResponseGenerator';
import { assemblePrompt, type PromptKind } from './PromptBuilder';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ChatOrchestrator' });

export enum ChatTurnState {
  RECEIVED = 'received',
  INTERPRETING = 'interpreting',
  EARLY_EXIT = 'early_exit',
  RETRIEVING = 'retrieving',
  GENERATING = 'generating',
  PERSISTING = 'persisting',
  DONE = 'done'
}

/**
 * Per-surface turn settings (text chat, voice)
 */
export interface TurnProfile {
  prompt: PromptKind;
  topK: number;
  maxTokens: number;
  model?: string;
  /** Append the exchange to the session when the turn completes */
  persist: boolean;
}

export interface ChatTurnInput {
  /** Already validated */
  message: string;
  sessionId?: string;
  signal?: AbortSignal;
}

export interface ChatOrchestratorDeps {
  sessions: SessionStore;
  interpreter: QueryInterpreter;
  retriever: Retriever;
  generator: ResponseGenerator;
}

/**
 * One conversation turn. Emits `state` (ChatTurnState) as it progresses;
 * attach listeners before iterating `fragments()`.
 */
export class ChatTurn extends EventEmitter {
  private started = false;
  private state: ChatTurnState = ChatTurnState.RECEIVED;

  constructor(
    private deps: ChatOrchestratorDeps,
    private input: ChatTurnInput,
    private profile: TurnProfile
  ) {
    super();
  }

  getState(): ChatTurnState {
    return this.state;
  }

  /**
   * Run the turn, yielding response text fragments unbuffered.
   * Errors from retrieval or generation propagate to the consumer.
   */
  async *fragments(): AsyncGenerator<string> {
    if (this.started) {
      throw new Error('Chat turn already started');
    }
    this.started = true;

    const { message, sessionId, signal } = this.input;
    const { sessions, interpreter, retriever, generator } = this.deps;

    this.transition(ChatTurnState.RECEIVED);
    const history = sessionId ? await sessions.read(sessionId) : [];

    this.transition(ChatTurnState.INTERPRETING);
    const interpretation = await interpreter.classify(message, history);

    let output = '';

    if (interpretation.kind === 'early-exit') {
      this.transition(ChatTurnState.EARLY_EXIT);
      output = interpretation.response;
      yield interpretation.response;
    } else {
      this.transition(ChatTurnState.RETRIEVING);
      const result = await retriever.search(interpretation.query, this.profile.topK);
      const messages = assemblePrompt(this.profile.prompt, message, result, history);

      this.transition(ChatTurnState.GENERATING);
      for await (const fragment of generator.stream(messages, {
        signal,
        maxTokens: this.profile.maxTokens,
        model: this.profile.model
      })) {
        output += fragment;
        yield fragment;
      }
    }

    if (signal?.aborted) {
      logger.info({ sessionId }, 'Turn aborted, exchange not persisted');
    } else if (this.profile.persist && sessionId && output) {
      this.transition(ChatTurnState.PERSISTING);
      await sessions.append(
        sessionId,
        { role: 'user', content: message },
        { role: 'assistant', content: output }
      );
    }

    this.transition(ChatTurnState.DONE);
  }

  private transition(next: ChatTurnState): void {
    this.state = next;
    this.emit('state', next);
  }
}

/**
 * Chat Orchestrator
 * Interpret → retrieve → generate → persist, shared by the text and voice surfaces.
 */
export class ChatOrchestrator {
  constructor(private deps: ChatOrchestratorDeps) {}

  startTurn(input: ChatTurnInput, profile: TurnProfile): ChatTurn {
    logger.info(
      { sessionId: input.sessionId, surface: profile.prompt, preview: input.message.slice(0, 100) },
      'Turn started'
    );
    return new ChatTurn(this.deps, input, profile);
  }
}
