import { randomUUID } from 'crypto';
import type { KeyValueStore } from '../stores/KeyValueStore';
import { SessionHistorySchema, type SessionTurn } from '../models/Session';
import {
  HISTORY_MESSAGE_MAX_CHARS,
  HISTORY_PROMPT_EXCHANGES,
  SESSION_KEY_PREFIX
} from '../config/constants';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'SessionStore' });

export interface SessionStoreOptions {
  ttlSeconds: number;
  /** Retention window: most recent N turns are kept */
  maxMessages: number;
}

/**
 * Session Store
 *
 * Per-session chat history in the key-value store, shared by the text and
 * voice paths. Every failure degrades to "no history": reads return [] and
 * writes are dropped, so a turn never aborts because the store is down.
 * A null store (Redis not configured) behaves the same way.
 */
export class SessionStore {
  constructor(
    private store: KeyValueStore | null,
    private options: SessionStoreOptions
  ) {}

  get enabled(): boolean {
    return this.store !== null;
  }

  /**
   * Create a session with empty history
   */
  async create(): Promise<string> {
    const sessionId = randomUUID();
    await this.write(sessionId, []);
    logger.info({ sessionId }, 'Session created');
    return sessionId;
  }

  /**
   * Read history; unknown, expired or corrupt sessions read as empty
   */
  async read(sessionId: string): Promise<SessionTurn[]> {
    if (!this.store) {
      return [];
    }

    try {
      const raw = await this.store.get(this.key(sessionId));
      if (!raw) {
        return [];
      }

      const parsed = SessionHistorySchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        logger.warn({ sessionId }, 'Discarding malformed session history');
        return [];
      }
      return parsed.data;
    } catch (error) {
      logger.error({ sessionId, error }, 'Failed to read session history');
      return [];
    }
  }

  /**
   * Append turns, trim to the retention window and refresh the expiry.
   * Read-modify-write: concurrent appends on one session are last-write-wins.
   */
  async append(sessionId: string, ...turns: SessionTurn[]): Promise<void> {
    if (!this.store || turns.length === 0) {
      return;
    }

    const history = await this.read(sessionId);
    history.push(...turns);
    const trimmed = history.slice(-this.options.maxMessages);

    await this.write(sessionId, trimmed);
    logger.debug({ sessionId, total: trimmed.length }, 'Session history saved');
  }

  async delete(sessionId: string): Promise<void> {
    if (!this.store) {
      return;
    }

    try {
      await this.store.del(this.key(sessionId));
      logger.info({ sessionId }, 'Session deleted');
    } catch (error) {
      logger.error({ sessionId, error }, 'Failed to delete session');
    }
  }

  private async write(sessionId: string, history: SessionTurn[]): Promise<void> {
    if (!this.store) {
      return;
    }

    try {
      await this.store.setWithTtl(this.key(sessionId), JSON.stringify(history), this.options.ttlSeconds);
    } catch (error) {
      logger.error({ sessionId, error }, 'Failed to save session history');
    }
  }

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}${sessionId}`;
  }
}

/**
 * Render the most recent exchanges for inclusion in a system prompt
 */
export function formatHistory(history: SessionTurn[], maxExchanges: number = HISTORY_PROMPT_EXCHANGES): string {
  if (history.length === 0) {
    return '';
  }

  return history
    .slice(-(maxExchanges * 2))
    .map((turn) => {
      const speaker = turn.role === 'user' ? 'User' : 'Assistant';
      const content =
        turn.content.length > HISTORY_MESSAGE_MAX_CHARS
          ? `${turn.content.slice(0, HISTORY_MESSAGE_MAX_CHARS)}...`
          : turn.content;
      return `${speaker}: ${content}`;
    })
    .join('\n');
}
