import { z } from 'zod';
import type { LLMProvider } from '../providers/LLMProvider';
import type { SessionTurn } from '../models/Session';
import { INTERPRETER_SYSTEM_PROMPT, buildInterpreterUserPrompt } from '../prompts/interpreterPrompt';
import { formatHistory } from './SessionStore';
import { errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'QueryInterpreter' });

export type Interpretation =
  | { kind: 'early-exit'; response: string }
  | { kind: 'retrieve'; query: string };

type FillerKind = 'greeting' | 'thanks' | 'farewell' | 'acknowledgement';

const FILLERS: Array<{ kind: FillerKind; pattern: RegExp; response: string }> = [
  {
    kind: 'greeting',
    pattern: /^(hi|hello|hey|hiya|howdy|yo|good (morning|afternoon|evening))( there)?$/,
    response: "Hi! Ask me anything about my experience, skills or projects."
  },
  {
    kind: 'thanks',
    pattern: /^(thanks|thank you|thanks a lot|thank you so much|many thanks|thx|ty|cheers)$/,
    response: "You're welcome! Is there anything else you'd like to know?"
  },
  {
    kind: 'farewell',
    pattern: /^(bye|goodbye|bye bye|see you|see ya|later|good night)$/,
    response: 'Thanks for stopping by. Goodbye!'
  },
  {
    kind: 'acknowledgement',
    pattern: /^(ok|okay|cool|great|nice|awesome|perfect|alright|got it|sounds good)$/,
    response: 'Great! Let me know if you have any other questions.'
  }
];

const InterpreterReplySchema = z.object({
  needs_retrieval: z.boolean(),
  refined_query: z.string().default(''),
  direct_response: z.string().nullish()
});

function normalize(message: string): string {
  return message
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Match conversational filler locally; undefined when the message is substantive
 */
export function matchFiller(message: string): { kind: FillerKind; response: string } | undefined {
  const normalized = normalize(message);
  const filler = FILLERS.find(({ pattern }) => pattern.test(normalized));
  return filler ? { kind: filler.kind, response: filler.response } : undefined;
}

export interface QueryInterpreterOptions {
  model?: string;
  timeoutMs?: number;
}

/**
 * Query Interpreter
 *
 * Decides whether a message needs retrieval and rewrites it into a
 * standalone search query. Never fails a turn: any problem falls back to
 * retrieving with the raw message.
 */
export class QueryInterpreter {
  constructor(
    private llm: LLMProvider,
    private options: QueryInterpreterOptions = {}
  ) {}

  async classify(message: string, history: SessionTurn[] = []): Promise<Interpretation> {
    const filler = matchFiller(message);
    if (filler) {
      logger.debug({ filler: filler.kind }, 'Conversational filler, skipping retrieval');
      return { kind: 'early-exit', response: filler.response };
    }

    try {
      const raw = await this.llm.complete(
        [
          { role: 'system', content: INTERPRETER_SYSTEM_PROMPT },
          { role: 'user', content: buildInterpreterUserPrompt(message, formatHistory(history)) }
        ],
        {
          model: this.options.model,
          maxTokens: 200,
          temperature: 0,
          json: true,
          signal: AbortSignal.timeout(this.options.timeoutMs ?? 5000)
        }
      );

      const reply = InterpreterReplySchema.parse(JSON.parse(raw));
      const directResponse = reply.direct_response?.trim();

      if (!reply.needs_retrieval && directResponse) {
        return { kind: 'early-exit', response: directResponse };
      }

      const refined = reply.refined_query.trim();
      if (!refined) {
        return { kind: 'retrieve', query: message };
      }

      logger.debug({ refined }, 'Query refined');
      return { kind: 'retrieve', query: refined };
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Interpreter failed, retrieving with raw message');
      return { kind: 'retrieve', query: message };
    }
  }
}
