import type { Message } from '../providers/LLMProvider';
import type { RetrievalResult } from '../models/DocumentChunk';
import type { SessionTurn } from '../models/Session';
import { buildChatSystemPrompt } from '../prompts/chatPrompt';
import { buildVoiceSystemPrompt } from '../prompts/voicePrompt';
import { formatContext } from './Retriever';
import { formatHistory } from './SessionStore';

export type PromptKind = 'chat' | 'voice';

/**
 * Assemble the completion request for one turn: system prompt carrying the
 * grounding rule, retrieved context and recent history, then the user message.
 */
export function assemblePrompt(
  kind: PromptKind,
  message: string,
  result: RetrievalResult,
  history: SessionTurn[]
): Message[] {
  const context = formatContext(result);
  const renderedHistory = formatHistory(history);
  const system =
    kind === 'voice'
      ? buildVoiceSystemPrompt(context, renderedHistory)
      : buildChatSystemPrompt(context, renderedHistory);

  return [
    { role: 'system', content: system },
    { role: 'user', content: message }
  ];
}
