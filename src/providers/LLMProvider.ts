/**
 * Large Language Model Provider Interface
 * Allows swapping between OpenAI GPT, local models, etc.
 */

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Ask for a JSON object reply */
  json?: boolean;
  signal?: AbortSignal;
}

export interface LLMProvider {
  /**
   * Generate a complete response
   * @returns Generated response text
   */
  complete(messages: Message[], options?: CompletionOptions): Promise<string>;

  /**
   * Stream a response as text fragments in arrival order.
   * Stopping iteration early or aborting `options.signal` closes the request.
   */
  stream(messages: Message[], options?: CompletionOptions): AsyncIterable<string>;

  /**
   * Get provider name for logging
   */
  getName(): string;
}
