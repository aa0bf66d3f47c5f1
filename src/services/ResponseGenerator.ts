import type { LLMProvider, Message } from '../providers/LLMProvider';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ResponseGenerator' });

export interface GenerateOptions {
  signal?: AbortSignal;
  maxTokens?: number;
  model?: string;
}

/**
 * Response Generator
 * One streaming completion per call, fragments yielded as they arrive.
 * Provider errors are thrown from the iterator and never retried.
 */
export class ResponseGenerator {
  constructor(private llm: LLMProvider) {}

  async *stream(messages: Message[], options: GenerateOptions = {}): AsyncGenerator<string> {
    const startedAt = Date.now();
    let fragments = 0;

    for await (const fragment of this.llm.stream(messages, {
      model: options.model,
      maxTokens: options.maxTokens,
      signal: options.signal
    })) {
      fragments++;
      yield fragment;
    }

    logger.debug(
      {
        provider: this.llm.getName(),
        fragments,
        aborted: options.signal?.aborted ?? false,
        durationMs: Date.now() - startedAt
      },
      'Generation finished'
    );
  }
}
