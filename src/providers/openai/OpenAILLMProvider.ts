import OpenAI from 'openai';
import type { CompletionOptions, LLMProvider, Message } from '../LLMProvider';
import { UpstreamError, errorMessage, isAbortError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'OpenAILLMProvider' });

function toParam(message: Message): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

function isRetryable(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) {
    return true;
  }
  return error instanceof OpenAI.APIError && typeof error.status === 'number' && error.status >= 500;
}

/**
 * OpenAI GPT Language Model Provider
 */
export class OpenAILLMProvider implements LLMProvider {
  private openai: OpenAI;
  private model: string;

  constructor(client: OpenAI, model: string = 'gpt-4.1-mini') {
    this.openai = client;
    this.model = model;
  }

  async complete(messages: Message[], options: CompletionOptions = {}): Promise<string> {
    const model = options.model || this.model;

    try {
      const response = await this.openai.chat.completions.create(
        {
          model,
          messages: messages.map(toParam),
          temperature: options.temperature ?? 0.2,
          max_completion_tokens: options.maxTokens,
          ...(options.json ? { response_format: { type: 'json_object' as const } } : {})
        },
        { signal: options.signal }
      );

      return response.choices[0]?.message?.content ?? '';
    } catch (error) {
      logger.error({ model, error: errorMessage(error) }, 'OpenAI completion failed');
      throw new UpstreamError('openai', errorMessage(error), isRetryable(error), { cause: error });
    }
  }

  async *stream(messages: Message[], options: CompletionOptions = {}): AsyncGenerator<string> {
    const model = options.model || this.model;
    let completed = false;

    let stream: Awaited<ReturnType<OpenAILLMProvider['openStream']>>;
    try {
      stream = await this.openStream(messages, model, options);
    } catch (error) {
      if (options.signal?.aborted && isAbortError(error)) {
        return;
      }
      logger.error({ model, error: errorMessage(error) }, 'OpenAI stream request failed');
      throw new UpstreamError('openai', errorMessage(error), isRetryable(error), { cause: error });
    }

    try {
      for await (const chunk of stream) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          yield content;
        }
      }
      completed = true;
    } catch (error) {
      if (options.signal?.aborted && isAbortError(error)) {
        return;
      }
      logger.error({ model, error: errorMessage(error) }, 'OpenAI stream failed mid-response');
      throw new UpstreamError('openai', errorMessage(error), false, { cause: error });
    } finally {
      // Consumer stopped early: release the HTTP connection
      if (!completed) {
        stream.controller.abort();
      }
    }
  }

  getName(): string {
    return `OpenAI ${this.model}`;
  }

  private openStream(messages: Message[], model: string, options: CompletionOptions) {
    return this.openai.chat.completions.create(
      {
        model,
        messages: messages.map(toParam),
        temperature: options.temperature ?? 0.3,
        max_completion_tokens: options.maxTokens,
        stream: true
      },
      { signal: options.signal }
    );
  }
}
