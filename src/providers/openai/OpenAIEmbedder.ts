import OpenAI from 'openai';
import type { Embedder } from '../Embedder';
import { UpstreamError, errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'OpenAIEmbedder' });

/**
 * OpenAI embeddings; model and dimensions must match the ones used at ingestion
 */
export class OpenAIEmbedder implements Embedder {
  constructor(
    private openai: OpenAI,
    private model: string = 'text-embedding-3-small',
    private dimensions: number = 1536
  ) {}

  async embed(text: string): Promise<number[]> {
    try {
      const response = await this.openai.embeddings.create({
        model: this.model,
        input: text,
        dimensions: this.dimensions
      });

      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw new Error('Empty embedding response');
      }
      return embedding;
    } catch (error) {
      logger.error({ model: this.model, error: errorMessage(error) }, 'Embedding request failed');
      throw new UpstreamError('openai-embeddings', errorMessage(error), false, { cause: error });
    }
  }
}
