import { Index } from '@upstash/vector';
import { z } from 'zod';
import type { Embedder } from '../Embedder';
import type { VectorIndex, VectorMatch, VectorQuery } from '../VectorIndex';
import type { ChunkMetadata } from '../../models/DocumentChunk';
import { UpstreamError, errorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger({ service: 'UpstashVectorIndex' });

// Layout written by the ingestion step: chunk text under `text`, markdown
// headers as `Header 1`, `Header 2`, ...
const StoredMetadataSchema = z
  .object({
    text: z.string().optional(),
    file_name: z.string().optional(),
    category: z.string().optional()
  })
  .passthrough();

export function extractHeaders(metadata: Record<string, unknown>): string[] {
  return Object.keys(metadata)
    .filter((key) => key.toLowerCase().startsWith('header'))
    .sort()
    .map((key) => metadata[key])
    .filter((value): value is string => typeof value === 'string' && value.trim() !== '')
    .map((value) => value.trim());
}

export function categoryFilter(category: string): string {
  return `category = '${category.replace(/'/g, "\\'")}'`;
}

export interface UpstashVectorIndexConfig {
  url: string;
  token: string;
  namespace: string;
}

/**
 * Upstash Vector backed chunk index, queried with OpenAI embeddings
 */
export class UpstashVectorIndex implements VectorIndex {
  private index: Index;
  private namespace: string;
  /** A backfilled search queries twice with the same text */
  private lastEmbedding?: { text: string; vector: Promise<number[]> };

  constructor(config: UpstashVectorIndexConfig, private embedder: Embedder) {
    this.index = new Index({ url: config.url, token: config.token });
    this.namespace = config.namespace;
  }

  async query(query: VectorQuery): Promise<VectorMatch[]> {
    const vector = await this.embed(query.text);

    try {
      const results = await this.index.namespace(this.namespace).query({
        vector,
        topK: query.topK,
        includeMetadata: true,
        includeData: true,
        ...(query.category ? { filter: categoryFilter(query.category) } : {})
      });

      return results.map((result): VectorMatch => {
        const raw: Record<string, unknown> = result.metadata ?? {};
        const parsed = StoredMetadataSchema.safeParse(raw);
        const stored = parsed.success ? parsed.data : {};

        const metadata: ChunkMetadata = {
          source: stored.file_name ?? 'Unknown',
          category: stored.category,
          headers: extractHeaders(raw)
        };

        return {
          chunk: {
            id: String(result.id),
            content: (stored.text ?? result.data ?? '').trim(),
            metadata
          },
          score: result.score
        };
      });
    } catch (error) {
      logger.error({ namespace: this.namespace, error: errorMessage(error) }, 'Vector query failed');
      throw new UpstreamError('upstash-vector', errorMessage(error), false, { cause: error });
    }
  }

  private embed(text: string): Promise<number[]> {
    if (this.lastEmbedding?.text === text) {
      return this.lastEmbedding.vector;
    }

    const vector = this.embedder.embed(text);
    const entry = { text, vector };
    this.lastEmbedding = entry;
    vector.catch(() => {
      // Failed embeddings are not reused; the caller sees the rejection
      if (this.lastEmbedding === entry) {
        this.lastEmbedding = undefined;
      }
    });
    return vector;
  }
}
