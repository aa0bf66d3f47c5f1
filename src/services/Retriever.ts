import type { VectorIndex, VectorMatch } from '../providers/VectorIndex';
import type { ChunkCategory, RetrievalResult, ScoredChunk } from '../models/DocumentChunk';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'Retriever' });

const INTENT_KEYWORDS: Record<ChunkCategory, RegExp> = {
  career: /\b(role|job|work(ed|ing)?|employ(er|ed|ment)|compan(y|ies)|career|experience|position|team|manager|hired|resume|cv|intern(ship)?)\b/i,
  projects: /\b(project|projects|built|build|side[- ]project|github|repo|app|demo|portfolio|hackathon|open[- ]source)\b/i
};

/**
 * Infer which document category a query is about. Career wins when both match.
 */
export function inferCategory(query: string): ChunkCategory | undefined {
  if (INTENT_KEYWORDS.career.test(query)) {
    return 'career';
  }
  if (INTENT_KEYWORDS.projects.test(query)) {
    return 'projects';
  }
  return undefined;
}

export interface RetrieverOptions {
  /** Matches scoring below this are dropped */
  minScore: number;
}

/**
 * Retriever
 *
 * Category-filtered search backfilled by an unfiltered one. The category
 * only decides which candidates are fetched; ranking is by raw score.
 */
export class Retriever {
  constructor(
    private index: VectorIndex,
    private options: RetrieverOptions
  ) {}

  async search(query: string, topK: number): Promise<RetrievalResult> {
    const category = inferCategory(query);
    const candidates: VectorMatch[] = [];

    if (category) {
      candidates.push(...(await this.index.query({ text: query, topK, category })));
    }

    // Only candidates that survive the floor count towards filling top-k
    const usable = candidates.filter((match) => match.score >= this.options.minScore).length;
    if (usable < topK) {
      candidates.push(...(await this.index.query({ text: query, topK })));
    }

    const seen = new Set<string>();
    const unique: ScoredChunk[] = [];
    for (const match of candidates) {
      if (seen.has(match.chunk.id)) {
        continue;
      }
      seen.add(match.chunk.id);
      unique.push({ chunk: match.chunk, score: match.score });
    }

    // Array.prototype.sort is stable, so equal scores keep fetch order
    const result = unique
      .filter((match) => match.score >= this.options.minScore)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);

    logger.info(
      {
        category: category ?? 'none',
        candidates: candidates.length,
        returned: result.length,
        scores: result.map((match) => Number(match.score.toFixed(4)))
      },
      'Retrieved context'
    );

    return result;
  }
}

export function sectionPath(headers: string[]): string {
  return headers.join(' > ');
}

/**
 * Render retrieved chunks as numbered, source-annotated context blocks
 */
export function formatContext(result: RetrievalResult): string {
  return result
    .map(({ chunk }, i) => {
      const path = sectionPath(chunk.metadata.headers);
      const label = path ? `${chunk.metadata.source} - ${path}` : chunk.metadata.source;
      return `[${i + 1}] From ${label}:\n${chunk.content}`;
    })
    .join('\n\n');
}
