/**
 * Document chunks are written by the offline ingestion step, one per
 * markdown section. The API only ever reads them.
 */
export type ChunkCategory = 'career' | 'projects';

export interface ChunkMetadata {
  /** Source document, e.g. `resume.md` */
  source: string;
  category?: string;
  /** Markdown header trail, outermost first */
  headers: string[];
}

export interface DocumentChunk {
  id: string;
  content: string;
  metadata: ChunkMetadata;
}

export interface ScoredChunk {
  chunk: DocumentChunk;
  /** Similarity in [0, 1], 1 = identical */
  score: number;
}

export type RetrievalResult = ScoredChunk[];
