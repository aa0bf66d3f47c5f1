import type { DocumentChunk } from '../models/DocumentChunk';

export interface VectorQuery {
  text: string;
  topK: number;
  /** Restrict matches to chunks with this metadata category */
  category?: string;
}

export interface VectorMatch {
  chunk: DocumentChunk;
  score: number;
}

/**
 * Vector Index Interface
 * Similarity search over ingested document chunks. Matches come back in
 * index order, which is normally descending score.
 */
export interface VectorIndex {
  query(query: VectorQuery): Promise<VectorMatch[]>;
}
