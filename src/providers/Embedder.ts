/**
 * Text embedding provider used to query the vector index
 */
export interface Embedder {
  embed(text: string): Promise<number[]>;
}
