import type { ChunkPayload } from '@reportrag/model';

export interface IndexedChunk {
  payload: ChunkPayload;
  vector: number[];
}

export interface ScoredChunk {
  payload: ChunkPayload;
  score: number;
}

export interface VectorIndexDescription {
  name: string;
  pointsCount: number;
  status: string;
}

/**
 * Storage for embedded chunks.
 *
 * A chunk is addressed by its `chunkId`; upserting the same id twice keeps
 * one point.
 */
export interface VectorIndex {
  /** Create the collection and payload indexes when missing */
  ensureCollection(dimension: number): Promise<void>;
  upsert(chunks: IndexedChunk[]): Promise<void>;
  /** @returns Number of points removed */
  deleteByTicker(ticker: string): Promise<number>;
  countByTicker(ticker: string): Promise<number>;
  /** Nearest neighbours by cosine similarity, best first */
  search(vector: number[], limit: number): Promise<ScoredChunk[]>;
  /** Chunks whose content contains the query text */
  matchText(query: string, limit: number): Promise<ChunkPayload[]>;
  describe(): Promise<VectorIndexDescription>;
}
