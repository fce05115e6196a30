import type { ChunkPayload } from '@reportrag/model';

import type {
  IndexedChunk,
  ScoredChunk,
  VectorIndex,
  VectorIndexDescription,
} from './vector-index';

function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Process-local VectorIndex.
 *
 * Keyword matching is a case-insensitive substring test on chunk content.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private readonly points = new Map<string, IndexedChunk>();
  private dimension: number | null = null;

  constructor(private readonly name = 'in-memory') {}

  async ensureCollection(dimension: number): Promise<void> {
    this.dimension ??= dimension;
  }

  async upsert(chunks: IndexedChunk[]): Promise<void> {
    for (const chunk of chunks) {
      if (this.dimension !== null && chunk.vector.length !== this.dimension) {
        throw new Error(
          `Vector for ${chunk.payload.chunkId} has dimension ${chunk.vector.length}, expected ${this.dimension}`,
        );
      }
      this.points.set(chunk.payload.chunkId, structuredClone(chunk));
    }
  }

  async deleteByTicker(ticker: string): Promise<number> {
    let deleted = 0;
    for (const [chunkId, chunk] of this.points) {
      if (chunk.payload.ticker === ticker) {
        this.points.delete(chunkId);
        deleted++;
      }
    }
    return deleted;
  }

  async countByTicker(ticker: string): Promise<number> {
    return [...this.points.values()].filter(
      (chunk) => chunk.payload.ticker === ticker,
    ).length;
  }

  async search(vector: number[], limit: number): Promise<ScoredChunk[]> {
    return [...this.points.values()]
      .map((chunk) => ({
        payload: { ...chunk.payload },
        score: cosineSimilarity(vector, chunk.vector),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  async matchText(query: string, limit: number): Promise<ChunkPayload[]> {
    const needle = query.toLowerCase();
    return [...this.points.values()]
      .filter((chunk) => chunk.payload.content.toLowerCase().includes(needle))
      .slice(0, limit)
      .map((chunk) => ({ ...chunk.payload }));
  }

  async describe(): Promise<VectorIndexDescription> {
    return { name: this.name, pointsCount: this.points.size, status: 'green' };
  }
}
