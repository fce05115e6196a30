import type { LoggerMethods } from '@reportrag/logger';
import type { ChunkPayload } from '@reportrag/model';
import type { QdrantClient } from '@qdrant/js-client-rest';

import type {
  IndexedChunk,
  ScoredChunk,
  VectorIndex,
  VectorIndexDescription,
} from './vector-index';

import { parseChunkPayload } from '../types/chunk-payload-schema';
import { chunkPointId } from '../utils/chunk-id';

/** Subset of the Qdrant REST client used by the index */
export type QdrantIndexClient = Pick<
  QdrantClient,
  | 'getCollections'
  | 'createCollection'
  | 'createPayloadIndex'
  | 'upsert'
  | 'count'
  | 'delete'
  | 'search'
  | 'scroll'
  | 'getCollection'
>;

/** Lowercased copy of `content` kept beside it for keyword matching */
const KEYWORD_FIELD = 'contentLower';

function tickerFilter(ticker: string) {
  return { must: [{ key: 'ticker', match: { value: ticker } }] };
}

/**
 * VectorIndex backed by a Qdrant collection.
 *
 * Points use cosine distance and `ticker` carries a keyword index. Keyword
 * search is a case-insensitive substring match: every point also stores its
 * content lowercased, and a `text` match on a field without a full-text index
 * is a plain substring test in Qdrant.
 */
export class QdrantVectorIndex implements VectorIndex {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly client: QdrantIndexClient,
    private readonly collectionName: string,
  ) {}

  async ensureCollection(dimension: number): Promise<void> {
    const { collections } = await this.client.getCollections();
    if (collections.some((collection) => collection.name === this.collectionName)) {
      this.logger.debug(
        `[QdrantVectorIndex] Collection ${this.collectionName} already exists`,
      );
      return;
    }

    await this.client.createCollection(this.collectionName, {
      vectors: { size: dimension, distance: 'Cosine' },
    });
    await this.client.createPayloadIndex(this.collectionName, {
      field_name: 'ticker',
      field_schema: 'keyword',
      wait: true,
    });
    this.logger.info(
      `[QdrantVectorIndex] Created collection ${this.collectionName} (dimension ${dimension})`,
    );
  }

  async upsert(chunks: IndexedChunk[]): Promise<void> {
    if (chunks.length === 0) return;

    await this.client.upsert(this.collectionName, {
      wait: true,
      points: chunks.map(({ payload, vector }) => ({
        id: chunkPointId(payload.chunkId),
        vector,
        payload: { ...payload, [KEYWORD_FIELD]: payload.content.toLowerCase() },
      })),
    });
  }

  async deleteByTicker(ticker: string): Promise<number> {
    const existing = await this.countByTicker(ticker);
    if (existing === 0) return 0;

    await this.client.delete(this.collectionName, {
      wait: true,
      filter: tickerFilter(ticker),
    });
    return existing;
  }

  async countByTicker(ticker: string): Promise<number> {
    const { count } = await this.client.count(this.collectionName, {
      filter: tickerFilter(ticker),
      exact: true,
    });
    return count;
  }

  async search(vector: number[], limit: number): Promise<ScoredChunk[]> {
    const points = await this.client.search(this.collectionName, {
      vector,
      limit,
      with_payload: true,
    });
    return points.map((point) => ({
      payload: parseChunkPayload(point.id, point.payload),
      score: point.score,
    }));
  }

  async matchText(query: string, limit: number): Promise<ChunkPayload[]> {
    const { points } = await this.client.scroll(this.collectionName, {
      filter: { must: [{ key: KEYWORD_FIELD, match: { text: query.toLowerCase() } }] },
      limit,
      with_payload: true,
      with_vector: false,
    });
    return points.map((point) => parseChunkPayload(point.id, point.payload));
  }

  async describe(): Promise<VectorIndexDescription> {
    const info = await this.client.getCollection(this.collectionName);
    return {
      name: this.collectionName,
      pointsCount: info.points_count ?? 0,
      status: info.status,
    };
  }
}
