import type { LoggerMethods } from '@reportrag/logger';
import type {
  CanonicalDocument,
  ChunkPayload,
  HybridSearchHit,
  SearchHit,
} from '@reportrag/model';

import type { TextEmbedder } from '../embedders/text-embedder';
import type { VectorIndex, VectorIndexDescription } from '../indexes/vector-index';
import type { RecursiveCharacterTextSplitter } from '../splitters/recursive-character-text-splitter';

import { KeyedLock } from '@reportrag/shared';

import { EmbeddingPreconditionError } from '../errors/embedding-precondition-error';
import { VectorStoreError } from '../errors/vector-store-error';
import { formatChunkId } from '../utils/chunk-id';

export const DEFAULT_SEARCH_LIMIT = 10;
export const DEFAULT_VECTOR_WEIGHT = 0.7;
export const DEFAULT_KEYWORD_WEIGHT = 0.3;

/**
 * Where stored documents are read from
 */
export interface DocumentSource {
  getByTicker(ticker: string): Promise<CanonicalDocument | null>;
}

export interface ChunkEmbeddingPipelineOptions {
  documents: DocumentSource;
  index: VectorIndex;
  embedder: TextEmbedder;
  splitter: RecursiveCharacterTextSplitter;
  /** Vector dimension the index is created with */
  dimension: number;
  now?: () => Date;
}

export interface EmbedOptions {
  /** Remove the ticker's existing chunks before inserting (default: true) */
  deduplicate?: boolean;
}

export interface EmbeddedDocumentInfo {
  documentId: string;
  filename: string;
  totalPages: number;
  successfulPages: number;
}

export type EmbedResult =
  | {
      success: true;
      ticker: string;
      chunksCount: number;
      deletedCount: number;
      deduplicated: boolean;
      documentInfo: EmbeddedDocumentInfo;
    }
  | {
      success: false;
      ticker: string;
      error: EmbeddingPreconditionError;
    };

export interface CollectionInfo extends VectorIndexDescription {
  embeddingModel: string;
  chunkSize: number;
  chunkOverlap: number;
}

function toSearchHit(payload: ChunkPayload, score: number): SearchHit {
  return {
    chunkId: payload.chunkId,
    ticker: payload.ticker,
    chunkNumber: payload.chunkNumber,
    content: payload.content,
    score,
    metadata: payload,
  };
}

function assertWeight(name: string, weight: number): void {
  if (!(weight >= 0 && weight <= 1)) {
    throw new RangeError(`${name} must be between 0 and 1, got ${weight}`);
  }
}

/**
 * Chunks stored documents, embeds the chunks and serves searches over them.
 *
 * Re-embedding a ticker replaces its chunks: new vectors are computed first,
 * then the ticker's old points are deleted and the new ones inserted. Work for
 * one ticker is serialised within the process. Nothing here is transactional
 * with the document store.
 */
export class ChunkEmbeddingPipeline {
  private readonly documents: DocumentSource;
  private readonly index: VectorIndex;
  private readonly embedder: TextEmbedder;
  private readonly splitter: RecursiveCharacterTextSplitter;
  private readonly dimension: number;
  private readonly now: () => Date;
  private readonly lock = new KeyedLock();

  constructor(
    private readonly logger: LoggerMethods,
    options: ChunkEmbeddingPipelineOptions,
  ) {
    this.documents = options.documents;
    this.index = options.index;
    this.embedder = options.embedder;
    this.splitter = options.splitter;
    this.dimension = options.dimension;
    this.now = options.now ?? (() => new Date());
  }

  async initialize(): Promise<void> {
    await this.wrap('Failed to initialize vector collection', () =>
      this.index.ensureCollection(this.dimension),
    );
  }

  async embedAndStore(ticker: string, options: EmbedOptions = {}): Promise<EmbedResult> {
    const deduplicate = options.deduplicate ?? true;
    return this.lock.runExclusive(ticker, () =>
      this.embedTicker(ticker, deduplicate),
    );
  }

  async searchVector(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<SearchHit[]> {
    const hits = await this.wrap(`Vector search failed for "${query}"`, async () => {
      const vector = await this.embedder.embedQuery(query);
      return this.index.search(vector, limit);
    });
    this.logger.info(
      `[ChunkEmbeddingPipeline] Vector search "${query}": ${hits.length} hits`,
    );
    return hits.map((hit) => toSearchHit(hit.payload, hit.score));
  }

  /**
   * Chunks containing the query text, each scored 1
   */
  async searchKeyword(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<SearchHit[]> {
    const matches = await this.wrap(`Keyword search failed for "${query}"`, () =>
      this.index.matchText(query, limit),
    );
    this.logger.info(
      `[ChunkEmbeddingPipeline] Keyword search "${query}": ${matches.length} hits`,
    );
    return matches.map((payload) => toSearchHit(payload, 1));
  }

  /**
   * Weighted blend of vector and keyword search.
   *
   * Each hit scores `vectorScore * vectorWeight + keywordScore * keywordWeight`;
   * a hit missing from one result set contributes 0 from it. Ties keep vector
   * results ahead of keyword-only results.
   */
  async searchHybrid(
    query: string,
    limit = DEFAULT_SEARCH_LIMIT,
    vectorWeight = DEFAULT_VECTOR_WEIGHT,
    keywordWeight = DEFAULT_KEYWORD_WEIGHT,
  ): Promise<HybridSearchHit[]> {
    assertWeight('Vector weight', vectorWeight);
    assertWeight('Keyword weight', keywordWeight);

    const [vectorHits, keywordHits] = await Promise.all([
      this.searchVector(query, limit),
      this.searchKeyword(query, limit),
    ]);

    const merged = new Map<string, HybridSearchHit>();
    for (const hit of vectorHits) {
      const vectorScore = hit.score * vectorWeight;
      merged.set(hit.chunkId, { ...hit, score: vectorScore, vectorScore, keywordScore: 0 });
    }
    for (const hit of keywordHits) {
      const keywordScore = hit.score * keywordWeight;
      const existing = merged.get(hit.chunkId);
      if (existing) {
        existing.keywordScore += keywordScore;
        existing.score += keywordScore;
      } else {
        merged.set(hit.chunkId, { ...hit, score: keywordScore, vectorScore: 0, keywordScore });
      }
    }

    return [...merged.values()].sort((a, b) => b.score - a.score).slice(0, limit);
  }

  async documentExists(ticker: string): Promise<boolean> {
    const count = await this.wrap(`Failed to count chunks for ticker ${ticker}`, () =>
      this.index.countByTicker(ticker),
    );
    return count > 0;
  }

  async deleteByTicker(ticker: string): Promise<number> {
    return this.lock.runExclusive(ticker, async () => {
      const deleted = await this.wrap(`Failed to delete chunks for ticker ${ticker}`, () =>
        this.index.deleteByTicker(ticker),
      );
      this.logger.info(
        `[ChunkEmbeddingPipeline] Deleted ${deleted} chunks for ticker ${ticker}`,
      );
      return deleted;
    });
  }

  async getCollectionInfo(): Promise<CollectionInfo> {
    const description = await this.wrap('Failed to describe vector collection', () =>
      this.index.describe(),
    );
    return {
      ...description,
      embeddingModel: this.embedder.modelName,
      chunkSize: this.splitter.chunkSize,
      chunkOverlap: this.splitter.chunkOverlap,
    };
  }

  private async embedTicker(ticker: string, deduplicate: boolean): Promise<EmbedResult> {
    this.logger.info(`[ChunkEmbeddingPipeline] Embedding ticker ${ticker}`);

    const document = await this.wrap(`Failed to load document for ticker ${ticker}`, () =>
      this.documents.getByTicker(ticker),
    );
    if (!document) {
      return this.fail(ticker, 'not_found', `No document found for ticker ${ticker}`);
    }
    if (document.successFlag !== 'complete') {
      return this.fail(
        ticker,
        'incomplete',
        `Document for ticker ${ticker} is ${document.successFlag}; only complete documents are embedded`,
      );
    }
    if (document.parsedContent.trim() === '') {
      return this.fail(ticker, 'empty_content', `Document for ticker ${ticker} has no content`);
    }

    const embeddedAt = this.now().toISOString();
    const payloads: ChunkPayload[] = this.splitter
      .splitText(document.parsedContent)
      .map((content, index) => ({
        chunkId: formatChunkId(ticker, index + 1),
        ticker,
        chunkNumber: index + 1,
        content,
        documentId: document.id,
        filename: document.filename,
        totalPages: document.totalPages,
        successfulPages: document.successfulPages,
        source: `report://${ticker}`,
        embeddedAt,
      }));

    const vectors = await this.wrap(`Failed to embed chunks for ticker ${ticker}`, () =>
      this.embedder.embedDocuments(payloads.map((payload) => payload.content)),
    );
    if (vectors.length !== payloads.length) {
      throw new VectorStoreError(
        `Embedder returned ${vectors.length} vectors for ${payloads.length} chunks of ticker ${ticker}`,
      );
    }

    const deletedCount = deduplicate
      ? await this.wrap(`Failed to delete chunks for ticker ${ticker}`, () =>
          this.index.deleteByTicker(ticker),
        )
      : 0;

    await this.wrap(`Failed to store chunks for ticker ${ticker}`, () =>
      this.index.upsert(
        payloads.map((payload, index) => ({ payload, vector: vectors[index] ?? [] })),
      ),
    );

    this.logger.info(
      `[ChunkEmbeddingPipeline] Stored ${payloads.length} chunks for ticker ${ticker} (replaced ${deletedCount})`,
    );

    return {
      success: true,
      ticker,
      chunksCount: payloads.length,
      deletedCount,
      deduplicated: deduplicate,
      documentInfo: {
        documentId: document.id,
        filename: document.filename,
        totalPages: document.totalPages,
        successfulPages: document.successfulPages,
      },
    };
  }

  private fail(
    ticker: string,
    reason: EmbeddingPreconditionError['reason'],
    message: string,
  ): EmbedResult {
    this.logger.warn(`[ChunkEmbeddingPipeline] ${message}`);
    return {
      success: false,
      ticker,
      error: new EmbeddingPreconditionError(ticker, reason, message),
    };
  }

  private async wrap<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const wrapped = VectorStoreError.fromError(context, error);
      this.logger.error(`[ChunkEmbeddingPipeline] ${wrapped.message}`);
      throw wrapped;
    }
  }
}
