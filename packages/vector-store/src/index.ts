export {
  ChunkEmbeddingPipeline,
  DEFAULT_KEYWORD_WEIGHT,
  DEFAULT_SEARCH_LIMIT,
  DEFAULT_VECTOR_WEIGHT,
} from './core/chunk-embedding-pipeline';
export type {
  ChunkEmbeddingPipelineOptions,
  CollectionInfo,
  DocumentSource,
  EmbedOptions,
  EmbedResult,
  EmbeddedDocumentInfo,
} from './core/chunk-embedding-pipeline';
export {
  AiSdkTextEmbedder,
  DEFAULT_EMBEDDING_BATCH_SIZE,
} from './embedders/ai-sdk-text-embedder';
export type { AiSdkTextEmbedderOptions } from './embedders/ai-sdk-text-embedder';
export type { TextEmbedder } from './embedders/text-embedder';
export { EmbeddingPreconditionError } from './errors/embedding-precondition-error';
export type { EmbeddingPreconditionReason } from './errors/embedding-precondition-error';
export { VectorStoreError } from './errors/vector-store-error';
export { InMemoryVectorIndex } from './indexes/in-memory-vector-index';
export { QdrantVectorIndex } from './indexes/qdrant-vector-index';
export type { QdrantIndexClient } from './indexes/qdrant-vector-index';
export type {
  IndexedChunk,
  ScoredChunk,
  VectorIndex,
  VectorIndexDescription,
} from './indexes/vector-index';
export {
  DEFAULT_SEPARATORS,
  RecursiveCharacterTextSplitter,
} from './splitters/recursive-character-text-splitter';
export type { TextSplitterOptions } from './splitters/recursive-character-text-splitter';
export { chunkPayloadSchema, parseChunkPayload } from './types/chunk-payload-schema';
export { chunkPointId, formatChunkId } from './utils/chunk-id';
