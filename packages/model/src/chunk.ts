/**
 * Payload stored with every embedded chunk
 */
export interface ChunkPayload {
  /** `{ticker}_{chunkNumber padded to 4 digits}` */
  chunkId: string;
  ticker: string;
  /** 1-based position of the chunk within the document */
  chunkNumber: number;
  content: string;
  documentId: string;
  filename: string;
  totalPages: number;
  successfulPages: number;
  source: string;
  /** ISO-8601 timestamp */
  embeddedAt: string;
}

export interface SearchHit {
  chunkId: string;
  ticker: string;
  chunkNumber: number;
  content: string;
  score: number;
  metadata: ChunkPayload;
}

export interface HybridSearchHit extends SearchHit {
  /** Weighted vector contribution, 0 when absent from the vector results */
  vectorScore: number;
  /** Weighted keyword contribution, 0 when absent from the keyword results */
  keywordScore: number;
}
