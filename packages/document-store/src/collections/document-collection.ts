import type {
  CanonicalDocument,
  CanonicalDocumentFields,
  DocumentStatus,
} from '@reportrag/model';

export interface ListQuery {
  skip: number;
  limit: number;
  status?: DocumentStatus;
}

/**
 * Documents sharing one ticker
 */
export interface DuplicateGroup {
  ticker: string;
  /** Document ids, most recently updated first */
  ids: string[];
}

/**
 * Storage driver behind the document store gateway.
 *
 * Implementations never interpret ids they did not issue: a malformed id is
 * simply not found.
 */
export interface DocumentCollection {
  /**
   * Update the most recently updated document of the ticker, or insert one.
   * `createdAt` is written on insert only; `updatedAt` on every call.
   */
  upsertByTicker(
    ticker: string,
    fields: CanonicalDocumentFields,
    now: Date,
  ): Promise<CanonicalDocument>;

  findById(id: string): Promise<CanonicalDocument | null>;

  /** Most recently updated document of the ticker */
  findLatestByTicker(ticker: string): Promise<CanonicalDocument | null>;

  /** Documents ordered by `createdAt`, newest first */
  find(query: ListQuery): Promise<CanonicalDocument[]>;

  count(status?: DocumentStatus): Promise<number>;

  /** @returns false when no document has the id */
  updateStatus(id: string, status: DocumentStatus, now: Date): Promise<boolean>;

  /** @returns false when no document has the id */
  deleteById(id: string): Promise<boolean>;

  /** @returns Number of documents removed */
  deleteByIds(ids: string[]): Promise<number>;

  /** Tickers with more than one document */
  findDuplicateGroups(): Promise<DuplicateGroup[]>;

  ensureIndexes(): Promise<void>;
}
