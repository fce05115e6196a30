import type { LoggerMethods } from '@reportrag/logger';
import type {
  CanonicalDocument,
  CanonicalDocumentFields,
  DocumentStatus,
} from '@reportrag/model';

import type { DocumentCollection } from './collections/document-collection';

import { StoreError } from './errors/store-error';

/** Default page size for list() */
export const DEFAULT_LIST_LIMIT = 10;

export interface ListOptions {
  skip?: number;
  limit?: number;
  status?: DocumentStatus;
}

export interface CleanupResult {
  /** Tickers that had more than one document */
  duplicateTickerCount: number;
  /** Documents removed across all tickers */
  totalRemoved: number;
}

export interface DocumentStoreGatewayOptions {
  /** Clock for `createdAt` / `updatedAt` */
  now?: () => Date;
}

/**
 * Persists one canonical document per ticker.
 *
 * Writes are upserts keyed by ticker, so re-processing a ticker replaces its
 * document in place and keeps `createdAt`. Every driver failure surfaces as
 * a StoreError; nothing is cached.
 */
export class DocumentStoreGateway {
  private readonly now: () => Date;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly collection: DocumentCollection,
    options: DocumentStoreGatewayOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Insert or replace the document of a ticker.
   *
   * @returns Id of the stored document
   */
  async upsert(
    ticker: string,
    fields: Omit<CanonicalDocumentFields, 'ticker'>,
  ): Promise<string> {
    const document = await this.execute('upsert', `ticker ${ticker}`, () =>
      this.collection.upsertByTicker(ticker, { ...fields, ticker }, this.now()),
    );
    this.logger.info(
      `[DocumentStoreGateway] Upserted document ${document.id} for ticker ${ticker}`,
    );
    return document.id;
  }

  async get(id: string): Promise<CanonicalDocument | null> {
    return this.execute('get', `id ${id}`, () => this.collection.findById(id));
  }

  async getByTicker(ticker: string): Promise<CanonicalDocument | null> {
    return this.execute('getByTicker', `ticker ${ticker}`, () =>
      this.collection.findLatestByTicker(ticker),
    );
  }

  async list(options: ListOptions = {}): Promise<CanonicalDocument[]> {
    const query = {
      skip: options.skip ?? 0,
      limit: options.limit ?? DEFAULT_LIST_LIMIT,
      status: options.status,
    };
    return this.execute('list', `status ${query.status ?? 'any'}`, () =>
      this.collection.find(query),
    );
  }

  async count(status?: DocumentStatus): Promise<number> {
    return this.execute('count', `status ${status ?? 'any'}`, () =>
      this.collection.count(status),
    );
  }

  /**
   * @returns false when no document has the id
   */
  async updateStatus(id: string, status: DocumentStatus): Promise<boolean> {
    const updated = await this.execute('updateStatus', `id ${id}`, () =>
      this.collection.updateStatus(id, status, this.now()),
    );
    if (updated) {
      this.logger.info(`[DocumentStoreGateway] Document ${id} status set to ${status}`);
    }
    return updated;
  }

  /**
   * @returns false when no document has the id
   */
  async delete(id: string): Promise<boolean> {
    const deleted = await this.execute('delete', `id ${id}`, () =>
      this.collection.deleteById(id),
    );
    if (deleted) {
      this.logger.info(`[DocumentStoreGateway] Deleted document ${id}`);
    }
    return deleted;
  }

  /**
   * Keep only the most recently updated document of every ticker.
   */
  async cleanupDuplicates(): Promise<CleanupResult> {
    const groups = await this.execute('cleanupDuplicates', 'all tickers', () =>
      this.collection.findDuplicateGroups(),
    );

    let totalRemoved = 0;
    for (const group of groups) {
      const [kept, ...stale] = group.ids;
      const removed = await this.execute(
        'cleanupDuplicates',
        `ticker ${group.ticker}`,
        () => this.collection.deleteByIds(stale),
      );
      totalRemoved += removed;
      this.logger.info(
        `[DocumentStoreGateway] Ticker ${group.ticker}: kept ${kept}, removed ${removed} duplicates`,
      );
    }

    return { duplicateTickerCount: groups.length, totalRemoved };
  }

  async ensureIndexes(): Promise<void> {
    await this.execute('ensureIndexes', 'collection', () =>
      this.collection.ensureIndexes(),
    );
  }

  private async execute<T>(
    operation: string,
    target: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const storeError = StoreError.fromError(operation, target, error);
      this.logger.error(`[DocumentStoreGateway] ${storeError.message}`);
      throw storeError;
    }
  }
}
