import type {
  CanonicalDocument,
  CanonicalDocumentFields,
  DocumentStatus,
} from '@reportrag/model';

import type {
  DocumentCollection,
  DuplicateGroup,
  ListQuery,
} from './document-collection';

interface StoredEntry {
  document: CanonicalDocument;
  /** Insertion sequence, breaks `updatedAt` ties like an ObjectId would */
  seq: number;
}

/**
 * Process-local DocumentCollection.
 *
 * Mirrors the ordering rules of the MongoDB collection so the gateway
 * behaves the same on both. Returned documents are copies.
 */
export class InMemoryDocumentCollection implements DocumentCollection {
  private readonly entries = new Map<string, StoredEntry>();
  private nextSeq = 1;

  async upsertByTicker(
    ticker: string,
    fields: CanonicalDocumentFields,
    now: Date,
  ): Promise<CanonicalDocument> {
    const existing = this.latestEntry(ticker);
    if (existing) {
      existing.document = {
        ...existing.document,
        ...structuredClone(fields),
        ticker,
        updatedAt: now,
      };
      return structuredClone(existing.document);
    }

    const seq = this.nextSeq++;
    const document: CanonicalDocument = {
      ...structuredClone(fields),
      ticker,
      id: seq.toString(16).padStart(24, '0'),
      createdAt: now,
      updatedAt: now,
    };
    this.entries.set(document.id, { document, seq });
    return structuredClone(document);
  }

  /**
   * Insert a document as-is, bypassing the one-per-ticker upsert.
   * Used to seed duplicate lineages.
   */
  insertRaw(document: Omit<CanonicalDocument, 'id'>): string {
    const seq = this.nextSeq++;
    const id = seq.toString(16).padStart(24, '0');
    this.entries.set(id, { document: { ...structuredClone(document), id }, seq });
    return id;
  }

  async findById(id: string): Promise<CanonicalDocument | null> {
    const entry = this.entries.get(id);
    return entry ? structuredClone(entry.document) : null;
  }

  async findLatestByTicker(ticker: string): Promise<CanonicalDocument | null> {
    const entry = this.latestEntry(ticker);
    return entry ? structuredClone(entry.document) : null;
  }

  async find(query: ListQuery): Promise<CanonicalDocument[]> {
    return this.matching(query.status)
      .sort(
        (a, b) =>
          b.document.createdAt.getTime() - a.document.createdAt.getTime() ||
          b.seq - a.seq,
      )
      .slice(query.skip, query.skip + query.limit)
      .map((entry) => structuredClone(entry.document));
  }

  async count(status?: DocumentStatus): Promise<number> {
    return this.matching(status).length;
  }

  async updateStatus(
    id: string,
    status: DocumentStatus,
    now: Date,
  ): Promise<boolean> {
    const entry = this.entries.get(id);
    if (!entry) return false;
    entry.document = { ...entry.document, status, updatedAt: now };
    return true;
  }

  async deleteById(id: string): Promise<boolean> {
    return this.entries.delete(id);
  }

  async deleteByIds(ids: string[]): Promise<number> {
    return ids.filter((id) => this.entries.delete(id)).length;
  }

  async findDuplicateGroups(): Promise<DuplicateGroup[]> {
    const byTicker = new Map<string, StoredEntry[]>();
    for (const entry of this.entries.values()) {
      const group = byTicker.get(entry.document.ticker) ?? [];
      group.push(entry);
      byTicker.set(entry.document.ticker, group);
    }

    return [...byTicker.entries()]
      .filter(([, group]) => group.length > 1)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([ticker, group]) => ({
        ticker,
        ids: group.sort(newestFirst).map((entry) => entry.document.id),
      }));
  }

  async ensureIndexes(): Promise<void> {}

  private latestEntry(ticker: string): StoredEntry | undefined {
    return [...this.entries.values()]
      .filter((entry) => entry.document.ticker === ticker)
      .sort(newestFirst)[0];
  }

  private matching(status?: DocumentStatus): StoredEntry[] {
    return [...this.entries.values()].filter(
      (entry) => status === undefined || entry.document.status === status,
    );
  }
}

function newestFirst(a: StoredEntry, b: StoredEntry): number {
  return (
    b.document.updatedAt.getTime() - a.document.updatedAt.getTime() ||
    b.seq - a.seq
  );
}
