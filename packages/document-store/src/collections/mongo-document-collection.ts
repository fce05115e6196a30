import type {
  CanonicalDocument,
  CanonicalDocumentFields,
  DocumentStatus,
} from '@reportrag/model';
import type { Collection, Db, Filter, WithId } from 'mongodb';

import type {
  DocumentCollection,
  DuplicateGroup,
  ListQuery,
} from './document-collection';

import { ObjectId } from 'mongodb';

/**
 * Shape of a report document in MongoDB
 */
export interface ReportDocumentSchema extends CanonicalDocumentFields {
  _id: ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

interface DuplicateAggregate {
  _id: string;
  ids: ObjectId[];
}

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

function parseObjectId(id: string): ObjectId | null {
  return OBJECT_ID_PATTERN.test(id) ? new ObjectId(id) : null;
}

function toCanonicalDocument(doc: WithId<ReportDocumentSchema>): CanonicalDocument {
  const { _id, ...fields } = doc;
  return { id: _id.toHexString(), ...fields };
}

/**
 * DocumentCollection backed by a MongoDB collection
 */
export class MongoDocumentCollection implements DocumentCollection {
  constructor(private readonly collection: Collection<ReportDocumentSchema>) {}

  static fromDb(db: Db, collectionName: string): MongoDocumentCollection {
    return new MongoDocumentCollection(
      db.collection<ReportDocumentSchema>(collectionName),
    );
  }

  async upsertByTicker(
    ticker: string,
    fields: CanonicalDocumentFields,
    now: Date,
  ): Promise<CanonicalDocument> {
    const doc = await this.collection.findOneAndUpdate(
      { ticker },
      {
        $set: { ...fields, ticker, updatedAt: now },
        $setOnInsert: { createdAt: now },
      },
      { upsert: true, returnDocument: 'after', sort: { updatedAt: -1 } },
    );

    if (!doc) {
      throw new Error(`Upsert returned no document for ticker ${ticker}`);
    }
    return toCanonicalDocument(doc);
  }

  async findById(id: string): Promise<CanonicalDocument | null> {
    const objectId = parseObjectId(id);
    if (!objectId) return null;

    const doc = await this.collection.findOne({ _id: objectId });
    return doc ? toCanonicalDocument(doc) : null;
  }

  async findLatestByTicker(ticker: string): Promise<CanonicalDocument | null> {
    const doc = await this.collection.findOne(
      { ticker },
      { sort: { updatedAt: -1, _id: -1 } },
    );
    return doc ? toCanonicalDocument(doc) : null;
  }

  async find(query: ListQuery): Promise<CanonicalDocument[]> {
    const docs = await this.collection
      .find(this.statusFilter(query.status))
      .sort({ createdAt: -1 })
      .skip(query.skip)
      .limit(query.limit)
      .toArray();
    return docs.map(toCanonicalDocument);
  }

  async count(status?: DocumentStatus): Promise<number> {
    return this.collection.countDocuments(this.statusFilter(status));
  }

  async updateStatus(
    id: string,
    status: DocumentStatus,
    now: Date,
  ): Promise<boolean> {
    const objectId = parseObjectId(id);
    if (!objectId) return false;

    const result = await this.collection.updateOne(
      { _id: objectId },
      { $set: { status, updatedAt: now } },
    );
    return result.matchedCount > 0;
  }

  async deleteById(id: string): Promise<boolean> {
    const objectId = parseObjectId(id);
    if (!objectId) return false;

    const result = await this.collection.deleteOne({ _id: objectId });
    return result.deletedCount > 0;
  }

  async deleteByIds(ids: string[]): Promise<number> {
    const objectIds = ids
      .map(parseObjectId)
      .filter((objectId): objectId is ObjectId => objectId !== null);
    if (objectIds.length === 0) return 0;

    const result = await this.collection.deleteMany({
      _id: { $in: objectIds },
    });
    return result.deletedCount;
  }

  async findDuplicateGroups(): Promise<DuplicateGroup[]> {
    const groups = await this.collection
      .aggregate<DuplicateAggregate>([
        { $sort: { updatedAt: -1, _id: -1 } },
        { $group: { _id: '$ticker', ids: { $push: '$_id' }, count: { $sum: 1 } } },
        { $match: { count: { $gt: 1 } } },
        { $sort: { _id: 1 } },
      ])
      .toArray();

    return groups.map((group) => ({
      ticker: group._id,
      ids: group.ids.map((objectId) => objectId.toHexString()),
    }));
  }

  async ensureIndexes(): Promise<void> {
    // Not unique, so cleanupDuplicates can repair a cross-process upsert race
    await this.collection.createIndex({ ticker: 1 });
    await this.collection.createIndex({ createdAt: -1 });
    await this.collection.createIndex({ status: 1 });
  }

  private statusFilter(status?: DocumentStatus): Filter<ReportDocumentSchema> {
    return status ? { status } : {};
  }
}
