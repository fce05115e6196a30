export type {
  DocumentCollection,
  DuplicateGroup,
  ListQuery,
} from './collections/document-collection';
export { InMemoryDocumentCollection } from './collections/in-memory-document-collection';
export { MongoDocumentCollection } from './collections/mongo-document-collection';
export type { ReportDocumentSchema } from './collections/mongo-document-collection';
export {
  DEFAULT_LIST_LIMIT,
  DocumentStoreGateway,
} from './document-store-gateway';
export type {
  CleanupResult,
  DocumentStoreGatewayOptions,
  ListOptions,
} from './document-store-gateway';
export { StoreError } from './errors/store-error';
