export {
  DOCUMENT_STATUSES,
  type CanonicalDocument,
  type CanonicalDocumentFields,
  type DocumentStatus,
  type SuccessFlag,
} from './canonical-document';
export type { ChunkPayload, HybridSearchHit, SearchHit } from './chunk';
export type {
  PageFailure,
  PageOutcome,
  PageResult,
  ParsedContent,
  StructuredPageFields,
} from './page-result';
export type {
  IntegratedSummary,
  PageSummary,
  ProcessingResult,
} from './processing-result';
export type { RawPage } from './raw-page';
export type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
