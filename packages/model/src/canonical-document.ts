import type { IntegratedSummary } from './processing-result';

export const DOCUMENT_STATUSES = [
  'pending',
  'processing',
  'processed',
  'completed',
  'failed',
] as const;

export type DocumentStatus = (typeof DOCUMENT_STATUSES)[number];

/**
 * Overall outcome of page processing for a document.
 *
 * - `complete`: at least one page and every page succeeded
 * - `partial`: some pages failed
 * - `failed`: no page succeeded
 */
export type SuccessFlag = 'complete' | 'partial' | 'failed';

/**
 * Fields written by the ingestion pipeline for a ticker.
 *
 * Identity (`id`) and timestamps are owned by the document store.
 */
export interface CanonicalDocumentFields {
  ticker: string;
  filename: string;
  sourceUrl: string;
  fileSize: number;
  contentType: string;
  /** ISO-8601 timestamp of when the source file was obtained */
  downloadTime: string;
  /** Merged page content, one `## Page {n}` section per successful page */
  parsedContent: string;
  totalPages: number;
  successfulPages: number;
  failedPages: number[];
  promptType: string;
  integratedSummary: IntegratedSummary;
  status: DocumentStatus;
  successFlag: SuccessFlag;
}

/**
 * The persisted report for one ticker
 */
export interface CanonicalDocument extends CanonicalDocumentFields {
  id: string;
  createdAt: Date;
  updatedAt: Date;
}
