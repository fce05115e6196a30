import type { PageResult } from './page-result';
import type { TokenUsageReport } from './token-usage-report';

export interface PageSummary {
  page: number;
  summary: string;
}

/**
 * Cross-page digest built from the structured page results.
 *
 * When no page succeeded the summary carries only an error message.
 */
export type IntegratedSummary =
  | {
      empty: false;
      totalPagesProcessed: number;
      /** Unique keywords in first-seen page order */
      combinedKeywords: string[];
      /** Unique categories in first-seen page order */
      categories: string[];
      pageSummaries: PageSummary[];
      /** Page summaries joined by a single space */
      combinedSummary: string;
    }
  | { empty: true; error: string };

/**
 * Result of fanning a document out over its pages.
 *
 * `totalPages = successfulPages + failedPages.length` and
 * `successfulPages = pageResults.length` always hold.
 */
export interface ProcessingResult {
  totalPages: number;
  successfulPages: number;
  /** Page numbers that failed, ascending */
  failedPages: number[];
  /** Successful pages, ascending by page number */
  pageResults: PageResult[];
  integratedSummary: IntegratedSummary;
  tokenUsage: TokenUsageReport;
}
