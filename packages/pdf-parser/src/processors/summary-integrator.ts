import type { IntegratedSummary, PageResult } from '@reportrag/model';

import { pageSummaryFieldsSchema } from '../types/page-response-schema';

export const EMPTY_SUMMARY_ERROR = 'No pages were processed successfully';

/**
 * Builds the cross-page summary from successful page results.
 *
 * Only structured pages contribute. Keywords and categories are de-duplicated
 * keeping first-seen order; page summaries follow page order.
 */
export class SummaryIntegrator {
  static integrate(pageResults: PageResult[]): IntegratedSummary {
    if (pageResults.length === 0) {
      return { empty: true, error: EMPTY_SUMMARY_ERROR };
    }

    const keywords = new Set<string>();
    const categories = new Set<string>();
    const pageSummaries: { page: number; summary: string }[] = [];

    const ordered = [...pageResults].sort((a, b) => a.pageNumber - b.pageNumber);
    for (const result of ordered) {
      if (result.parsedContent.kind !== 'structured') continue;

      const fields = pageSummaryFieldsSchema.parse(result.parsedContent.fields);
      fields.keywords?.forEach((keyword) => keywords.add(keyword));
      if (fields.category !== undefined) categories.add(fields.category);
      if (fields.summary !== undefined) {
        pageSummaries.push({ page: result.pageNumber, summary: fields.summary });
      }
    }

    return {
      empty: false,
      totalPagesProcessed: pageResults.length,
      combinedKeywords: [...keywords],
      categories: [...categories],
      pageSummaries,
      combinedSummary: pageSummaries.map((p) => p.summary).join(' '),
    };
  }
}
