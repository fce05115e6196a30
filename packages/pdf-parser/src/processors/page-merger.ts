import type { PageResult, ParsedContent } from '@reportrag/model';

import { MergeError } from '../errors/merge-error';

/**
 * Text written into the merged document for one page
 */
export function renderPageContent(parsedContent: ParsedContent): string {
  if (parsedContent.kind === 'raw') {
    return parsedContent.text;
  }
  const { content } = parsedContent.fields;
  return typeof content === 'string'
    ? content
    : JSON.stringify(parsedContent.fields);
}

/**
 * Merges successful page results into a single Markdown document.
 *
 * Each page becomes `## Page {n}\n\n{content}\n\n`; sections are joined with
 * a newline in ascending page order. The output depends only on the input.
 */
export class PageMerger {
  static merge(pageResults: PageResult[]): string {
    const seen = new Set<number>();
    for (const result of pageResults) {
      if (seen.has(result.pageNumber)) {
        throw new MergeError(result.pageNumber);
      }
      seen.add(result.pageNumber);
    }

    return [...pageResults]
      .sort((a, b) => a.pageNumber - b.pageNumber)
      .map(
        (result) =>
          `## Page ${result.pageNumber}\n\n${renderPageContent(result.parsedContent)}\n\n`,
      )
      .join('\n');
  }
}
