import type { LoggerMethods } from '@reportrag/logger';
import type { RawPage } from '@reportrag/model';

import { readFile } from 'node:fs/promises';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import { ExtractionError } from '../errors/extraction-error';

/**
 * Count whitespace-separated tokens
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

/**
 * Extracts the text layer of every page of a PDF with pdfjs-dist.
 *
 * Text items are concatenated in content-stream order and a newline is
 * emitted wherever pdfjs marks an end of line. Pages without a text layer
 * yield an empty string.
 */
export class PageTextExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Extract all pages of a PDF.
   *
   * @param source - Path to a PDF file or its bytes
   * @returns One RawPage per page, in document order
   * @throws ExtractionError when the file cannot be read or is not a PDF
   */
  async extract(source: string | Uint8Array): Promise<RawPage[]> {
    const label = typeof source === 'string' ? source : '<buffer>';
    const data = await this.readSource(source, label);

    const loadingTask = getDocument({ data, verbosity: 0 });

    try {
      const pdf = await loadingTask.promise;
      this.logger.info(
        `[PageTextExtractor] Extracting text from ${pdf.numPages} pages of ${label}`,
      );

      const pages: RawPage[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();

        let text = '';
        for (const item of content.items) {
          if (!('str' in item)) continue;
          text += item.str;
          if (item.hasEOL) text += '\n';
        }

        pages.push({
          pageNumber,
          text,
          charCount: text.length,
          wordCount: countWords(text),
        });
        page.cleanup();
      }

      const nonEmptyCount = pages.filter((p) => p.text.trim().length > 0).length;
      this.logger.info(
        `[PageTextExtractor] Extracted text from ${nonEmptyCount}/${pages.length} pages`,
      );

      return pages;
    } catch (error) {
      throw ExtractionError.fromError(`Failed to extract text from ${label}`, error);
    } finally {
      await loadingTask.destroy();
    }
  }

  private async readSource(
    source: string | Uint8Array,
    label: string,
  ): Promise<Uint8Array> {
    if (typeof source !== 'string') {
      // pdfjs transfers the buffer it is given
      return new Uint8Array(source);
    }

    try {
      return new Uint8Array(await readFile(source));
    } catch (error) {
      throw ExtractionError.fromError(`Failed to read ${label}`, error);
    }
  }
}
