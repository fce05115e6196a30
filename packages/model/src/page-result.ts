/**
 * JSON object returned by the model for a page.
 *
 * The well-known keys are optional; models are free to add more.
 */
export interface StructuredPageFields {
  summary?: unknown;
  keywords?: unknown;
  category?: unknown;
  content?: unknown;
  [key: string]: unknown;
}

/**
 * Outcome of parsing a single completion response.
 *
 * - `structured`: the response was a JSON object
 * - `raw`: anything else, kept verbatim
 */
export type ParsedContent =
  | { kind: 'structured'; fields: StructuredPageFields }
  | { kind: 'raw'; text: string };

/**
 * A page that was processed successfully
 */
export interface PageResult {
  pageNumber: number;
  charCount: number;
  wordCount: number;
  parsedContent: ParsedContent;
  /**
   * ISO-8601 timestamp of when the page finished processing
   */
  processedAt: string;
}

/**
 * A page whose completion call or parse failed
 */
export interface PageFailure {
  pageNumber: number;
  error: string;
}

export type PageOutcome =
  | { ok: true; result: PageResult }
  | { ok: false; failure: PageFailure };
