/**
 * Text of a single PDF page as read from the text layer
 */
export interface RawPage {
  /**
   * 1-based page number in document order
   */
  pageNumber: number;

  /**
   * Extracted text. Empty for pages without a text layer, never absent.
   */
  text: string;

  /**
   * Number of characters in `text`
   */
  charCount: number;

  /**
   * Number of whitespace-separated tokens in `text`
   */
  wordCount: number;
}
