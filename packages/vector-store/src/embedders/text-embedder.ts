/**
 * Turns text into vectors of a fixed dimension
 */
export interface TextEmbedder {
  /** Model identifier reported in collection info */
  readonly modelName: string;

  /**
   * One vector per input text, in input order
   */
  embedDocuments(texts: string[]): Promise<number[][]>;

  embedQuery(text: string): Promise<number[]>;
}
