export const DEFAULT_SEPARATORS = ['\n\n', '\n', ' ', ''] as const;

export interface TextSplitterOptions {
  /** Maximum characters per chunk */
  chunkSize: number;
  /** Characters carried over between consecutive chunks */
  chunkOverlap: number;
  /** Separators tried in order, the empty string splits into characters */
  separators?: readonly string[];
  /** Keep each separator at the start of the piece that follows it (default: true) */
  keepSeparator?: boolean;
}

/**
 * Splits text on the coarsest separator that occurs in it, recursing into
 * pieces that are still too long, then greedily merges pieces back into
 * windows of at most `chunkSize` characters with up to `chunkOverlap`
 * characters shared between neighbours.
 *
 * Chunks are trimmed and empty chunks are dropped. Output depends only on
 * the input text and options.
 *
 * @example
 * ```typescript
 * const splitter = new RecursiveCharacterTextSplitter({ chunkSize: 10, chunkOverlap: 5 });
 * splitter.splitText('aaaa bbbb cccc'); // ['aaaa bbbb', 'bbbb cccc']
 * ```
 */
export class RecursiveCharacterTextSplitter {
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  private readonly separators: readonly string[];
  private readonly keepSeparator: boolean;

  constructor(options: TextSplitterOptions) {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize < 1) {
      throw new RangeError(
        `Chunk size must be a positive integer, got ${options.chunkSize}`,
      );
    }
    if (!Number.isInteger(options.chunkOverlap) || options.chunkOverlap < 0) {
      throw new RangeError(
        `Chunk overlap must be a non-negative integer, got ${options.chunkOverlap}`,
      );
    }
    if (options.chunkOverlap >= options.chunkSize) {
      throw new RangeError(
        `Chunk overlap (${options.chunkOverlap}) must be smaller than chunk size (${options.chunkSize})`,
      );
    }

    this.chunkSize = options.chunkSize;
    this.chunkOverlap = options.chunkOverlap;
    this.separators = options.separators ?? DEFAULT_SEPARATORS;
    this.keepSeparator = options.keepSeparator ?? true;
  }

  splitText(text: string): string[] {
    return this.split(text, this.separators);
  }

  private split(text: string, separators: readonly string[]): string[] {
    let separator = separators[separators.length - 1] ?? '';
    let finer: readonly string[] = [];
    for (const [index, candidate] of separators.entries()) {
      if (candidate === '') {
        separator = candidate;
        break;
      }
      if (text.includes(candidate)) {
        separator = candidate;
        finer = separators.slice(index + 1);
        break;
      }
    }

    const joiner = this.keepSeparator ? '' : separator;
    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of this.splitOn(text, separator)) {
      if (piece.length < this.chunkSize) {
        pending.push(piece);
        continue;
      }
      if (pending.length > 0) {
        chunks.push(...this.merge(pending, joiner));
        pending = [];
      }
      if (finer.length === 0) {
        this.pushChunk(chunks, [piece], joiner);
      } else {
        chunks.push(...this.split(piece, finer));
      }
    }

    if (pending.length > 0) {
      chunks.push(...this.merge(pending, joiner));
    }
    return chunks;
  }

  private splitOn(text: string, separator: string): string[] {
    if (separator === '') {
      return [...text];
    }
    const parts = text.split(separator);
    const pieces = this.keepSeparator
      ? [parts[0] ?? '', ...parts.slice(1).map((part) => separator + part)]
      : parts;
    return pieces.filter((piece) => piece !== '');
  }

  private merge(pieces: string[], joiner: string): string[] {
    const chunks: string[] = [];
    let window: string[] = [];
    let total = 0;

    for (const piece of pieces) {
      const joinerLength = window.length > 0 ? joiner.length : 0;
      if (total + piece.length + joinerLength > this.chunkSize && window.length > 0) {
        this.pushChunk(chunks, window, joiner);

        // Drop from the front until the remainder fits as overlap
        while (
          total > this.chunkOverlap ||
          (total > 0 &&
            total + piece.length + (window.length > 0 ? joiner.length : 0) >
              this.chunkSize)
        ) {
          const first = window[0] ?? '';
          total -= first.length + (window.length > 1 ? joiner.length : 0);
          window = window.slice(1);
        }
      }

      window.push(piece);
      total += piece.length + (window.length > 1 ? joiner.length : 0);
    }

    this.pushChunk(chunks, window, joiner);
    return chunks;
  }

  private pushChunk(chunks: string[], window: string[], joiner: string): void {
    const chunk = window.join(joiner).trim();
    if (chunk !== '') {
      chunks.push(chunk);
    }
  }
}
