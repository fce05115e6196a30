import { getErrorMessage } from '@reportrag/shared';

/**
 * DownloadError
 *
 * Raised when a report PDF cannot be fetched or is rejected by the
 * status, content type or size checks.
 */
export class DownloadError extends Error {
  /**
   * URL that was being downloaded
   */
  readonly url: string;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DownloadError';
    this.url = url;
  }

  static fromError(url: string, error: unknown): DownloadError {
    if (error instanceof DownloadError) {
      return error;
    }
    return new DownloadError(
      `Failed to download ${url}: ${getErrorMessage(error)}`,
      url,
      { cause: error },
    );
  }
}
