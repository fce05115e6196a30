import type { LoggerMethods } from '@reportrag/logger';

import { getErrorMessage } from '@reportrag/shared';
import { createHash } from 'node:crypto';
import { mkdir, rm, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { DownloadError } from '../errors/download-error';

/** Options for PdfDownloader */
export interface PdfDownloaderOptions {
  /** Prefix the ticker is appended to when building a report URL */
  baseUrl: string;
  /** Directory that receives downloaded files */
  downloadDir: string;
  /** Per-download timeout covering headers and body */
  timeoutMs: number;
  /** Largest accepted file size */
  maxSizeBytes: number;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  /** Clock used for filenames and download time */
  now?: () => Date;
}

export interface DownloadedPdf {
  filePath: string;
  filename: string;
  sourceUrl: string;
  fileSize: number;
  contentType: string;
  downloadTime: Date;
}

/**
 * `YYYYMMDD_HHmmss` in UTC
 */
function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

/**
 * Filename for a downloaded report.
 *
 * `{ticker}_{timestamp}.pdf`, or `pdf_{first 8 hex of md5(url)}_{timestamp}.pdf`
 * when no ticker is known.
 */
export function buildPdfFilename(url: string, ticker: string | undefined, now: Date): string {
  const timestamp = formatTimestamp(now);
  if (ticker) {
    return `${ticker}_${timestamp}.pdf`;
  }
  const urlHash = createHash('md5').update(url).digest('hex').slice(0, 8);
  return `pdf_${urlHash}_${timestamp}.pdf`;
}

/**
 * Downloads report PDFs to a local directory.
 *
 * Rejects non-200 responses, content types other than `application/pdf` and
 * files above the size limit. The size limit is checked against the declared
 * `content-length` before reading and again while the body streams in.
 */
export class PdfDownloader {
  private readonly fetchFn: typeof fetch;
  private readonly now: () => Date;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly options: PdfDownloaderOptions,
  ) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
  }

  buildReportUrl(ticker: string): string {
    return `${this.options.baseUrl}${encodeURIComponent(ticker)}`;
  }

  /**
   * Download a PDF into the download directory.
   *
   * @param ticker - Used for the filename when given
   * @throws DownloadError on any failure; no file is left behind
   */
  async download(url: string, ticker?: string): Promise<DownloadedPdf> {
    const filename = buildPdfFilename(url, ticker, this.now());
    const filePath = join(this.options.downloadDir, filename);

    this.logger.info(`[PdfDownloader] Downloading ${url}`);

    try {
      const response = await this.fetchFn(url, {
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (response.status !== 200) {
        await this.reject(response, `Failed to download ${url}: HTTP ${response.status}`, url);
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.includes('application/pdf')) {
        await this.reject(response, `Unexpected content type "${contentType}" for ${url}`, url);
      }

      const declaredLength = response.headers.get('content-length');
      if (declaredLength !== null && Number(declaredLength) > this.options.maxSizeBytes) {
        await this.reject(
          response,
          `Declared size ${declaredLength} bytes exceeds limit of ${this.options.maxSizeBytes} bytes for ${url}`,
          url,
        );
      }

      const data = await this.readBody(response, url);

      await mkdir(this.options.downloadDir, { recursive: true });
      try {
        await writeFile(filePath, data);
      } catch (error) {
        await rm(filePath, { force: true });
        throw error;
      }

      this.logger.info(
        `[PdfDownloader] Downloaded ${filename} (${data.byteLength} bytes)`,
      );

      return {
        filePath,
        filename,
        sourceUrl: url,
        fileSize: data.byteLength,
        contentType,
        downloadTime: this.now(),
      };
    } catch (error) {
      const downloadError = DownloadError.fromError(url, error);
      this.logger.error(`[PdfDownloader] ${downloadError.message}`);
      throw downloadError;
    }
  }

  /**
   * Remove a downloaded file. Failures are logged, not thrown.
   */
  async cleanup(filePath: string): Promise<void> {
    try {
      await unlink(filePath);
      this.logger.debug(`[PdfDownloader] Removed ${filePath}`);
    } catch (error) {
      this.logger.warn(
        `[PdfDownloader] Failed to remove ${filePath}: ${getErrorMessage(error)}`,
      );
    }
  }

  /**
   * Release the unread body, then fail the download
   */
  private async reject(response: Response, message: string, url: string): Promise<never> {
    await response.body?.cancel();
    throw new DownloadError(message, url);
  }

  private async readBody(response: Response, url: string): Promise<Buffer> {
    if (!response.body) {
      return Buffer.alloc(0);
    }

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let received = 0;

    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      received += value.byteLength;
      if (received > this.options.maxSizeBytes) {
        await reader.cancel();
        throw new DownloadError(
          `Downloaded size exceeds limit of ${this.options.maxSizeBytes} bytes for ${url}`,
          url,
        );
      }
      chunks.push(value);
    }

    return Buffer.concat(chunks);
  }
}
