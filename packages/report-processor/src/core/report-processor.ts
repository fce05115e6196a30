import type { DocumentStoreGateway } from '@reportrag/document-store';
import type { LoggerMethods } from '@reportrag/logger';
import type {
  IntegratedSummary,
  SuccessFlag,
  TokenUsageReport,
} from '@reportrag/model';
import type {
  PageFanOut,
  PageTextExtractor,
  PdfDownloader,
} from '@reportrag/pdf-parser';

import { ExtractionError, PageMerger, resolvePrompt } from '@reportrag/pdf-parser';
import { KeyedLock } from '@reportrag/shared';
import { stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { deriveSuccessFlag } from '../utils/success-flag';

/**
 * ReportProcessor Options
 */
export interface ReportProcessorOptions {
  logger: LoggerMethods;
  downloader: Pick<PdfDownloader, 'buildReportUrl' | 'download' | 'cleanup'>;
  extractor: Pick<PageTextExtractor, 'extract'>;
  fanOut: Pick<PageFanOut, 'run'>;
  store: Pick<DocumentStoreGateway, 'upsert'>;

  /**
   * Callback fired after the page calls of a run complete
   */
  onTokenUsage?: (ticker: string, report: TokenUsageReport) => void;

  now?: () => Date;
}

export interface ProcessOptions {
  /** Prompt preset name (default: 'default') */
  promptType?: string;
  /** Replaces the preset prompt when non-blank */
  customPrompt?: string;
}

export interface ProcessFileOptions extends ProcessOptions {
  /** Recorded as the document source (default: file URL of the path) */
  sourceUrl?: string;
}

export interface ReportProcessingSummary {
  documentId: string;
  ticker: string;
  filename: string;
  sourceUrl: string;
  totalPages: number;
  successfulPages: number;
  failedPages: number[];
  successFlag: SuccessFlag;
  promptType: string;
  integratedSummary: IntegratedSummary;
  tokenUsage: TokenUsageReport;
}

interface SourceFile {
  filePath: string;
  filename: string;
  sourceUrl: string;
  fileSize: number;
  contentType: string;
  downloadTime: Date;
}

/**
 * ReportProcessor
 *
 * Turns the report PDF of a ticker into its stored canonical document.
 *
 * ## Processing Steps
 *
 * 1. Download the report (processTicker only)
 * 2. Extract page text
 * 3. Send every page to the language model through the fan-out
 * 4. Merge the successful pages
 * 5. Upsert the document by ticker with status `completed`
 * 6. Remove the downloaded file, whatever happened before
 *
 * Runs for the same ticker are serialised within the process.
 */
export class ReportProcessor {
  private readonly logger: LoggerMethods;
  private readonly downloader: ReportProcessorOptions['downloader'];
  private readonly extractor: ReportProcessorOptions['extractor'];
  private readonly fanOut: ReportProcessorOptions['fanOut'];
  private readonly store: ReportProcessorOptions['store'];
  private readonly onTokenUsage?: ReportProcessorOptions['onTokenUsage'];
  private readonly now: () => Date;
  private readonly lock = new KeyedLock();

  constructor(options: ReportProcessorOptions) {
    this.logger = options.logger;
    this.downloader = options.downloader;
    this.extractor = options.extractor;
    this.fanOut = options.fanOut;
    this.store = options.store;
    this.onTokenUsage = options.onTokenUsage;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Download and process the current report of a ticker.
   *
   * @throws DownloadError, ExtractionError or StoreError; page failures are
   * reported in the summary instead
   */
  async processTicker(
    ticker: string,
    options: ProcessOptions = {},
  ): Promise<ReportProcessingSummary> {
    return this.lock.runExclusive(ticker, async () => {
      const url = this.downloader.buildReportUrl(ticker);
      this.logger.info(`[ReportProcessor] Processing ticker ${ticker} from ${url}`);

      const downloaded = await this.downloader.download(url, ticker);
      try {
        return await this.processSource(ticker, downloaded, options);
      } finally {
        await this.downloader.cleanup(downloaded.filePath);
      }
    });
  }

  /**
   * Process a PDF already on disk. The file is left in place.
   *
   * @throws ExtractionError when the file cannot be read
   */
  async processFile(
    ticker: string,
    filePath: string,
    options: ProcessFileOptions = {},
  ): Promise<ReportProcessingSummary> {
    return this.lock.runExclusive(ticker, async () => {
      this.logger.info(`[ReportProcessor] Processing ticker ${ticker} from ${filePath}`);

      const { size } = await stat(filePath).catch((error: unknown) => {
        throw ExtractionError.fromError(`Failed to read ${filePath}`, error);
      });
      const source: SourceFile = {
        filePath,
        filename: basename(filePath),
        sourceUrl: options.sourceUrl ?? pathToFileURL(resolve(filePath)).href,
        fileSize: size,
        contentType: 'application/pdf',
        downloadTime: this.now(),
      };
      return this.processSource(ticker, source, options);
    });
  }

  private async processSource(
    ticker: string,
    source: SourceFile,
    options: ProcessOptions,
  ): Promise<ReportProcessingSummary> {
    const startTime = Date.now();

    const pages = await this.extractor.extract(source.filePath);
    const { promptType, prompt } = resolvePrompt(options.promptType, options.customPrompt);
    this.logger.info(
      `[ReportProcessor] ${pages.length} pages extracted, prompt type: ${promptType}`,
    );

    const result = await this.fanOut.run(pages, prompt);
    this.onTokenUsage?.(ticker, result.tokenUsage);

    const parsedContent = PageMerger.merge(result.pageResults);
    const successFlag = deriveSuccessFlag(result);

    const documentId = await this.store.upsert(ticker, {
      filename: source.filename,
      sourceUrl: source.sourceUrl,
      fileSize: source.fileSize,
      contentType: source.contentType,
      downloadTime: source.downloadTime.toISOString(),
      parsedContent,
      totalPages: result.totalPages,
      successfulPages: result.successfulPages,
      failedPages: result.failedPages,
      promptType,
      integratedSummary: result.integratedSummary,
      status: 'completed',
      successFlag,
    });

    this.logger.info(
      `[ReportProcessor] Ticker ${ticker} stored as ${documentId}: ${result.successfulPages}/${result.totalPages} pages (${successFlag}) in ${Date.now() - startTime}ms`,
    );

    return {
      documentId,
      ticker,
      filename: source.filename,
      sourceUrl: source.sourceUrl,
      totalPages: result.totalPages,
      successfulPages: result.successfulPages,
      failedPages: result.failedPages,
      successFlag,
      promptType,
      integratedSummary: result.integratedSummary,
      tokenUsage: result.tokenUsage,
    };
  }
}
