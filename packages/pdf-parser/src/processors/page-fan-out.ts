import type { LoggerMethods } from '@reportrag/logger';
import type {
  PageFailure,
  PageOutcome,
  PageResult,
  ProcessingResult,
  RawPage,
} from '@reportrag/model';

import type { PageProcessor } from './page-processor';

import {
  ConcurrentPool,
  LLMTokenUsageAggregator,
  getErrorMessage,
} from '@reportrag/shared';

import { SummaryIntegrator } from './summary-integrator';

/** Default number of page calls in flight */
export const DEFAULT_PAGE_CONCURRENCY = 8;

/** Options for PageFanOut */
export interface PageFanOutOptions {
  /** Number of concurrent page calls (default: 8) */
  concurrency?: number;
  /** Callback fired as each page settles */
  onPageComplete?: (outcome: PageOutcome, completed: number, total: number) => void;
}

/**
 * A rejected task is recorded as a failure of its page
 */
function toOutcome(
  entry: PromiseSettledResult<PageOutcome>,
  page: RawPage,
): PageOutcome {
  if (entry.status === 'fulfilled') {
    return entry.value;
  }
  return {
    ok: false,
    failure: { pageNumber: page.pageNumber, error: getErrorMessage(entry.reason) },
  };
}

/**
 * Runs the page processor over every page of a document and gathers the
 * outcomes once all of them have settled.
 *
 * A failing page never cancels its siblings. Results and failures are
 * reported in ascending page order regardless of completion order.
 */
export class PageFanOut {
  private readonly concurrency: number;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly processor: Pick<PageProcessor, 'process'>,
    private readonly options: PageFanOutOptions = {},
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_PAGE_CONCURRENCY;
  }

  async run(pages: RawPage[], prompt: string): Promise<ProcessingResult> {
    const aggregator = new LLMTokenUsageAggregator();
    this.logger.info(
      `[PageFanOut] Processing ${pages.length} pages (concurrency: ${this.concurrency})...`,
    );

    let completed = 0;
    const settled = await ConcurrentPool.runSettled(
      pages,
      this.concurrency,
      (page) => this.processor.process(page, prompt, aggregator),
      (entry, index) => {
        completed++;
        this.options.onPageComplete?.(
          toOutcome(entry, pages[index]),
          completed,
          pages.length,
        );
      },
    );

    const pageResults: PageResult[] = [];
    const failures: PageFailure[] = [];

    settled.forEach((entry, index) => {
      const outcome = toOutcome(entry, pages[index]);
      if (outcome.ok) {
        pageResults.push(outcome.result);
      } else {
        failures.push(outcome.failure);
      }
    });

    pageResults.sort((a, b) => a.pageNumber - b.pageNumber);
    failures.sort((a, b) => a.pageNumber - b.pageNumber);

    for (const failure of failures) {
      this.logger.warn(
        `[PageFanOut] Page ${failure.pageNumber} failed: ${failure.error}`,
      );
    }
    this.logger.info(
      `[PageFanOut] Completed: ${pageResults.length}/${pages.length} pages succeeded`,
    );
    aggregator.logSummary(this.logger, '[PageFanOut]');

    return {
      totalPages: pages.length,
      successfulPages: pageResults.length,
      failedPages: failures.map((failure) => failure.pageNumber),
      pageResults,
      integratedSummary: SummaryIntegrator.integrate(pageResults),
      tokenUsage: aggregator.getReport(),
    };
  }
}
