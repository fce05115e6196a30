import type { LoggerMethods } from '@reportrag/logger';
import type { PageOutcome, RawPage } from '@reportrag/model';
import type { LLMTokenUsageAggregator } from '@reportrag/shared';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { PageFanOut } from './page-fan-out';
import { PageMerger } from './page-merger';

function rawPage(pageNumber: number): RawPage {
  const text = `text of page ${pageNumber}`;
  return { pageNumber, text, charCount: text.length, wordCount: 4 };
}

function success(page: RawPage, summary: string): PageOutcome {
  return {
    ok: true,
    result: {
      pageNumber: page.pageNumber,
      charCount: page.charCount,
      wordCount: page.wordCount,
      parsedContent: {
        kind: 'structured',
        fields: { summary, content: `content ${page.pageNumber}` },
      },
      processedAt: '2026-01-01T00:00:00.000Z',
    },
  };
}

describe('PageFanOut', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
  });

  test('isolates a failing page and merges the rest in order', async () => {
    const processor = {
      process: vi.fn(async (page: RawPage): Promise<PageOutcome> => {
        if (page.pageNumber === 2) {
          return {
            ok: false,
            failure: { pageNumber: 2, error: 'model timeout' },
          };
        }
        return success(page, `summary ${page.pageNumber}`);
      }),
    };
    const fanOut = new PageFanOut(mockLogger, processor);

    const result = await fanOut.run([rawPage(1), rawPage(2), rawPage(3)], 'p');

    expect(result.totalPages).toBe(3);
    expect(result.successfulPages).toBe(2);
    expect(result.failedPages).toEqual([2]);
    expect(result.pageResults.map((r) => r.pageNumber)).toEqual([1, 3]);
    expect(PageMerger.merge(result.pageResults)).toBe(
      '## Page 1\n\ncontent 1\n\n\n## Page 3\n\ncontent 3\n\n',
    );
    expect(result.integratedSummary).toMatchObject({
      empty: false,
      combinedSummary: 'summary 1 summary 3',
    });
  });

  test('records a rejected task as a failure of its page', async () => {
    const processor = {
      process: vi.fn(async (page: RawPage): Promise<PageOutcome> => {
        if (page.pageNumber === 1) throw new Error('unexpected');
        return success(page, 's');
      }),
    };
    const fanOut = new PageFanOut(mockLogger, processor);

    const result = await fanOut.run([rawPage(1), rawPage(2)], 'p');

    expect(result.failedPages).toEqual([1]);
    expect(result.successfulPages).toBe(1);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[PageFanOut] Page 1 failed: unexpected',
    );
  });

  test('keeps ascending order when pages finish out of order', async () => {
    const processor = {
      process: vi.fn(async (page: RawPage): Promise<PageOutcome> => {
        await new Promise((resolve) =>
          setTimeout(resolve, (4 - page.pageNumber) * 10),
        );
        return page.pageNumber % 2 === 0
          ? { ok: false, failure: { pageNumber: page.pageNumber, error: 'x' } }
          : success(page, 's');
      }),
    };
    const fanOut = new PageFanOut(mockLogger, processor, { concurrency: 4 });

    const result = await fanOut.run(
      [rawPage(1), rawPage(2), rawPage(3), rawPage(4)],
      'p',
    );

    expect(result.pageResults.map((r) => r.pageNumber)).toEqual([1, 3]);
    expect(result.failedPages).toEqual([2, 4]);
  });

  test('keeps total = successful + failed for any mix of outcomes', async () => {
    const failing = new Set([2, 5, 6]);
    const processor = {
      process: vi.fn(async (page: RawPage): Promise<PageOutcome> =>
        failing.has(page.pageNumber)
          ? { ok: false, failure: { pageNumber: page.pageNumber, error: 'e' } }
          : success(page, 's'),
      ),
    };
    const pages = Array.from({ length: 7 }, (_, i) => rawPage(i + 1));

    const result = await new PageFanOut(mockLogger, processor, {
      concurrency: 3,
    }).run(pages, 'p');

    expect(result.pageResults.length + result.failedPages.length).toBe(
      result.totalPages,
    );
    expect(result.successfulPages).toBe(result.pageResults.length);
  });

  test('returns an empty summary when every page fails', async () => {
    const processor = {
      process: vi.fn(
        async (page: RawPage): Promise<PageOutcome> => ({
          ok: false,
          failure: { pageNumber: page.pageNumber, error: 'down' },
        }),
      ),
    };

    const result = await new PageFanOut(mockLogger, processor).run(
      [rawPage(1)],
      'p',
    );

    expect(result.successfulPages).toBe(0);
    expect(result.integratedSummary.empty).toBe(true);
  });

  test('handles a document without pages', async () => {
    const processor = { process: vi.fn() };

    const result = await new PageFanOut(mockLogger, processor).run([], 'p');

    expect(result).toMatchObject({
      totalPages: 0,
      successfulPages: 0,
      failedPages: [],
      pageResults: [],
    });
    expect(processor.process).not.toHaveBeenCalled();
  });

  test('passes a per-run aggregator and reports its usage', async () => {
    const processor = {
      process: vi.fn(
        async (
          page: RawPage,
          _prompt: string,
          aggregator?: LLMTokenUsageAggregator,
        ): Promise<PageOutcome> => {
          aggregator?.track({
            component: 'PageProcessor',
            phase: 'page-parsing',
            modelName: 'gpt-4o-mini',
            inputTokens: 10,
            outputTokens: 2,
            totalTokens: 12,
          });
          return success(page, 's');
        },
      ),
    };

    const result = await new PageFanOut(mockLogger, processor).run(
      [rawPage(1), rawPage(2)],
      'p',
    );

    expect(result.tokenUsage.total).toEqual({
      inputTokens: 20,
      outputTokens: 4,
      totalTokens: 24,
    });
    expect(mockLogger.info).toHaveBeenCalledWith('[PageFanOut] Token usage summary:');
    expect(mockLogger.info).toHaveBeenCalledWith(
      'Grand total: 20 input, 4 output, 24 total',
    );
  });

  test('reports progress as each page settles', async () => {
    const onPageComplete = vi.fn();
    const processor = {
      process: vi.fn(async (page: RawPage) => success(page, 's')),
    };

    await new PageFanOut(mockLogger, processor, {
      concurrency: 1,
      onPageComplete,
    }).run([rawPage(1), rawPage(2)], 'p');

    expect(onPageComplete).toHaveBeenCalledTimes(2);
    expect(onPageComplete).toHaveBeenLastCalledWith(
      expect.objectContaining({ ok: true }),
      2,
      2,
    );
  });
});
