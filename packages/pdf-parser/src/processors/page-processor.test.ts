import type { LoggerMethods } from '@reportrag/logger';
import type { RawPage } from '@reportrag/model';
import type { LanguageModel } from 'ai';

import { LLMCaller, LLMTokenUsageAggregator } from '@reportrag/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { PageProcessor, buildPageUserContent } from './page-processor';

vi.mock('@reportrag/shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@reportrag/shared')>();
  return {
    ...actual,
    LLMCaller: { complete: vi.fn() },
  };
});

const usage = {
  component: 'PageProcessor',
  phase: 'page-parsing',
  modelName: 'gpt-4o-mini',
  inputTokens: 40,
  outputTokens: 10,
  totalTokens: 50,
};

const page: RawPage = {
  pageNumber: 2,
  text: 'Revenue rose 12%',
  charCount: 16,
  wordCount: 3,
};

describe('PageProcessor', () => {
  const model = { modelId: 'gpt-4o-mini' } as LanguageModel;
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
  });

  test('sends the prompt as system and the page as user content', async () => {
    vi.mocked(LLMCaller.complete).mockResolvedValueOnce({
      text: '{"summary":"s"}',
      usage,
    });
    const processor = new PageProcessor(mockLogger, {
      model,
      maxOutputTokens: 4096,
      temperature: 0.1,
    });

    await processor.process(page, 'Summarize as JSON');

    expect(LLMCaller.complete).toHaveBeenCalledWith({
      systemPrompt: 'Summarize as JSON',
      userPrompt: 'Page 2 content:\n\nRevenue rose 12%',
      model,
      maxOutputTokens: 4096,
      temperature: 0.1,
      abortSignal: undefined,
      component: 'PageProcessor',
      phase: 'page-parsing',
    });
  });

  test('returns a structured result for a JSON response', async () => {
    vi.mocked(LLMCaller.complete).mockResolvedValueOnce({
      text: '{"summary":"Revenue up","keywords":["revenue"]}',
      usage,
    });
    const processor = new PageProcessor(mockLogger, { model });

    const outcome = await processor.process(page, 'prompt');

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.result).toMatchObject({
      pageNumber: 2,
      charCount: 16,
      wordCount: 3,
      parsedContent: {
        kind: 'structured',
        fields: { summary: 'Revenue up', keywords: ['revenue'] },
      },
    });
    expect(Number.isNaN(Date.parse(outcome.result.processedAt))).toBe(false);
  });

  test('keeps a non-JSON response as raw text', async () => {
    vi.mocked(LLMCaller.complete).mockResolvedValueOnce({
      text: 'Plain prose answer',
      usage,
    });
    const processor = new PageProcessor(mockLogger, { model });

    const outcome = await processor.process(page, 'prompt');

    expect(outcome).toMatchObject({
      ok: true,
      result: { parsedContent: { kind: 'raw', text: 'Plain prose answer' } },
    });
  });

  test('returns a failure instead of throwing when the call fails', async () => {
    vi.mocked(LLMCaller.complete).mockRejectedValueOnce(
      new Error('429 Too Many Requests'),
    );
    const processor = new PageProcessor(mockLogger, { model });

    const outcome = await processor.process(page, 'prompt');

    expect(outcome).toEqual({
      ok: false,
      failure: { pageNumber: 2, error: '429 Too Many Requests' },
    });
    expect(mockLogger.error).toHaveBeenCalledWith(
      '[PageProcessor] Page 2 failed: 429 Too Many Requests',
    );
  });

  test('tracks token usage in the aggregator', async () => {
    vi.mocked(LLMCaller.complete).mockResolvedValueOnce({ text: '{}', usage });
    const aggregator = new LLMTokenUsageAggregator();
    const processor = new PageProcessor(mockLogger, { model });

    await processor.process(page, 'prompt', aggregator);

    expect(aggregator.getTotalUsage()).toEqual({
      inputTokens: 40,
      outputTokens: 10,
      totalTokens: 50,
    });
  });
});

describe('buildPageUserContent', () => {
  test('keeps empty page text', () => {
    expect(
      buildPageUserContent({ pageNumber: 7, text: '', charCount: 0, wordCount: 0 }),
    ).toBe('Page 7 content:\n\n');
  });
});
