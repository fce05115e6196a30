import type { LoggerMethods } from '@reportrag/logger';
import type { PageOutcome, RawPage } from '@reportrag/model';
import type { LLMTokenUsageAggregator } from '@reportrag/shared';
import type { LanguageModel } from 'ai';

import { LLMCaller, getErrorMessage } from '@reportrag/shared';

import { parsePageResponse } from '../types/page-response-schema';

/** Options for PageProcessor */
export interface PageProcessorOptions {
  /** Model that parses each page */
  model: LanguageModel;
  /** Upper bound on generated tokens per page */
  maxOutputTokens?: number;
  /** Temperature for generation */
  temperature?: number;
  /** Abort signal forwarded to every completion call */
  abortSignal?: AbortSignal;
}

/**
 * Build the user content sent for a page
 */
export function buildPageUserContent(page: RawPage): string {
  return `Page ${page.pageNumber} content:\n\n${page.text}`;
}

/**
 * Sends a single page to the language model and parses the response.
 *
 * Never throws: any error from the call or the parse is returned as a
 * failed outcome so sibling pages are unaffected.
 */
export class PageProcessor {
  private static readonly COMPONENT = 'PageProcessor';
  private static readonly PHASE = 'page-parsing';

  constructor(
    private readonly logger: LoggerMethods,
    private readonly options: PageProcessorOptions,
  ) {}

  /**
   * @param aggregator - Receives the token usage of the call, if given
   */
  async process(
    page: RawPage,
    prompt: string,
    aggregator?: LLMTokenUsageAggregator,
  ): Promise<PageOutcome> {
    this.logger.debug(`[PageProcessor] Processing page ${page.pageNumber}...`);

    try {
      const { text, usage } = await LLMCaller.complete({
        systemPrompt: prompt,
        userPrompt: buildPageUserContent(page),
        model: this.options.model,
        maxOutputTokens: this.options.maxOutputTokens,
        temperature: this.options.temperature,
        abortSignal: this.options.abortSignal,
        component: PageProcessor.COMPONENT,
        phase: PageProcessor.PHASE,
      });
      aggregator?.track(usage);

      const parsedContent = parsePageResponse(text);
      if (parsedContent.kind === 'raw') {
        this.logger.debug(
          `[PageProcessor] Page ${page.pageNumber} response is not a JSON object, keeping raw text`,
        );
      }

      return {
        ok: true,
        result: {
          pageNumber: page.pageNumber,
          charCount: page.charCount,
          wordCount: page.wordCount,
          parsedContent,
          processedAt: new Date().toISOString(),
        },
      };
    } catch (error) {
      const message = getErrorMessage(error);
      this.logger.error(
        `[PageProcessor] Page ${page.pageNumber} failed: ${message}`,
      );
      return {
        ok: false,
        failure: { pageNumber: page.pageNumber, error: message },
      };
    }
  }
}
