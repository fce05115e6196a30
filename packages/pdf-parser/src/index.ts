export {
  CUSTOM_PROMPT_TYPE,
  DEFAULT_PROMPT_TYPE,
  PAGE_PROMPTS,
  isPromptType,
  resolvePrompt,
} from './config/prompts';
export type { PromptType, ResolvedPrompt } from './config/prompts';
export { PdfDownloader, buildPdfFilename } from './core/pdf-downloader';
export type { DownloadedPdf, PdfDownloaderOptions } from './core/pdf-downloader';
export { DownloadError } from './errors/download-error';
export { ExtractionError } from './errors/extraction-error';
export { MergeError } from './errors/merge-error';
export { DEFAULT_PAGE_CONCURRENCY, PageFanOut } from './processors/page-fan-out';
export type { PageFanOutOptions } from './processors/page-fan-out';
export { PageMerger, renderPageContent } from './processors/page-merger';
export { PageProcessor, buildPageUserContent } from './processors/page-processor';
export type { PageProcessorOptions } from './processors/page-processor';
export { PageTextExtractor, countWords } from './processors/page-text-extractor';
export { EMPTY_SUMMARY_ERROR, SummaryIntegrator } from './processors/summary-integrator';
export { parsePageResponse } from './types/page-response-schema';
