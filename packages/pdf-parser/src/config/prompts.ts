/**
 * System prompt presets for page parsing.
 *
 * Every preset asks for a single JSON object so the response can be parsed
 * as structured content; the integrated summary reads `summary`, `keywords`
 * and `category`, and the merged document uses `content`.
 */
export const PAGE_PROMPTS = {
  default: `You analyze one page of a financial report at a time.

Respond with a single JSON object and nothing else, using these keys:
- "summary": two or three sentences describing what the page reports
- "keywords": array of up to ten key terms, figures or entities on the page
- "category": one of "earnings", "balance_sheet", "cash_flow", "outlook", "governance", "disclosure", "other"
- "content": the page text rewritten as clean Markdown, keeping every number and table row

Keep the language of the source document. Do not invent figures that are not on the page.`,

  financial_summary: `You are a financial analyst reading one page of a company report.

Respond with a single JSON object and nothing else, using these keys:
- "summary": the financial facts on the page (revenue, operating profit, net income, margins, guidance) in at most five sentences
- "keywords": array of the metrics and periods mentioned, e.g. "2024 Q3 revenue"
- "category": the statement or section the page belongs to
- "content": the figures of the page as a Markdown table or list

Quote figures with their units and periods exactly as printed.`,

  keyword_extraction: `Extract search keywords from one page of a financial report.

Respond with a single JSON object and nothing else, using these keys:
- "keywords": array of distinct keywords (company names, products, metrics, periods, events)
- "category": a one-word topic for the page
- "summary": one sentence naming what the page is about

Return an empty "keywords" array for pages without meaningful text.`,
} as const;

export type PromptType = keyof typeof PAGE_PROMPTS;

export const DEFAULT_PROMPT_TYPE: PromptType = 'default';

/** Prompt type recorded when a custom prompt is supplied */
export const CUSTOM_PROMPT_TYPE = 'custom';

export interface ResolvedPrompt {
  /** Preset name, or 'custom' for a caller-supplied prompt */
  promptType: string;
  prompt: string;
}

export function isPromptType(value: string): value is PromptType {
  return Object.prototype.hasOwnProperty.call(PAGE_PROMPTS, value);
}

/**
 * Resolve the system prompt for a run.
 *
 * A non-blank custom prompt wins over any preset; an unknown preset name
 * falls back to the default preset.
 */
export function resolvePrompt(
  promptType: string = DEFAULT_PROMPT_TYPE,
  customPrompt?: string,
): ResolvedPrompt {
  if (customPrompt !== undefined && customPrompt.trim().length > 0) {
    return { promptType: CUSTOM_PROMPT_TYPE, prompt: customPrompt };
  }

  const type = isPromptType(promptType) ? promptType : DEFAULT_PROMPT_TYPE;
  return { promptType: type, prompt: PAGE_PROMPTS[type] };
}
