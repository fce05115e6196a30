import { type LanguageModel, generateText } from 'ai';

/**
 * Configuration for a single text completion call
 */
export interface LLMCompletionConfig {
  /**
   * System prompt for the model
   */
  systemPrompt: string;

  /**
   * User content for the model
   */
  userPrompt: string;

  /**
   * Model to call
   */
  model: LanguageModel;

  /**
   * Upper bound on generated tokens (optional)
   */
  maxOutputTokens?: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Retries performed by the AI SDK on transient errors (default: 0)
   */
  maxRetries?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'PageProcessor')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'page-parsing')
   */
  phase: string;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of a completion call including usage information
 */
export interface LLMCompletionResult {
  text: string;
  usage: ExtendedTokenUsage;
}

/**
 * LLMCaller - Centralized completion caller on top of the AI SDK
 *
 * Wraps `generateText` so every component reports usage the same way. No
 * retries are performed unless `maxRetries` is set; errors from the provider
 * propagate to the caller.
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.complete({
 *   systemPrompt: 'Summarize the page as JSON',
 *   userPrompt: 'Page 1 content:\n\n...',
 *   model: openai('gpt-4o-mini'),
 *   component: 'PageProcessor',
 *   phase: 'page-parsing',
 * });
 *
 * console.log(result.text);  // Raw model text
 * console.log(result.usage); // Token usage with model name
 * ```
 */
export class LLMCaller {
  /**
   * Model identifier of a LanguageModel, or the id string itself
   */
  static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  static async complete(
    config: LLMCompletionConfig,
  ): Promise<LLMCompletionResult> {
    const response = await generateText({
      model: config.model,
      system: config.systemPrompt,
      prompt: config.userPrompt,
      maxOutputTokens: config.maxOutputTokens,
      temperature: config.temperature,
      maxRetries: config.maxRetries ?? 0,
      abortSignal: config.abortSignal,
    });

    return {
      text: response.text,
      usage: {
        component: config.component,
        phase: config.phase,
        modelName: this.extractModelName(config.model),
        inputTokens: response.usage.inputTokens ?? 0,
        outputTokens: response.usage.outputTokens ?? 0,
        totalTokens: response.usage.totalTokens ?? 0,
      },
    };
  }
}
