export { BatchProcessor } from './utils/batch-processor';
export { ConcurrentPool } from './utils/concurrent-pool';
export { getErrorMessage } from './utils/error-message';
export { KeyedLock } from './utils/keyed-lock';
export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCompletionConfig,
  type LLMCompletionResult,
} from './utils/llm-caller';
export {
  LLMTokenUsageAggregator,
  type TokenUsage,
} from './utils/llm-token-usage-aggregator';
