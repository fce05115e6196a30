/**
 * Token usage report types
 *
 * Structured breakdown of language model token consumption for one ingestion
 * run, grouped by component, then by phase, then by model.
 */

/**
 * Token usage report for one ingestion run
 */
export interface TokenUsageReport {
  /**
   * Breakdown by component, in the order components first reported usage
   */
  components: ComponentUsageReport[];

  /**
   * Grand total across all components
   */
  total: TokenUsageSummary;
}

/**
 * Token usage for a single component
 *
 * Examples: 'PageProcessor', 'TextEmbedder'
 */
export interface ComponentUsageReport {
  component: string;

  /**
   * Breakdown by phase within this component (e.g. 'page-parsing')
   */
  phases: PhaseUsageReport[];

  total: TokenUsageSummary;
}

/**
 * Token usage for a single phase
 */
export interface PhaseUsageReport {
  phase: string;

  /**
   * Usage per model name, in the order each model was first seen
   */
  models: ModelUsageDetail[];

  total: TokenUsageSummary;
}

/**
 * Usage attributed to one model within a phase
 */
export interface ModelUsageDetail extends TokenUsageSummary {
  /**
   * Model identifier, e.g. 'gpt-4o-mini'
   */
  modelName: string;
}

/**
 * Token counts
 *
 * `totalTokens` is reported by the provider and is normally
 * `inputTokens + outputTokens`.
 */
export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}
