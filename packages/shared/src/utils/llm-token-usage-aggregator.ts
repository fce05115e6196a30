import type { LoggerMethods } from '@reportrag/logger';
import type {
  ComponentUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@reportrag/model';

import type { ExtendedTokenUsage } from './llm-caller';

/**
 * Token usage totals
 */
export type TokenUsage = TokenUsageSummary;

/**
 * Format token usage as a human-readable string
 *
 * @returns Formatted string like "1500 input, 300 output, 1800 total"
 */
function formatTokens(usage: TokenUsage): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addUsage(target: TokenUsage, usage: TokenUsage): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

interface PhaseAggregate {
  models: Map<string, TokenUsage>;
  total: TokenUsage;
}

interface ComponentAggregate {
  phases: Map<string, PhaseAggregate>;
  total: TokenUsage;
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across LLM calls
 *
 * Collects usage from every call of an ingestion run, grouped by component,
 * phase and model name, and reports it once the run is over. Insertion order
 * is preserved at every level.
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 *
 * aggregator.track({
 *   component: 'PageProcessor',
 *   phase: 'page-parsing',
 *   modelName: 'gpt-4o-mini',
 *   inputTokens: 1500,
 *   outputTokens: 300,
 *   totalTokens: 1800,
 * });
 *
 * aggregator.logSummary(logger);
 * // [TokenUsage] Token usage summary:
 * // PageProcessor:
 * //   - page-parsing (gpt-4o-mini): 1500 input, 300 output, 1800 total
 * //   PageProcessor total: 1500 input, 300 output, 1800 total
 * // Grand total: 1500 input, 300 output, 1800 total
 * ```
 */
export class LLMTokenUsageAggregator {
  private readonly usage = new Map<string, ComponentAggregate>();

  /**
   * Track token usage from an LLM call
   */
  track(usage: ExtendedTokenUsage): void {
    let component = this.usage.get(usage.component);
    if (!component) {
      component = { phases: new Map(), total: emptyUsage() };
      this.usage.set(usage.component, component);
    }

    let phase = component.phases.get(usage.phase);
    if (!phase) {
      phase = { models: new Map(), total: emptyUsage() };
      component.phases.set(usage.phase, phase);
    }

    let model = phase.models.get(usage.modelName);
    if (!model) {
      model = emptyUsage();
      phase.models.set(usage.modelName, model);
    }

    addUsage(model, usage);
    addUsage(phase.total, usage);
    addUsage(component.total, usage);
  }

  /**
   * Get token usage report in structured form
   */
  getReport(): TokenUsageReport {
    const components: ComponentUsageReport[] = [];

    for (const [componentName, component] of this.usage) {
      components.push({
        component: componentName,
        phases: Array.from(component.phases, ([phaseName, phase]) => ({
          phase: phaseName,
          models: Array.from(phase.models, ([modelName, model]) => ({
            modelName,
            ...model,
          })),
          total: { ...phase.total },
        })),
        total: { ...component.total },
      });
    }

    return { components, total: this.getTotalUsage() };
  }

  /**
   * Get total usage across all components and phases
   */
  getTotalUsage(): TokenUsage {
    const total = emptyUsage();
    for (const component of this.usage.values()) {
      addUsage(total, component.total);
    }
    return total;
  }

  /**
   * Log token usage summary grouped by component, phase and model
   *
   * @param prefix - Log prefix identifying the reporting component
   */
  logSummary(logger: LoggerMethods, prefix = '[TokenUsage]'): void {
    if (this.usage.size === 0) {
      logger.info(`${prefix} No token usage to report`);
      return;
    }

    logger.info(`${prefix} Token usage summary:`);

    for (const [componentName, component] of this.usage) {
      logger.info(`${componentName}:`);
      for (const [phaseName, phase] of component.phases) {
        for (const [modelName, model] of phase.models) {
          logger.info(`  - ${phaseName} (${modelName}): ${formatTokens(model)}`);
        }
      }
      logger.info(`  ${componentName} total: ${formatTokens(component.total)}`);
    }

    logger.info(`Grand total: ${formatTokens(this.getTotalUsage())}`);
  }
}
