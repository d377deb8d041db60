import type { LoggerMethods } from '@quillkit/logger';
import type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@quillkit/model';

import type { ExtendedTokenUsage } from './llm-caller';

function formatTokens(usage: TokenUsageSummary): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

function emptySummary(): TokenUsageSummary {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addUsage(target: TokenUsageSummary, usage: TokenUsageSummary): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

interface ComponentAggregate {
  component: string;
  phases: Map<string, PhaseUsageReport>;
  total: TokenUsageSummary;
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across the LLM calls of
 * one export run
 *
 * Tracks usage by:
 * - Component (IntentClassifier, ContentCleaner, FormattingExtractor)
 * - Phase (classification, cleaning, extraction)
 * - Model (primary vs fallback)
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 *
 * aggregator.track({
 *   component: 'IntentClassifier',
 *   phase: 'classification',
 *   model: 'primary',
 *   modelName: 'gpt-4o-mini',
 *   inputTokens: 420,
 *   outputTokens: 18,
 *   totalTokens: 438,
 * });
 *
 * aggregator.logSummary(logger);
 * // [ExportWorkflow] Token usage summary:
 * // IntentClassifier:
 * //   - classification:
 * //       primary (gpt-4o-mini): 420 input, 18 output, 438 total
 * //       subtotal: 420 input, 18 output, 438 total
 * //   IntentClassifier total: 420 input, 18 output, 438 total
 * // Grand total: 420 input, 18 output, 438 total
 * ```
 */
export class LLMTokenUsageAggregator {
  private usage = new Map<string, ComponentAggregate>();

  /**
   * Track token usage from an LLM call
   */
  track(usage: ExtendedTokenUsage): void {
    let component = this.usage.get(usage.component);
    if (!component) {
      component = {
        component: usage.component,
        phases: new Map(),
        total: emptySummary(),
      };
      this.usage.set(usage.component, component);
    }

    let phase = component.phases.get(usage.phase);
    if (!phase) {
      phase = { phase: usage.phase, total: emptySummary() };
      component.phases.set(usage.phase, phase);
    }

    const slot = usage.model;
    let detail: ModelUsageDetail | undefined = phase[slot];
    if (!detail) {
      detail = { modelName: usage.modelName, ...emptySummary() };
      phase[slot] = detail;
    }

    addUsage(detail, usage);
    addUsage(phase.total, usage);
    addUsage(component.total, usage);
  }

  /**
   * Structured report with copies of the tracked numbers, safe to serialize
   * or hand to callers
   */
  getReport(): TokenUsageReport {
    const components: ComponentUsageReport[] = [];

    for (const component of this.usage.values()) {
      const phases: PhaseUsageReport[] = [];

      for (const phase of component.phases.values()) {
        const report: PhaseUsageReport = {
          phase: phase.phase,
          total: { ...phase.total },
        };
        if (phase.primary) {
          report.primary = { ...phase.primary };
        }
        if (phase.fallback) {
          report.fallback = { ...phase.fallback };
        }
        phases.push(report);
      }

      components.push({
        component: component.component,
        phases,
        total: { ...component.total },
      });
    }

    return { components, total: this.getTotalUsage() };
  }

  getTotalUsage(): TokenUsageSummary {
    const total = emptySummary();
    for (const component of this.usage.values()) {
      addUsage(total, component.total);
    }
    return total;
  }

  /**
   * Log usage grouped by component, with phase and model breakdown.
   * Call this once at the end of an export run.
   */
  logSummary(logger: LoggerMethods): void {
    if (this.usage.size === 0) {
      logger.info('[ExportWorkflow] No token usage to report');
      return;
    }

    logger.info('[ExportWorkflow] Token usage summary:');

    const primaryTotal = emptySummary();
    const fallbackTotal = emptySummary();

    for (const component of this.usage.values()) {
      logger.info(`${component.component}:`);

      for (const phase of component.phases.values()) {
        logger.info(`  - ${phase.phase}:`);

        if (phase.primary) {
          logger.info(
            `      primary (${phase.primary.modelName}): ${formatTokens(phase.primary)}`,
          );
          addUsage(primaryTotal, phase.primary);
        }

        if (phase.fallback) {
          logger.info(
            `      fallback (${phase.fallback.modelName}): ${formatTokens(phase.fallback)}`,
          );
          addUsage(fallbackTotal, phase.fallback);
        }

        logger.info(`      subtotal: ${formatTokens(phase.total)}`);
      }

      logger.info(
        `  ${component.component} total: ${formatTokens(component.total)}`,
      );
    }

    if (fallbackTotal.totalTokens > 0) {
      logger.info(`Primary total: ${formatTokens(primaryTotal)}`);
      logger.info(`Fallback total: ${formatTokens(fallbackTotal)}`);
    }
    logger.info(`Grand total: ${formatTokens(this.getTotalUsage())}`);
  }

  reset(): void {
    this.usage = new Map();
  }
}
