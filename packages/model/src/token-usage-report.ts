/**
 * Token usage report for one export run
 *
 * Broken down by the LLM-backed stage that made the call (IntentClassifier,
 * ContentCleaner, FormattingExtractor), then by phase, then by whether the
 * primary or the fallback model answered.
 */
export interface TokenUsageReport {
  /**
   * One entry per component, in the order the components first called the LLM
   */
  components: ComponentUsageReport[];

  /**
   * Grand total across all components
   */
  total: TokenUsageSummary;
}

/**
 * Token usage for a single component
 */
export interface ComponentUsageReport {
  component: string;
  phases: PhaseUsageReport[];
  total: TokenUsageSummary;
}

/**
 * Token usage for a single phase of a component (e.g. 'classification')
 */
export interface PhaseUsageReport {
  phase: string;

  /**
   * Present when the primary model answered at least once in this phase
   */
  primary?: ModelUsageDetail;

  /**
   * Present when the fallback model answered at least once in this phase
   */
  fallback?: ModelUsageDetail;

  total: TokenUsageSummary;
}

export interface ModelUsageDetail extends TokenUsageSummary {
  modelName: string;
}

export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}
