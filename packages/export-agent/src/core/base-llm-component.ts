import type { LoggerMethods } from '@quillkit/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@quillkit/shared';
import type { LanguageModel } from 'ai';

/**
 * Options shared by every LLM-backed pipeline stage
 */
export interface BaseLLMComponentOptions {
  /**
   * Retries per model, handled by the AI SDK (default: 3)
   */
  maxRetries?: number;

  /**
   * Sampling temperature (default: 0)
   */
  temperature?: number;

  /**
   * Forwarded to every LLM call
   */
  abortSignal?: AbortSignal;
}

/**
 * Abstract base class for the LLM-backed stages (classifier, cleaner,
 * extractor).
 *
 * Holds the model settings, prefixes log lines with the component name and
 * reports token usage to the run's aggregator when one is attached.
 * Subclasses supply the prompts.
 */
export abstract class BaseLLMComponent {
  protected readonly maxRetries: number;
  protected readonly temperature: number;
  protected readonly abortSignal?: AbortSignal;

  constructor(
    protected readonly logger: LoggerMethods,
    protected readonly model: LanguageModel,
    protected readonly componentName: string,
    options?: BaseLLMComponentOptions,
    protected readonly fallbackModel?: LanguageModel,
    protected readonly aggregator?: LLMTokenUsageAggregator,
  ) {
    this.maxRetries = options?.maxRetries ?? 3;
    this.temperature = options?.temperature ?? 0;
    this.abortSignal = options?.abortSignal;
  }

  /**
   * Log with the `[ComponentName]` prefix
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    this.logger[level](`[${this.componentName}] ${message}`, ...args);
  }

  protected trackUsage(usage: ExtendedTokenUsage): void {
    this.aggregator?.track(usage);
  }

  /**
   * Zero usage record for calls that were short-circuited
   */
  protected createEmptyUsage(phase: string): ExtendedTokenUsage {
    return {
      component: this.componentName,
      phase,
      model: 'primary',
      modelName: 'none',
      inputTokens: 0,
      outputTokens: 0,
      totalTokens: 0,
    };
  }

  /**
   * Build the system prompt for this component's call
   */
  protected abstract buildSystemPrompt(...args: unknown[]): string;

  /**
   * Build the user prompt from the stage input
   */
  protected abstract buildUserPrompt(...args: unknown[]): string;
}
