import type { LoggerMethods } from '@quillkit/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@quillkit/shared';
import type { LanguageModel } from 'ai';
import type { z } from 'zod';

import { LLMCaller } from '@quillkit/shared';

import {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from './base-llm-component';

export type { BaseLLMComponentOptions } from './base-llm-component';

/**
 * Abstract base class for text-prompted LLM components
 *
 * Wraps both LLMCaller call shapes with the component's model settings and
 * tracks the usage of every call.
 *
 * Subclasses: IntentClassifier, ContentCleaner, FormattingExtractor
 */
export abstract class TextLLMComponent extends BaseLLMComponent {
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, model, componentName, options, fallbackModel, aggregator);
  }

  private promptConfig(
    systemPrompt: string,
    userPrompt: string,
    phase: string,
  ) {
    return {
      systemPrompt,
      userPrompt,
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: this.temperature,
      abortSignal: this.abortSignal,
      component: this.componentName,
      phase,
    };
  }

  /**
   * Structured call validated against `schema`
   *
   * @param phase - Phase name for tracking (e.g., 'classification')
   */
  protected async callTextLLM<TOutput>(
    schema: z.ZodType<TOutput>,
    systemPrompt: string,
    userPrompt: string,
    phase: string,
  ): Promise<{ output: TOutput; usage: ExtendedTokenUsage }> {
    const result = await LLMCaller.call({
      schema,
      ...this.promptConfig(systemPrompt, userPrompt, phase),
    });

    this.trackUsage(result.usage);

    return { output: result.output, usage: result.usage };
  }

  /**
   * Free-text call
   */
  protected async callPlainTextLLM(
    systemPrompt: string,
    userPrompt: string,
    phase: string,
  ): Promise<{ output: string; usage: ExtendedTokenUsage }> {
    const result = await LLMCaller.callText(
      this.promptConfig(systemPrompt, userPrompt, phase),
    );

    this.trackUsage(result.usage);

    return { output: result.output, usage: result.usage };
  }
}
