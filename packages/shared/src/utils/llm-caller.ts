import type { z } from 'zod';

import {
  type LanguageModel,
  type LanguageModelUsage,
  NoObjectGeneratedError,
  Output,
  generateText,
  hasToolCall,
  tool,
} from 'ai';

import { detectProvider } from './provider-detector';

/**
 * Prompt and model settings shared by every LLM call shape
 */
export interface LLMPromptConfig {
  /**
   * System prompt for LLM
   */
  systemPrompt: string;

  /**
   * User prompt for LLM
   */
  userPrompt: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model tried once the primary model has failed (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Maximum retry count per model, handled by the AI SDK
   */
  maxRetries: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'IntentClassifier')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'classification', 'extraction')
   */
  phase: string;
}

/**
 * Configuration for a structured LLM call validated against a zod schema
 */
export interface LLMCallConfig<TSchema extends z.ZodType>
  extends LLMPromptConfig {
  /**
   * Zod schema for response validation
   */
  schema: TSchema;
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
}

interface GeneratedOutput<T> {
  output: T;
  usage?: LanguageModelUsage;
}

interface PromptParams {
  system: string;
  prompt: string;
  temperature?: number;
  maxRetries: number;
  abortSignal?: AbortSignal;
}

/**
 * LLMCaller - Centralized LLM API caller with retry and fallback support
 *
 * Offers the two call shapes the export pipeline needs:
 * - `callText`: plain prompt in, text out
 * - `call`: prompt plus zod schema in, validated record out
 *
 * Both try the primary model first (the AI SDK retries it `maxRetries`
 * times), then the fallback model if one is configured, and report token
 * usage tagged with the model that answered.
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   schema: IntentSchema,
 *   systemPrompt: 'You classify export requests',
 *   userPrompt: 'Save this as a PDF',
 *   primaryModel: openai('gpt-4o-mini'),
 *   fallbackModel: anthropic('claude-3-5-sonnet-20241022'),
 *   maxRetries: 3,
 *   component: 'IntentClassifier',
 *   phase: 'classification',
 * });
 *
 * console.log(result.output);        // Parsed result
 * console.log(result.usedFallback);  // Whether fallback was used
 * ```
 */
export class LLMCaller {
  /**
   * Attempts per model when structured output does not match the schema.
   * Total attempts = MAX_STRUCTURED_OUTPUT_RETRIES + 1.
   */
  private static readonly MAX_STRUCTURED_OUTPUT_RETRIES = 2;

  private static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  private static buildUsage(
    config: LLMPromptConfig,
    modelName: string,
    usage: LanguageModelUsage | undefined,
    usedFallback: boolean,
  ): ExtendedTokenUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
      totalTokens: usage?.totalTokens ?? 0,
    };
  }

  private static toPromptParams(config: LLMPromptConfig): PromptParams {
    return {
      system: config.systemPrompt,
      prompt: config.userPrompt,
      temperature: config.temperature,
      maxRetries: config.maxRetries,
      abortSignal: config.abortSignal,
    };
  }

  /**
   * Generate structured output via a forced tool call.
   *
   * Used for providers that do not reliably support `Output.object()`. The
   * tool's input schema is the target schema; its parsed input is the result.
   *
   * @throws NoObjectGeneratedError when no attempt produces a tool call
   */
  private static async generateViaToolCall<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput>,
    params: PromptParams,
  ): Promise<GeneratedOutput<TOutput>> {
    const submitResult = tool({
      description: 'Submit the structured result',
      inputSchema: schema,
    });

    const runOnce = () =>
      generateText({
        ...params,
        model,
        tools: { submitResult },
        toolChoice: { type: 'tool', toolName: 'submitResult' },
        stopWhen: hasToolCall('submitResult'),
      });

    for (let attempt = 0; ; attempt++) {
      const response = await runOnce();

      const toolCall = response.toolCalls[0];
      if (toolCall) {
        return { output: schema.parse(toolCall.input), usage: response.usage };
      }

      if (attempt >= this.MAX_STRUCTURED_OUTPUT_RETRIES) {
        throw new NoObjectGeneratedError({
          message: 'Model did not produce a tool call for structured output',
          text: response.text,
          response: response.response,
          usage: response.usage,
          finishReason: response.finishReason,
        });
      }
    }
  }

  /**
   * Generate structured output with a provider-aware strategy.
   *
   * - OpenAI / Anthropic / Google: `Output.object()`, retried on schema mismatch
   * - Together AI / unknown: forced tool call
   */
  private static async generateStructuredOutput<TOutput>(
    model: LanguageModel,
    schema: z.ZodType<TOutput>,
    params: PromptParams,
  ): Promise<GeneratedOutput<TOutput>> {
    const providerType = detectProvider(model);

    if (providerType === 'togetherai' || providerType === 'unknown') {
      return this.generateViaToolCall(model, schema, params);
    }

    let lastError: unknown;

    for (
      let attempt = 0;
      attempt <= this.MAX_STRUCTURED_OUTPUT_RETRIES;
      attempt++
    ) {
      try {
        const response = await generateText({
          ...params,
          model,
          output: Output.object({ schema }),
        });
        return { output: response.output, usage: response.usage };
      } catch (error) {
        if (NoObjectGeneratedError.isInstance(error)) {
          lastError = error;
          continue;
        }
        throw error;
      }
    }

    throw lastError;
  }

  /**
   * Run a generation against the primary model, then the fallback model.
   * An aborted call is never retried on the fallback.
   */
  private static async executeWithFallback<TOutput>(
    config: LLMPromptConfig,
    generateFn: (model: LanguageModel) => Promise<GeneratedOutput<TOutput>>,
  ): Promise<LLMCallResult<TOutput>> {
    try {
      const response = await generateFn(config.primaryModel);

      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          this.extractModelName(config.primaryModel),
          response.usage,
          false,
        ),
        usedFallback: false,
      };
    } catch (primaryError) {
      if (config.abortSignal?.aborted || !config.fallbackModel) {
        throw primaryError;
      }

      const response = await generateFn(config.fallbackModel);

      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          this.extractModelName(config.fallbackModel),
          response.usage,
          true,
        ),
        usedFallback: true,
      };
    }
  }

  /**
   * Call LLM for a structured record validated against `config.schema`
   *
   * @throws Error if the primary and (when set) fallback model both fail
   */
  static async call<TOutput = unknown>(
    config: LLMCallConfig<z.ZodType<TOutput>>,
  ): Promise<LLMCallResult<TOutput>> {
    const params = this.toPromptParams(config);
    return this.executeWithFallback(config, (model) =>
      this.generateStructuredOutput(model, config.schema, params),
    );
  }

  /**
   * Call LLM for free text
   *
   * @throws Error if the primary and (when set) fallback model both fail
   */
  static async callText(
    config: LLMPromptConfig,
  ): Promise<LLMCallResult<string>> {
    const params = this.toPromptParams(config);
    return this.executeWithFallback(config, async (model) => {
      const response = await generateText({ ...params, model });
      return { output: response.text, usage: response.usage };
    });
  }
}
