import type { LoggerMethods } from '@quillkit/logger';
import type { StageOutcome } from '@quillkit/model';
import type { LLMTokenUsageAggregator } from '@quillkit/shared';
import type { LanguageModel } from 'ai';

import {
  type BaseLLMComponentOptions,
  TextLLMComponent,
} from '../core/text-llm-component';

/**
 * ContentCleaner options
 */
export interface ContentCleanerOptions extends BaseLLMComponentOptions {
  /**
   * Custom component name for token usage tracking.
   * Defaults to 'ContentCleaner'.
   */
  componentName?: string;
}

/**
 * ContentCleaner
 *
 * Strips conversational wrapping from assistant output ("Would you like me
 * to...", "Hope this helps!") so only the substantive content is exported.
 * On failure, or when the model returns nothing, the text is kept as is.
 */
export class ContentCleaner extends TextLLMComponent {
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: ContentCleanerOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(
      logger,
      model,
      options?.componentName ?? 'ContentCleaner',
      options,
      fallbackModel,
      aggregator,
    );
  }

  async clean(text: string): Promise<StageOutcome<string>> {
    if (text.trim() === '') {
      this.log('info', 'Nothing to clean');
      this.trackUsage(this.createEmptyUsage('cleaning'));
      return { ok: true, value: text };
    }

    try {
      const { output } = await this.callPlainTextLLM(
        this.buildSystemPrompt(),
        this.buildUserPrompt(text),
        'cleaning',
      );

      const cleaned = output.trim();
      if (cleaned === '') {
        this.log('warn', 'Model returned empty text, keeping original content');
        return {
          ok: false,
          value: text,
          failure: {
            kind: 'CleaningFailure',
            stage: 'clean',
            message: 'Cleaner returned empty text',
          },
        };
      }

      this.log(
        'info',
        `Cleaned content: ${text.length} → ${cleaned.length} characters`,
      );
      return { ok: true, value: cleaned };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log('error', `Cleaning failed: ${message}`);
      return {
        ok: false,
        value: text,
        failure: {
          kind: 'CleaningFailure',
          stage: 'clean',
          message: `Failed to clean content: ${message}`,
          cause: error,
        },
      };
    }
  }

  protected buildSystemPrompt(): string {
    return `You prepare assistant responses for export to a document.

## Instructions

1. Remove conversational meta-commentary:
   - Follow-up questions ("Would you like me to add more details?")
   - Offers of help ("Let me know if you need anything else")
   - Pleasantries and sign-offs ("Sure! Here is...", "Hope this helps!")

2. Keep every substantive sentence, heading, list and table exactly as written. Do not summarise, reorder or add content.

3. Keep markdown structure and blank lines between paragraphs.

Return only the cleaned text.`;
  }

  protected buildUserPrompt(text: string): string {
    return `Clean this content:\n\n${text}`;
  }
}
