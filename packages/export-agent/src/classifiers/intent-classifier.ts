import type { LoggerMethods } from '@quillkit/logger';
import type { LLMTokenUsageAggregator } from '@quillkit/shared';
import type { LanguageModel } from 'ai';

import {
  DEFAULT_DOCUMENT_KIND,
  type DocumentKind,
  type StageOutcome,
  isDocumentKind,
} from '@quillkit/model';
import { z } from 'zod';

import {
  type BaseLLMComponentOptions,
  TextLLMComponent,
} from '../core/text-llm-component';

/**
 * IntentClassifier options
 */
export interface IntentClassifierOptions extends BaseLLMComponentOptions {
  /**
   * Custom component name for token usage tracking.
   * Defaults to 'IntentClassifier'.
   */
  componentName?: string;
}

export interface IntentClassification {
  exportIntent: boolean;
  documentKind: DocumentKind;
  reasoning?: string;
}

const IntentSchema = z.object({
  exportIntent: z
    .boolean()
    .describe('True when the user asks to export, save or download content'),
  documentKind: z
    .string()
    .describe('"word" for Word/.docx/doc output, "pdf" for PDF output'),
  reasoning: z
    .string()
    .nullable()
    .describe('One sentence explaining the decision'),
});

/**
 * Classification used whenever the instruction cannot be classified
 */
export const SAFE_CLASSIFICATION: Readonly<IntentClassification> = {
  exportIntent: false,
  documentKind: DEFAULT_DOCUMENT_KIND,
};

/**
 * Trim and lower-case a kind returned by the model; anything other than a
 * known kind becomes the default kind
 */
export function normalizeDocumentKind(raw: unknown): DocumentKind {
  const normalized = typeof raw === 'string' ? raw.trim().toLowerCase() : raw;
  return isDocumentKind(normalized) ? normalized : DEFAULT_DOCUMENT_KIND;
}

/**
 * IntentClassifier
 *
 * Decides from the user's instruction whether an export is wanted and which
 * document kind to produce. Never throws: a failed call yields the safe
 * classification (no intent, Word) as a failed outcome.
 */
export class IntentClassifier extends TextLLMComponent {
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: IntentClassifierOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(
      logger,
      model,
      options?.componentName ?? 'IntentClassifier',
      options,
      fallbackModel,
      aggregator,
    );
  }

  async classify(
    instruction: string,
  ): Promise<StageOutcome<IntentClassification>> {
    if (instruction.trim() === '') {
      this.log('info', 'Empty instruction, using default classification');
      this.trackUsage(this.createEmptyUsage('classification'));
      return { ok: true, value: { ...SAFE_CLASSIFICATION } };
    }

    try {
      const { output } = await this.callTextLLM(
        IntentSchema,
        this.buildSystemPrompt(),
        this.buildUserPrompt(instruction),
        'classification',
      );

      const documentKind = normalizeDocumentKind(output.documentKind);
      if (documentKind !== output.documentKind) {
        this.log(
          'warn',
          `Unrecognised document kind "${output.documentKind}", using ${documentKind}`,
        );
      }

      this.log(
        'info',
        `Export intent: ${output.exportIntent}, document kind: ${documentKind}`,
      );

      return {
        ok: true,
        value: {
          exportIntent: output.exportIntent,
          documentKind,
          reasoning: output.reasoning ?? undefined,
        },
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log('error', `Classification failed: ${message}`);
      return {
        ok: false,
        value: { ...SAFE_CLASSIFICATION },
        failure: {
          kind: 'ClassificationFailure',
          stage: 'analyze',
          message: `Failed to classify export request: ${message}`,
          cause: error,
        },
      };
    }
  }

  protected buildSystemPrompt(): string {
    return `You classify requests sent to a document export assistant.

## Instructions

1. **exportIntent**: true when the user wants content turned into a file (export, save, download, convert, "make this a PDF"). False for questions, edits or chat that does not ask for a file.

2. **documentKind**: choose ONE of
   - "word" for .docx, Word document, Word file, doc
   - "pdf" for .pdf, PDF document, PDF file
   Use "word" when no format is named.

3. **reasoning**: one short sentence, or null.

Formatting details such as fonts or margins do not change the classification.`;
  }

  protected buildUserPrompt(instruction: string): string {
    return `Classify this request:\n"${instruction}"`;
  }
}
