import type { LoggerMethods } from '@quillkit/logger';
import type { LLMTokenUsageAggregator } from '@quillkit/shared';
import type { LanguageModel } from 'ai';

import {
  type DocumentKind,
  type FormattingPreferences,
  type StageOutcome,
  compactPreferences,
} from '@quillkit/model';

import {
  type BaseLLMComponentOptions,
  TextLLMComponent,
} from '../core/text-llm-component';
import {
  PdfFormattingSchema,
  WordFormattingSchema,
} from './formatting-schemas';

/**
 * FormattingExtractor options
 */
export interface FormattingExtractorOptions extends BaseLLMComponentOptions {
  /**
   * Custom component name for token usage tracking.
   * Defaults to 'FormattingExtractor'.
   */
  componentName?: string;
}

const KIND_GUIDANCE: Readonly<Record<DocumentKind, string>> = {
  word: `This is for a Word document (.docx). Focus on:
- name: Font name (Arial, Calibri, Times New Roman, etc.)
- size: Font size in points
- bold, italic, underline: Text styling
- lineSpacing: Line spacing multiplier
- title_*: The same properties for the title only (e.g. title_alignment)`,
  pdf: `This is for a PDF document. Focus on:
- fontName: PDF font name (Helvetica, Times-Roman, Courier, etc.)
- fontSize: Font size in points
- leftMargin, rightMargin, topMargin, bottomMargin: Page margins in points (72 = 1 inch)
- pageSize: LETTER, A4 or LEGAL
- title_*: The same text properties for the title only (e.g. title_alignment)`,
};

/**
 * FormattingExtractor
 *
 * Pulls explicitly requested styling out of the instruction. The document
 * kind selects the schema, so PDF-only properties such as margins are never
 * asked for on a Word export. Unmentioned fields come back null and are
 * dropped; a failed call yields empty preferences.
 */
export class FormattingExtractor extends TextLLMComponent {
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: FormattingExtractorOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(
      logger,
      model,
      options?.componentName ?? 'FormattingExtractor',
      options,
      fallbackModel,
      aggregator,
    );
  }

  async extract(
    instruction: string,
    documentKind: DocumentKind,
  ): Promise<StageOutcome<FormattingPreferences>> {
    if (instruction.trim() === '') {
      this.log('info', 'Empty instruction, no formatting requested');
      this.trackUsage(this.createEmptyUsage('extraction'));
      return { ok: true, value: {} };
    }

    const systemPrompt = this.buildSystemPrompt(documentKind);
    const userPrompt = this.buildUserPrompt(instruction, documentKind);

    try {
      const raw =
        documentKind === 'pdf'
          ? (
              await this.callTextLLM(
                PdfFormattingSchema,
                systemPrompt,
                userPrompt,
                'extraction',
              )
            ).output
          : (
              await this.callTextLLM(
                WordFormattingSchema,
                systemPrompt,
                userPrompt,
                'extraction',
              )
            ).output;

      const preferences = compactPreferences(raw);
      this.log(
        'info',
        `Extracted ${documentKind} formatting: ${JSON.stringify(preferences)}`,
      );
      return { ok: true, value: preferences };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log(
        'warn',
        `Failed to extract formatting: ${message}. Using defaults.`,
      );
      return {
        ok: false,
        value: {},
        failure: {
          kind: 'ExtractionFailure',
          stage: 'extract-format',
          message: `Failed to extract formatting: ${message}`,
          cause: error,
        },
      };
    }
  }

  protected buildSystemPrompt(documentKind: DocumentKind): string {
    return `You extract document formatting preferences from export requests.

${KIND_GUIDANCE[documentKind]}

Only include properties that are explicitly mentioned.
Return null for properties not specified.`;
  }

  protected buildUserPrompt(
    instruction: string,
    documentKind: DocumentKind,
  ): string {
    return `Extract formatting preferences for a ${documentKind.toUpperCase()} export from:\n"${instruction}"`;
  }
}
