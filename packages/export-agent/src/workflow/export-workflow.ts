import type { LoggerMethods } from '@quillkit/logger';
import type {
  DocumentKind,
  StageOutcome,
  TokenUsageReport,
  WorkflowRequest,
  WorkflowStage,
} from '@quillkit/model';
import type { LanguageModel } from 'ai';

import {
  DocumentFormattingEngine,
  type DocumentFormattingEngineOptions,
  type PathAllocator,
  RenderError,
  type RenderResult,
} from '@quillkit/document-renderer';
import { DEFAULT_DOCUMENT_KIND } from '@quillkit/model';
import { LLMTokenUsageAggregator } from '@quillkit/shared';

import type { BaseLLMComponentOptions } from '../core/base-llm-component';

import {
  type IntentClassification,
  IntentClassifier,
} from '../classifiers/intent-classifier';
import { ContentCleaner } from '../cleaners/content-cleaner';
import { FormattingExtractor } from '../extractors/formatting-extractor';
import {
  type ArtifactOpener,
  SystemArtifactOpener,
} from '../openers/artifact-opener';
import {
  type ConversationMessage,
  findLatestAssistantMessage,
} from './conversation';
import { Finalizer } from './finalizer';
import { routeByDocumentKind } from './router';

/**
 * ExportWorkflow options
 */
export interface ExportWorkflowOptions {
  logger: LoggerMethods;

  /**
   * Model used by the classifier, cleaner and extractor
   */
  model: LanguageModel;

  /**
   * Model tried after the primary model has failed
   */
  fallbackModel?: LanguageModel;

  /**
   * Directory documents are written to
   */
  outputDirectory: string;

  /**
   * Open each artifact after it is written (default: false)
   */
  autoOpen?: boolean;

  /**
   * Opener used when `autoOpen` is set (default: system viewer)
   */
  opener?: ArtifactOpener;

  /**
   * Retries per model for every LLM call (default: 3)
   */
  maxRetries?: number;

  /**
   * Sampling temperature for every LLM call (default: 0)
   */
  temperature?: number;

  /**
   * Forwarded to every LLM call; a cancelled call is recovered like any
   * other LLM failure
   */
  abortSignal?: AbortSignal;

  /**
   * Replaces the allocator for `outputDirectory`
   */
  pathAllocator?: PathAllocator;

  /**
   * Replaces built-in renderers
   */
  renderers?: DocumentFormattingEngineOptions['renderers'];

  /**
   * Called with the run's cumulative token usage after every LLM stage and
   * once more when the run ends
   */
  onTokenUsage?: (report: TokenUsageReport) => void;
}

/**
 * Direct export of text the caller already has
 */
export interface ExportRunInput {
  sourceText: string;
  instruction: string;
  customName?: string;

  /**
   * Strip conversational meta-commentary first (default: false)
   */
  clean?: boolean;
}

/**
 * Export of the latest assistant reply in a conversation
 */
export interface ConversationExportInput {
  instruction: string;
  messages: readonly ConversationMessage[];
  customName?: string;
}

/**
 * One-click export to a known document kind
 */
export interface DocumentExportInput {
  sourceText: string;
  documentKind: DocumentKind;
  customName?: string;
}

const KIND_LABELS: Readonly<Record<DocumentKind, string>> = {
  word: 'Word',
  pdf: 'PDF',
};

/**
 * State owned by a single invocation
 */
interface ExportRun {
  request: WorkflowRequest;
  aggregator: LLMTokenUsageAggregator;
  classifier: IntentClassifier;
  cleaner: ContentCleaner;
  extractor: FormattingExtractor;
  startedAt: number;
}

export function createWorkflowRequest(input: {
  sourceText: string;
  instruction: string;
  customName?: string;
}): WorkflowRequest {
  return {
    sourceText: input.sourceText,
    instruction: input.instruction,
    exportIntent: false,
    documentKind: DEFAULT_DOCUMENT_KIND,
    preferences: {},
    customName: input.customName,
    failures: [],
    trace: [],
  };
}

/**
 * ExportWorkflow
 *
 * Drives one export from instruction to file:
 *
 * ANALYZE → [CLEAN] → EXTRACT_FORMAT → ROUTE → RENDER (word | pdf) → FINALIZE
 *
 * Every invocation gets its own request, token usage aggregator and LLM
 * components; the controller itself only holds configuration, so runs can
 * overlap. Recoverable stage failures are recorded on the returned request.
 * The only error thrown is RenderError.
 */
export class ExportWorkflow {
  private readonly logger: LoggerMethods;
  private readonly model: LanguageModel;
  private readonly fallbackModel?: LanguageModel;
  private readonly componentOptions: BaseLLMComponentOptions;
  private readonly engine: DocumentFormattingEngine;
  private readonly finalizer: Finalizer;
  private readonly onTokenUsage?: (report: TokenUsageReport) => void;

  constructor(options: ExportWorkflowOptions) {
    this.logger = options.logger;
    this.model = options.model;
    this.fallbackModel = options.fallbackModel;
    this.componentOptions = {
      maxRetries: options.maxRetries ?? 3,
      temperature: options.temperature ?? 0,
      abortSignal: options.abortSignal,
    };
    this.engine = new DocumentFormattingEngine(options.logger, {
      outputDirectory: options.outputDirectory,
      pathAllocator: options.pathAllocator,
      renderers: options.renderers,
    });
    this.finalizer = new Finalizer(
      options.logger,
      options.autoOpen
        ? (options.opener ?? new SystemArtifactOpener(options.logger))
        : undefined,
    );
    this.onTokenUsage = options.onTokenUsage;
  }

  /**
   * Export `sourceText` as the instruction asks. Renders even when the
   * classifier sees no export intent, since calling this is the request.
   *
   * @throws {RenderError} when the document cannot be written
   */
  async run(input: ExportRunInput): Promise<WorkflowRequest> {
    const run = this.createRun(input);
    this.logger.info('[ExportWorkflow] Starting export');

    await this.analyze(run);
    return this.produce(run, input.clean ?? false);
  }

  /**
   * Export the latest assistant reply when the instruction asks for an
   * export. Stops after analysis when it does not, or when there is no
   * reply to export.
   *
   * @throws {RenderError} when the document cannot be written
   */
  async runFromConversation(
    input: ConversationExportInput,
  ): Promise<WorkflowRequest> {
    const run = this.createRun({ ...input, sourceText: '' });
    this.logger.info(
      `[ExportWorkflow] Starting conversation export (${input.messages.length} messages)`,
    );

    await this.analyze(run);

    if (!run.request.exportIntent) {
      this.logger.info(
        '[ExportWorkflow] No export requested, stopping after analysis',
      );
      return this.completeRun(run);
    }

    const sourceText = findLatestAssistantMessage(input.messages);
    if (sourceText === undefined) {
      this.logger.warn(
        '[ExportWorkflow] No assistant message to export, stopping after analysis',
      );
      return this.completeRun(run);
    }

    run.request.sourceText = sourceText;
    return this.produce(run, true);
  }

  /**
   * Clean `sourceText` and export it to a fixed kind. The kind is taken as
   * given; no classification call is made.
   *
   * @throws {RenderError} when the document cannot be written
   */
  async exportDocument(input: DocumentExportInput): Promise<WorkflowRequest> {
    const label = KIND_LABELS[input.documentKind];
    const run = this.createRun({
      ...input,
      instruction: `Export as ${label} with clean formatting`,
    });
    this.logger.info(`[ExportWorkflow] Starting ${label} export`);

    const preset: StageOutcome<IntentClassification> = {
      ok: true,
      value: { exportIntent: true, documentKind: input.documentKind },
    };
    const classification = await this.runStage(
      run,
      'analyze',
      'Intent classification',
      async () => preset,
    );
    this.applyClassification(run, classification);

    return this.produce(run, true);
  }

  private createRun(input: {
    sourceText: string;
    instruction: string;
    customName?: string;
  }): ExportRun {
    const aggregator = new LLMTokenUsageAggregator();
    const args = [
      this.componentOptions,
      this.fallbackModel,
      aggregator,
    ] as const;

    return {
      request: createWorkflowRequest(input),
      aggregator,
      classifier: new IntentClassifier(this.logger, this.model, ...args),
      cleaner: new ContentCleaner(this.logger, this.model, ...args),
      extractor: new FormattingExtractor(this.logger, this.model, ...args),
      startedAt: Date.now(),
    };
  }

  private async analyze(run: ExportRun): Promise<void> {
    const classification = await this.runStage(
      run,
      'analyze',
      'Intent classification',
      () => run.classifier.classify(run.request.instruction),
    );
    this.applyClassification(run, classification);
  }

  private applyClassification(
    run: ExportRun,
    classification: IntentClassification,
  ): void {
    run.request.exportIntent = classification.exportIntent;
    run.request.documentKind = classification.documentKind;
    run.request.reasoning = classification.reasoning;
  }

  /**
   * CLEAN → EXTRACT_FORMAT → ROUTE → RENDER → FINALIZE
   */
  private async produce(
    run: ExportRun,
    clean: boolean,
  ): Promise<WorkflowRequest> {
    const { request } = run;

    if (clean) {
      request.sourceText = await this.runStage(
        run,
        'clean',
        'Content cleaning',
        () => run.cleaner.clean(request.sourceText),
      );
    }

    request.preferences = await this.runStage(
      run,
      'extract-format',
      'Formatting extraction',
      () => run.extractor.extract(request.instruction, request.documentKind),
    );

    request.trace.push('route');
    const route = routeByDocumentKind(request.documentKind);
    this.logger.info(`[ExportWorkflow] Routing to ${route}`);

    request.trace.push(route);
    const result = await this.render(run);
    request.failures.push(...result.propertyFailures);

    await this.runStage(run, 'finalize', 'Finalization', () =>
      this.finalizer.finalize(request, result),
    );

    return this.completeRun(run);
  }

  private async render(run: ExportRun): Promise<RenderResult> {
    const { request } = run;
    const startTime = Date.now();

    try {
      const result = await this.engine.render({
        sourceText: request.sourceText,
        preferences: request.preferences,
        documentKind: request.documentKind,
        customName: request.customName,
      });
      this.logger.info(
        `[ExportWorkflow] Rendering took ${Date.now() - startTime}ms`,
      );
      return result;
    } catch (error) {
      this.completeRun(run, 'failed');
      throw error instanceof RenderError
        ? error
        : RenderError.fromError(
            'Failed to render document',
            request.documentKind,
            error,
          );
    }
  }

  /**
   * Run a recoverable stage: trace it, record its failure, time it
   */
  private async runStage<T>(
    run: ExportRun,
    stage: WorkflowStage,
    label: string,
    execute: () => Promise<StageOutcome<T>>,
  ): Promise<T> {
    run.request.trace.push(stage);
    const startTime = Date.now();

    const outcome = await execute();
    if (!outcome.ok) {
      run.request.failures.push(outcome.failure);
    }

    this.logger.info(
      `[ExportWorkflow] ${label} took ${Date.now() - startTime}ms`,
    );
    this.emitTokenUsage(run);
    return outcome.value;
  }

  private emitTokenUsage(run: ExportRun): void {
    this.onTokenUsage?.(run.aggregator.getReport());
  }

  private completeRun(
    run: ExportRun,
    status: 'finished' | 'failed' = 'finished',
  ): WorkflowRequest {
    const { request } = run;
    request.usage = run.aggregator.getReport();
    run.aggregator.logSummary(this.logger);
    this.emitTokenUsage(run);

    const summary = `${Date.now() - run.startedAt}ms (${request.trace.join(' → ')}; ${request.failures.length} recovered failures)`;
    if (status === 'failed') {
      this.logger.error(`[ExportWorkflow] Export failed after ${summary}`);
    } else {
      this.logger.info(`[ExportWorkflow] Finished in ${summary}`);
    }
    return request;
  }
}

/**
 * Create a workflow controller. Controllers are cheap and hold no run state;
 * one can serve any number of concurrent runs.
 */
export function createExportWorkflow(
  options: ExportWorkflowOptions,
): ExportWorkflow {
  return new ExportWorkflow(options);
}
