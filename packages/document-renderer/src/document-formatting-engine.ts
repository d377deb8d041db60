import type { LoggerMethods } from '@quillkit/logger';
import type {
  AppliedProperties,
  DocumentKind,
  FormattingPreferences,
  StageFailure,
} from '@quillkit/model';

import type { DocumentRenderer } from './renderers/document-renderer';

import { RenderError } from './errors/render-error';
import { PathAllocator } from './output/path-allocator';
import { buildFormattingPlan } from './plan/formatting-plan';
import { splitDocumentText } from './plan/text-splitter';
import { PdfRenderer } from './renderers/pdf-renderer';
import { WordRenderer } from './renderers/word-renderer';

export interface RenderRequest {
  sourceText: string;
  preferences: FormattingPreferences;
  documentKind: DocumentKind;

  /**
   * Base filename; reduced to a safe stem
   */
  customName?: string;
}

export interface RenderResult {
  path: string;
  kind: DocumentKind;
  appliedProperties: AppliedProperties;

  /**
   * Preference keys the active registry does not know
   */
  ignoredKeys: string[];

  /**
   * Values a setter rejected; the document was written without them
   */
  propertyFailures: StageFailure[];
}

export interface DocumentFormattingEngineOptions {
  /**
   * Directory documents are written to
   */
  outputDirectory: string;

  /**
   * Replaces the default allocator for `outputDirectory`
   */
  pathAllocator?: PathAllocator;

  /**
   * Replaces the built-in renderer of a kind
   */
  renderers?: Partial<Record<DocumentKind, DocumentRenderer>>;
}

const KIND_LABELS: Readonly<Record<DocumentKind, string>> = {
  word: 'Word',
  pdf: 'PDF',
};

/**
 * DocumentFormattingEngine
 *
 * Turns source text and sparse preferences into a document on disk:
 * split text → formatting plan → renderer → reserved output path.
 *
 * Unknown preference keys and rejected values never stop a render. The only
 * error raised is RenderError, when the file cannot be produced at all; the
 * reserved or partial file is removed before it is thrown.
 */
export class DocumentFormattingEngine {
  private readonly pathAllocator: PathAllocator;
  private readonly renderers: Record<DocumentKind, DocumentRenderer>;

  constructor(
    private readonly logger: LoggerMethods,
    options: DocumentFormattingEngineOptions,
  ) {
    this.pathAllocator =
      options.pathAllocator ??
      new PathAllocator(logger, { directory: options.outputDirectory });
    this.renderers = {
      word: options.renderers?.word ?? new WordRenderer(logger),
      pdf: options.renderers?.pdf ?? new PdfRenderer(logger),
    };
  }

  async render(request: RenderRequest): Promise<RenderResult> {
    const kind = request.documentKind;
    const label = KIND_LABELS[kind];

    const content = splitDocumentText(request.sourceText);
    const plan = buildFormattingPlan(kind, request.preferences);

    if (plan.ignoredKeys.length > 0) {
      this.logger.info(
        `[DocumentFormattingEngine] Ignoring unsupported ${label} properties: ${plan.ignoredKeys.join(', ')}`,
      );
    }

    let path: string;
    try {
      path = await this.pathAllocator.allocatePath(kind, request.customName);
    } catch (error) {
      throw RenderError.fromError(
        `Failed to allocate ${label} output path`,
        kind,
        error,
      );
    }

    try {
      const output = await this.renderers[kind].render({ path, content, plan });

      this.logger.info(
        `[DocumentFormattingEngine] ${label} document created: ${path} (${content.paragraphs.length} paragraphs, ${output.propertyFailures.length} rejected properties)`,
      );

      return {
        path,
        kind,
        appliedProperties: output.appliedProperties,
        ignoredKeys: plan.ignoredKeys,
        propertyFailures: output.propertyFailures,
      };
    } catch (error) {
      await this.pathAllocator.release(path);
      const renderError = RenderError.fromError(
        `Failed to create ${label} document`,
        kind,
        error,
      );
      this.logger.error(`[DocumentFormattingEngine] ${renderError.message}`);
      throw renderError;
    }
  }
}
