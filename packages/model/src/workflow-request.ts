import type { DocumentKind } from './document-kind';
import type {
  AppliedProperties,
  FormattingPreferences,
} from './formatting-preferences';
import type { StageFailure } from './stage-failure';
import type { TokenUsageReport } from './token-usage-report';

/**
 * Pipeline stages, in the order they can be visited
 */
export type WorkflowStage =
  | 'analyze'
  | 'clean'
  | 'extract-format'
  | 'route'
  | 'render-word'
  | 'render-pdf'
  | 'finalize';

/**
 * Mutable record threaded through one export run.
 *
 * Created fresh for every invocation and discarded once the caller is done
 * with it; no component keeps a reference after the run.
 */
export interface WorkflowRequest {
  /**
   * Content to export; the cleaner may rewrite it
   */
  sourceText: string;

  /**
   * The user's natural-language export request
   */
  readonly instruction: string;

  /**
   * Whether an export should occur at all
   */
  exportIntent: boolean;

  /**
   * Target output, 'word' when undetermined
   */
  documentKind: DocumentKind;

  /**
   * Explanation returned by the classifier, if any
   */
  reasoning?: string;

  /**
   * Sparse styling preferences; may be empty, never absent
   */
  preferences: FormattingPreferences;

  /**
   * Optional base filename for the artifact
   */
  customName?: string;

  /**
   * Set only after successful rendering
   */
  artifactPath?: string;

  /**
   * Properties the renderer actually applied
   */
  appliedProperties?: AppliedProperties;

  /**
   * Recovered failures, in the order they happened
   */
  failures: StageFailure[];

  /**
   * Stages visited, in order
   */
  trace: WorkflowStage[];

  /**
   * LLM token usage of this run
   */
  usage?: TokenUsageReport;
}
