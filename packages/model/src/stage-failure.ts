import type { PropertyScope } from './formatting-preferences';
import type { WorkflowStage } from './workflow-request';

/**
 * Classification of every failure the export pipeline can encounter
 *
 * Only RenderFailure is fatal; every other kind is recovered with a safe
 * default and recorded on the request.
 */
export type StageFailureKind =
  | 'ClassificationFailure'
  | 'CleaningFailure'
  | 'ExtractionFailure'
  | 'PropertyApplicationFailure'
  | 'RenderFailure'
  | 'NotificationFailure';

export interface StageFailure {
  kind: StageFailureKind;

  /**
   * Stage in which the failure happened
   */
  stage: WorkflowStage;

  /**
   * Human-readable description
   */
  message: string;

  /**
   * Scope of the rejected property (PropertyApplicationFailure only)
   */
  scope?: PropertyScope;

  /**
   * Key of the rejected property (PropertyApplicationFailure only)
   */
  property?: string;

  /**
   * Underlying error, when there is one
   */
  cause?: unknown;
}

/**
 * Typed result of a recoverable stage.
 *
 * On failure `value` carries the documented safe default, so the caller can
 * continue with it while still seeing which failure occurred.
 */
export type StageOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; value: T; failure: StageFailure };
