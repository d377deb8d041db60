import type { RenderResult } from '@quillkit/document-renderer';
import type { LoggerMethods } from '@quillkit/logger';
import type { StageOutcome, WorkflowRequest } from '@quillkit/model';

import type { ArtifactOpener } from '../openers/artifact-opener';

/**
 * Finalizer
 *
 * Records the rendered artifact on the request, logs it and, when an opener
 * is attached, opens it. Opening is best effort: a failure is reported as a
 * NotificationFailure and the export still counts as done.
 */
export class Finalizer {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly opener?: ArtifactOpener,
  ) {}

  /**
   * @returns whether the artifact was opened
   */
  async finalize(
    request: WorkflowRequest,
    result: RenderResult,
  ): Promise<StageOutcome<boolean>> {
    request.artifactPath = result.path;
    request.documentKind = result.kind;
    request.appliedProperties = result.appliedProperties;

    this.logger.info(`[Finalizer] Export complete: ${result.path}`);
    this.logger.info(`[Finalizer] Format: ${result.kind}`);
    this.logger.info(
      `[Finalizer] Applied formatting: ${JSON.stringify(result.appliedProperties)}`,
    );

    if (!this.opener) {
      return { ok: true, value: false };
    }

    try {
      if (await this.opener.open(result.path)) {
        this.logger.info(`[Finalizer] Opened ${result.path}`);
        return { ok: true, value: true };
      }
      return this.notificationFailure(`Could not open ${result.path}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.notificationFailure(
        `Failed to open ${result.path}: ${message}`,
        error,
      );
    }
  }

  private notificationFailure(
    message: string,
    cause?: unknown,
  ): StageOutcome<boolean> {
    this.logger.warn(`[Finalizer] ${message}`);
    return {
      ok: false,
      value: false,
      failure: {
        kind: 'NotificationFailure',
        stage: 'finalize',
        message,
        cause,
      },
    };
  }
}
