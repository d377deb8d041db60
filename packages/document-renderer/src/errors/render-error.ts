import type { DocumentKind } from '@quillkit/model';

/**
 * RenderError
 *
 * Raised when a document cannot be constructed or written at all. The only
 * failure of an export run that reaches the caller.
 */
export class RenderError extends Error {
  readonly documentKind: DocumentKind;

  constructor(
    message: string,
    documentKind: DocumentKind,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'RenderError';
    this.documentKind = documentKind;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create RenderError from unknown error with context
   */
  static fromError(
    context: string,
    documentKind: DocumentKind,
    error: unknown,
  ): RenderError {
    return new RenderError(
      `${context}: ${RenderError.getErrorMessage(error)}`,
      documentKind,
      { cause: error },
    );
  }
}
