/**
 * ConfigError
 *
 * Raised when the export configuration is invalid or incomplete. Thrown
 * while a workflow is being set up, never during a run.
 */
export class ConfigError extends Error {
  /**
   * One line per invalid setting, when validation produced them
   */
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
    this.issues = issues;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ConfigError from unknown error with context
   */
  static fromError(context: string, error: unknown): ConfigError {
    return new ConfigError(
      `${context}: ${ConfigError.getErrorMessage(error)}`,
      [],
      { cause: error },
    );
  }
}
