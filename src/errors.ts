// ============================================================================
// ERRORS
// ============================================================================

export interface ParameterIssue {
  path: string;
  message: string;
}

/**
 * Raised for a bad time step, a malformed controller configuration or
 * non-physical vehicle parameters. Never raised for out-of-range controller
 * inputs, which are clamped instead.
 */
export class InvalidParameterError extends Error {
  constructor(public context: string, public issues: ParameterIssue[]) {
    super(`Invalid parameter in ${context}: ${issues.map(formatIssue).join('; ')}`);
    this.name = 'InvalidParameterError';

    Error.captureStackTrace?.(this, InvalidParameterError);
  }

  getFormattedIssues(): string[] {
    return this.issues.map(formatIssue);
  }

  toJSON(): object {
    return {
      name: this.name,
      context: this.context,
      message: this.message,
      issues: this.getFormattedIssues(),
    };
  }
}

function formatIssue(issue: ParameterIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}
