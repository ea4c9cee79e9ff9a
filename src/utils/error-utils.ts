/**
 * Utility functions for consistent error handling across the codebase.
 */

/**
 * Extracts a string message from any error value.
 * Handles Error instances, strings, numbers, null, undefined, and objects.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Wraps an error with additional context, preserving the original error as cause.
 */
export function wrapError(error: unknown, context: string): Error {
  const message = `${context}: ${getErrorMessage(error)}`;
  if (error instanceof Error) {
    return new Error(message, { cause: error });
  }
  return new Error(message);
}

/**
 * Flattens zod-style issues into `path: message` lines.
 */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
