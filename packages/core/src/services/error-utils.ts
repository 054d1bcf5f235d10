/**
 * Error Utility
 *
 * Turns caught values into printable messages.
 */

/**
 * Message of an Error, or String(value) for anything else.
 * With a fallback, non-Error values yield the fallback instead.
 */
export function getErrorMessage(error: unknown, fallback?: string): string {
  return error instanceof Error ? error.message : (fallback ?? String(error));
}
