/**
 * Error formatting utilities for CLI
 */

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message
  }
  return String(err)
}

/**
 * Format error for CLI output with consistent styling
 *
 * Format: dualpath <operation>: <message>
 */
export function formatError(operation: string, err: unknown): string {
  return `dualpath ${operation}: ${getErrorMessage(err)}`
}

/**
 * Create an unknown operation error message
 */
export function unknownOperationError(operation: string): string {
  return `dualpath: unknown operation '${operation}'`
}
