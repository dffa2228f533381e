/**
 * CLI Types for dualpath
 */

/**
 * Result of executing a CLI command
 */
export interface CommandResult {
  exitCode: number
  output?: string
  error?: string
}

/**
 * CLI context for dependency injection
 */
export interface CLIContext {
  stdout: (text: string) => void
  stderr: (text: string) => void
}
