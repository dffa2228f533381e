/**
 * Formatting utilities for CLI output
 */

import type { HostValue } from '../../core/binding.js'

/**
 * Format a path function result for stdout.
 *
 * Booleans print as `true`/`false`, pairs print one element per line.
 *
 * @example
 * ```typescript
 * formatResult(true)              // 'true'
 * formatResult('a/c')             // 'a/c'
 * formatResult(['/usr', 'lib'])   // '/usr\nlib'
 * ```
 */
export function formatResult(value: HostValue): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false'
  }
  if (typeof value === 'string') {
    return value
  }
  return `${value[0]}\n${value[1]}`
}
