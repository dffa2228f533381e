/**
 * dualpath - path manipulation for Unix and Windows path styles
 *
 * @example
 * ```typescript
 * import { unix, windows } from 'dualpath'
 *
 * unix.join('a', 'b', 'c')      // 'a/b/c'
 * windows.isabs('C:a\\b')       // false
 * ```
 *
 * @example CLI
 * ```bash
 * npx dualpath norm a/./b/../c
 * npx dualpath --style windows split 'C:\\a\\b'
 * ```
 *
 * @packageDocumentation
 */

export * from './core/index.js'

export { createLogger, logger, type Logger } from './utils/logger.js'
