/**
 * CLI utilities - barrel export
 */

export { formatResult } from './format.js'
export { formatError, unknownOperationError, getErrorMessage } from './errors.js'
