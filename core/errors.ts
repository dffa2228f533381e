/**
 * @fileoverview Error classes for dualpath
 *
 * Path operations are total over strings and never throw. Errors come from
 * the edges: the binding layer rejects calls that break the argument contract
 * (wrong arity, non-string arguments, unknown function), and configuration
 * rejects invalid styles or separators.
 *
 * Messages follow the format `CODE: description, fn 'detail'`.
 *
 * @example
 * ```typescript
 * import { ETYPE, isEtype } from 'dualpath'
 *
 * throw new ETYPE('join', 'argument #2 must be a string, got number')
 * // ETYPE: bad argument type, join 'argument #2 must be a string, got number'
 *
 * try {
 *   bindings.call('join', ['a', 2])
 * } catch (err) {
 *   if (isEtype(err)) {
 *     console.log('Bad argument:', err.detail)
 *   }
 * }
 * ```
 *
 * @module core/errors
 */

// ============================================================================
// Error Code Definitions
// ============================================================================

/**
 * Error codes and their human-readable descriptions.
 */
const ERROR_CODES = {
  EARITY: { message: 'wrong number of arguments' },
  ETYPE: { message: 'bad argument type' },
  ENOSYS: { message: 'function not implemented' },
  EINVAL: { message: 'invalid argument' },
} as const

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Union type of all error codes.
 *
 * @example
 * ```typescript
 * function describe(code: ErrorCode) {
 *   switch (code) {
 *     case 'EARITY': return 'Check the argument count'
 *     case 'ETYPE': return 'Pass strings only'
 *     // ...
 *   }
 * }
 * ```
 */
export type ErrorCode = keyof typeof ERROR_CODES

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for all dualpath errors.
 *
 * @example
 * ```typescript
 * const error = new PathError('EARITY', 'wrong number of arguments', 'split', 'expected 1 argument, got 0')
 * console.log(error.message) // "EARITY: wrong number of arguments, split 'expected 1 argument, got 0'"
 * console.log(error.code)    // "EARITY"
 * console.log(error.fn)      // "split"
 * ```
 */
export class PathError extends Error {
  /** Error code string (e.g., 'EARITY', 'ETYPE') */
  code: string

  /** Function or operation that raised the error (e.g., 'join', 'createConfig') */
  fn?: string

  /** What exactly was wrong with the call */
  detail?: string

  /**
   * @param code - Error code string
   * @param message - Human-readable error description
   * @param fn - Optional function name
   * @param detail - Optional detail about the offending value
   */
  constructor(code: string, message: string, fn?: string, detail?: string) {
    const fullMessage = `${code}: ${message}${fn ? `, ${fn}` : ''}${detail ? ` '${detail}'` : ''}`
    super(fullMessage)
    this.name = 'PathError'
    this.code = code
    this.fn = fn
    this.detail = detail
  }
}

// ============================================================================
// Error Class Factory
// ============================================================================

/**
 * Create an error class bound to one code.
 * @internal
 */
function createErrorClass<T extends ErrorCode>(code: T) {
  const { message } = ERROR_CODES[code]

  return class extends PathError {
    constructor(fn?: string, detail?: string) {
      super(code, message, fn, detail)
      this.name = code
    }
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

/**
 * EARITY - Wrong number of arguments.
 *
 * Thrown by the binding layer when a function receives fewer or more
 * arguments than it accepts, e.g. `split()` or `norm('a', 'b')`.
 *
 * @example
 * ```typescript
 * throw new EARITY('split', 'expected 1 argument, got 0')
 * // EARITY: wrong number of arguments, split 'expected 1 argument, got 0'
 * ```
 */
export class EARITY extends createErrorClass('EARITY') {}

/**
 * ETYPE - Bad argument type.
 *
 * Thrown by the binding layer when an argument is not a string.
 */
export class ETYPE extends createErrorClass('ETYPE') {}

/**
 * ENOSYS - Function not implemented.
 *
 * Thrown when a host asks for a path function that does not exist.
 *
 * @example
 * ```typescript
 * throw new ENOSYS('realpath')
 * // ENOSYS: function not implemented, realpath
 * ```
 */
export class ENOSYS extends createErrorClass('ENOSYS') {}

/**
 * EINVAL - Invalid argument.
 *
 * Thrown by configuration for an unknown style or a separator the style
 * does not accept.
 */
export class EINVAL extends createErrorClass('EINVAL') {}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard to check if an error is any PathError instance.
 *
 * @example
 * ```typescript
 * try {
 *   bindings.call(name, args)
 * } catch (err) {
 *   if (isPathError(err)) {
 *     console.log(`Path error: ${err.code}`)
 *   }
 * }
 * ```
 */
export function isPathError(error: unknown): error is PathError {
  return error instanceof PathError
}

/**
 * Type guard to check if an error is EARITY.
 */
export function isEarity(error: unknown): error is EARITY {
  return error instanceof EARITY
}

/**
 * Type guard to check if an error is ETYPE.
 */
export function isEtype(error: unknown): error is ETYPE {
  return error instanceof ETYPE
}

/**
 * Type guard to check if an error is ENOSYS.
 */
export function isEnosys(error: unknown): error is ENOSYS {
  return error instanceof ENOSYS
}

/**
 * Type guard to check if an error is EINVAL.
 */
export function isEinval(error: unknown): error is EINVAL {
  return error instanceof EINVAL
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Checks if an error has a specific error code.
 *
 * @example
 * ```typescript
 * if (hasErrorCode(err, 'EARITY')) {
 *   // report usage
 * }
 * ```
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isPathError(error) && error.code === code
}

function isErrorCode(value: string): value is ErrorCode {
  return Object.hasOwn(ERROR_CODES, value)
}

/**
 * Gets the error code from an error if it's a PathError.
 *
 * @returns The error code or undefined if not a PathError
 */
export function getErrorCode(error: unknown): ErrorCode | undefined {
  if (isPathError(error) && isErrorCode(error.code)) {
    return error.code
  }
  return undefined
}

/**
 * Creates a new error from a code, function name and detail.
 *
 * @example
 * ```typescript
 * throw createError('ENOSYS', 'realpath')
 * ```
 */
export function createError(code: ErrorCode, fn?: string, detail?: string): PathError {
  const ErrorClass = {
    EARITY,
    ETYPE,
    ENOSYS,
    EINVAL,
  }[code]

  return new ErrorClass(fn, detail)
}

/**
 * All supported error codes as a constant array.
 */
export const ALL_ERROR_CODES: readonly ErrorCode[] = ['EARITY', 'ETYPE', 'ENOSYS', 'EINVAL']

export default PathError
