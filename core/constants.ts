/**
 * Character and style constants shared by the path styles.
 *
 * @module core/constants
 */

// =============================================================================
// Character Codes
// =============================================================================

/** ASCII code for '/' */
export const CHAR_FORWARD_SLASH = 47

/** ASCII code for '\' */
export const CHAR_BACKWARD_SLASH = 92

/** ASCII code for '.' */
export const CHAR_DOT = 46

/** ASCII code for ':' */
export const CHAR_COLON = 58

/** ASCII code for 'A' */
export const CHAR_UPPERCASE_A = 65

/** ASCII code for 'Z' */
export const CHAR_UPPERCASE_Z = 90

/** ASCII code for 'a' */
export const CHAR_LOWERCASE_A = 97

/** ASCII code for 'z' */
export const CHAR_LOWERCASE_Z = 122

// =============================================================================
// Styles
// =============================================================================

/**
 * Names of the supported path styles.
 *
 * @example
 * ```typescript
 * import { STYLE_NAMES } from 'dualpath'
 * STYLE_NAMES.includes('windows') // true
 * ```
 */
export const STYLE_NAMES = ['unix', 'windows'] as const

/**
 * Default separator used when a style synthesizes a path.
 */
export const DEFAULT_SEPARATORS = {
  unix: '/',
  windows: '\\',
} as const

/**
 * Grouped constants object.
 */
export const constants = {
  CHAR_FORWARD_SLASH,
  CHAR_BACKWARD_SLASH,
  CHAR_DOT,
  CHAR_COLON,
  STYLE_NAMES,
  DEFAULT_SEPARATORS,
} as const

export default constants
