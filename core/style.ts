/**
 * Path styles - the separator and prefix rules of each platform convention.
 *
 * A style is a strategy object: path operations ask it which characters are
 * separators, how long the drive or network prefix of a path is, and whether
 * the path is absolute. Both styles can be used side by side in one process.
 *
 * @module core/style
 * @example
 * ```typescript
 * import { windowsStyle } from './style.js'
 *
 * windowsStyle.prefix('C:\\Users')        // { kind: 'drive', length: 2 }
 * windowsStyle.prefix('\\\\srv\\pub\\a')  // { kind: 'unc', length: 9 }
 * windowsStyle.isAbsolute('C:tmp')        // false
 * ```
 */

import {
  CHAR_BACKWARD_SLASH,
  CHAR_COLON,
  CHAR_FORWARD_SLASH,
  CHAR_LOWERCASE_A,
  CHAR_LOWERCASE_Z,
  CHAR_UPPERCASE_A,
  CHAR_UPPERCASE_Z,
  STYLE_NAMES,
} from './constants.js'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Name of a path style.
 */
export type PathStyleName = (typeof STYLE_NAMES)[number]

/**
 * Kind of prefix a path starts with.
 *
 * - `none` - no prefix (always the case for Unix paths)
 * - `drive` - a Windows drive letter such as `C:`
 * - `unc` - a Windows network prefix such as `\\host\share`
 */
export type PrefixKind = 'none' | 'drive' | 'unc'

/**
 * Prefix found at the start of a path.
 */
export interface PathPrefix {
  readonly kind: PrefixKind
  /** Number of characters the prefix occupies (0 for `none`) */
  readonly length: number
}

/**
 * Separator and prefix rules of one path convention.
 */
export interface PathStyle {
  /** Style name */
  readonly name: PathStyleName
  /** Every character accepted as a directory separator */
  readonly separators: readonly string[]
  /** Check whether a character code is a separator in this style */
  isSeparator(code: number): boolean
  /** Find the drive or UNC prefix at the start of a path */
  prefix(path: string): PathPrefix
  /** Check whether a path is absolute */
  isAbsolute(path: string): boolean
}

const NO_PREFIX: PathPrefix = Object.freeze({ kind: 'none', length: 0 })

// =============================================================================
// UNIX
// =============================================================================

/**
 * Unix paths use `/` as the only separator. Absolute paths begin with `/`.
 */
export const unixStyle: PathStyle = Object.freeze({
  name: 'unix',
  separators: Object.freeze(['/']),

  isSeparator(code: number): boolean {
    return code === CHAR_FORWARD_SLASH
  },

  prefix(_path: string): PathPrefix {
    return NO_PREFIX
  },

  isAbsolute(path: string): boolean {
    return path.length > 0 && path.charCodeAt(0) === CHAR_FORWARD_SLASH
  },
} satisfies PathStyle)

// =============================================================================
// WINDOWS
// =============================================================================

function isWindowsSeparator(code: number): boolean {
  return code === CHAR_BACKWARD_SLASH || code === CHAR_FORWARD_SLASH
}

function isDriveLetter(code: number): boolean {
  return (
    (code >= CHAR_UPPERCASE_A && code <= CHAR_UPPERCASE_Z) ||
    (code >= CHAR_LOWERCASE_A && code <= CHAR_LOWERCASE_Z)
  )
}

/**
 * Index of the first separator at or after `from`, or -1.
 * @internal
 */
function indexOfSeparator(path: string, from: number): number {
  for (let i = from; i < path.length; i++) {
    if (isWindowsSeparator(path.charCodeAt(i))) return i
  }
  return -1
}

/**
 * Check whether a path starts with a drive letter followed by a colon.
 *
 * @example
 * ```typescript
 * hasDriveLetter('C:\\tmp')  // true
 * hasDriveLetter('1:')       // false
 * ```
 */
export function hasDriveLetter(path: string): boolean {
  return path.length >= 2 && isDriveLetter(path.charCodeAt(0)) && path.charCodeAt(1) === CHAR_COLON
}

/**
 * Windows paths accept both `\` and `/` as separators. A path may start with
 * a drive letter (`C:`) or with a UNC prefix (`\\host\share`).
 */
export const windowsStyle: PathStyle = Object.freeze({
  name: 'windows',
  separators: Object.freeze(['\\', '/']),

  isSeparator: isWindowsSeparator,

  prefix(path: string): PathPrefix {
    // Exactly two separators followed by a host name
    if (
      path.length > 2 &&
      isWindowsSeparator(path.charCodeAt(0)) &&
      isWindowsSeparator(path.charCodeAt(1)) &&
      !isWindowsSeparator(path.charCodeAt(2))
    ) {
      const hostEnd = indexOfSeparator(path, 2)
      if (hostEnd === -1) return { kind: 'unc', length: path.length }
      const shareEnd = indexOfSeparator(path, hostEnd + 1)
      return { kind: 'unc', length: shareEnd === -1 ? path.length : shareEnd }
    }

    if (hasDriveLetter(path)) {
      return { kind: 'drive', length: 2 }
    }

    return NO_PREFIX
  },

  isAbsolute(path: string): boolean {
    const { kind, length } = windowsStyle.prefix(path)
    if (kind === 'unc') return true
    return length < path.length && isWindowsSeparator(path.charCodeAt(length))
  },
} satisfies PathStyle)

// =============================================================================
// LOOKUP
// =============================================================================

const STYLES: Record<PathStyleName, PathStyle> = {
  unix: unixStyle,
  windows: windowsStyle,
}

/**
 * Get the style strategy for a style name.
 */
export function getStyle(name: PathStyleName): PathStyle {
  return STYLES[name]
}

/**
 * Type guard for style names.
 *
 * @example
 * ```typescript
 * isStyleName('windows') // true
 * isStyleName('dos')     // false
 * ```
 */
export function isStyleName(value: unknown): value is PathStyleName {
  return STYLE_NAMES.some((name) => name === value)
}
