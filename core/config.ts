/**
 * Path Configuration Module
 *
 * Selects the path style and the default separator of a path module.
 * Configuration is validated, filled with defaults, and frozen.
 *
 * @module core/config
 */

import { DEFAULT_SEPARATORS, STYLE_NAMES } from './constants.js'
import { EINVAL } from './errors.js'
import { getStyle, isStyleName, type PathStyleName } from './style.js'

/**
 * Path configuration
 */
export interface PathConfig {
  /** Path convention used to interpret separators and prefixes */
  readonly style: PathStyleName

  /** Separator written when a path is synthesized (join, norm) */
  readonly sep: string
}

/**
 * Configuration options (partial, for user input)
 */
export interface PathConfigOptions {
  style?: PathStyleName
  sep?: string
}

/**
 * Style of the platform the process runs on.
 *
 * @example
 * ```typescript
 * hostStyle('win32')  // 'windows'
 * hostStyle('linux')  // 'unix'
 * ```
 */
export function hostStyle(platform: string = typeof process !== 'undefined' ? process.platform : ''): PathStyleName {
  return platform === 'win32' ? 'windows' : 'unix'
}

/**
 * Default configuration values for the host platform
 */
export const defaultConfig: PathConfig = Object.freeze({
  style: hostStyle(),
  sep: DEFAULT_SEPARATORS[hostStyle()],
})

/**
 * Validate a style name
 */
function validateStyle(style: unknown): PathStyleName {
  if (!isStyleName(style)) {
    throw new EINVAL('createConfig', `style must be one of ${STYLE_NAMES.join(', ')}`)
  }
  return style
}

/**
 * Validate a separator against the style's separator set
 */
function validateSeparator(sep: unknown, style: PathStyleName): string {
  if (typeof sep !== 'string') {
    throw new EINVAL('createConfig', 'sep must be a string')
  }
  const { separators } = getStyle(style)
  if (!separators.includes(sep)) {
    throw new EINVAL('createConfig', `sep must be one of ${separators.map((s) => JSON.stringify(s)).join(', ')} for ${style} paths`)
  }
  return sep
}

/**
 * Create a new path configuration
 *
 * When only the style is given, the separator defaults to that style's
 * default separator rather than the host's.
 *
 * @throws {EINVAL} If the style is unknown or the separator is not one of the style's separators
 *
 * @example
 * ```typescript
 * createConfig()                                 // host defaults
 * createConfig({ style: 'windows' })             // { style: 'windows', sep: '\\' }
 * createConfig({ style: 'windows', sep: '/' })   // forward slashes on output
 * createConfig({ style: 'unix', sep: '\\' })     // throws EINVAL
 * ```
 */
export function createConfig(options: PathConfigOptions = {}): PathConfig {
  const style = options.style !== undefined ? validateStyle(options.style) : defaultConfig.style

  const config: PathConfig = {
    style,
    sep:
      options.sep !== undefined
        ? validateSeparator(options.sep, style)
        : DEFAULT_SEPARATORS[style],
  }

  return Object.freeze(config)
}
