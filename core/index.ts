/**
 * dualpath core - Unix and Windows path manipulation
 *
 * Pure string operations over path syntax; no filesystem access.
 *
 * @example
 * ```typescript
 * import { unix, windows, createPath } from 'dualpath'
 *
 * unix.norm('/a/../../b')             // '/b'
 * windows.split('C:\\a\\b.txt')       // ['C:\\a', 'b.txt']
 *
 * const slashes = createPath({ style: 'windows', sep: '/' })
 * slashes.join('C:\\', 'a', 'b')      // 'C:\\a/b'
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Path Operations
// =============================================================================

export {
  createPath,
  unix,
  windows,
  hostPath,
  isabs,
  join,
  split,
  basename,
  dirname,
  splitext,
  getext,
  norm,
  sep,
  type PathModule,
} from './path.js'

// =============================================================================
// Styles & Configuration
// =============================================================================

export {
  unixStyle,
  windowsStyle,
  getStyle,
  isStyleName,
  hasDriveLetter,
  type PathStyle,
  type PathStyleName,
  type PathPrefix,
  type PrefixKind,
} from './style.js'

export {
  createConfig,
  defaultConfig,
  hostStyle,
  type PathConfig,
  type PathConfigOptions,
} from './config.js'

// =============================================================================
// Host Bindings
// =============================================================================

export {
  createPathBindings,
  openPathModule,
  PATH_FUNCTION_NAMES,
  type PathBinding,
  type PathBindings,
  type PathBindingsOptions,
  type PathFunctionName,
  type HostFunction,
  type HostValue,
  type ResultKind,
  type ScriptHost,
} from './binding.js'

// =============================================================================
// Constants & Errors
// =============================================================================

export { constants, STYLE_NAMES, DEFAULT_SEPARATORS } from './constants.js'
export {
  PathError,
  EARITY,
  ETYPE,
  ENOSYS,
  EINVAL,
  isPathError,
  isEarity,
  isEtype,
  isEnosys,
  isEinval,
  hasErrorCode,
  getErrorCode,
  createError,
  ALL_ERROR_CODES,
  type ErrorCode,
} from './errors.js'
