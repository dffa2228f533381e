/**
 * Path utilities for dualpath - Unix and Windows path manipulation
 *
 * Every operation is a pure string transform: nothing touches the
 * filesystem, and every string input has a defined result. A path module
 * is created for one style (`unix` or `windows`) and one default separator;
 * both styles can be used side by side.
 *
 * @module path
 * @example
 * ```typescript
 * import { unix, windows } from './path.js'
 *
 * unix.norm('a/./b/../c')                 // 'a/c'
 * unix.join('a', 'b', 'c')                // 'a/b/c'
 * unix.split('/usr/lib/libc.so')          // ['/usr/lib', 'libc.so']
 * unix.splitext('file.tar.gz')            // ['file.tar', '.gz']
 * windows.isabs('C:\\a\\b')               // true
 * windows.norm('\\\\srv\\pub\\..\\x')     // '\\\\srv\\pub\\x'
 * ```
 */

import { CHAR_DOT } from './constants.js'
import { createConfig, type PathConfigOptions } from './config.js'
import { getStyle, type PathStyleName } from './style.js'

// =============================================================================
// TYPES
// =============================================================================

/**
 * The path operations of one style.
 */
export interface PathModule {
  /** Style the module interprets paths with */
  readonly style: PathStyleName
  /** Separator written when a path is synthesized */
  readonly sep: string
  /** Check whether a path is absolute */
  isabs(path: string): boolean
  /** Join path fragments; a later absolute fragment replaces everything before it */
  join(...fragments: string[]): string
  /** Split a path into everything before the last component and the last component */
  split(path: string): [head: string, tail: string]
  /** Last component of a path; the tail of `split` */
  basename(path: string): string
  /** Everything but the last component; the head of `split` */
  dirname(path: string): string
  /** Split a path into root and extension so that `root + ext === path` */
  splitext(path: string): [root: string, ext: string]
  /** Extension of the last component, including the dot */
  getext(path: string): string
  /** Collapse redundant separators, `.` and `..` components */
  norm(path: string): string
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Create a path module for a style.
 *
 * @throws {EINVAL} If the style or separator is invalid
 *
 * @example
 * ```typescript
 * const win = createPath({ style: 'windows', sep: '/' })
 * win.join('C:', 'Users', 'me')  // 'C:Users/me'
 * win.norm('C:\\a\\..\\b')       // 'C:/b'
 * ```
 */
export function createPath(options: PathConfigOptions = {}): PathModule {
  const config = createConfig(options)
  const style = getStyle(config.style)
  const { sep } = config

  function isSep(path: string, index: number): boolean {
    return style.isSeparator(path.charCodeAt(index))
  }

  /**
   * Index where the last component starts: after the last separator,
   * but never inside the drive or UNC prefix.
   */
  function componentStart(path: string, prefixLength: number): number {
    let start = path.length
    while (start > prefixLength && !isSep(path, start - 1)) {
      start--
    }
    return start
  }

  /**
   * Check whether a path consists of a drive prefix and nothing else.
   */
  function isBareDrive(path: string): boolean {
    const { kind, length } = style.prefix(path)
    return kind === 'drive' && length === path.length
  }

  /**
   * Check if a path is absolute.
   *
   * @example
   * ```typescript
   * unix.isabs('/a/b')           // true
   * unix.isabs('a/b')            // false
   * windows.isabs('C:\\a')       // true
   * windows.isabs('C:a')         // false (drive-relative)
   * windows.isabs('\\a')         // true  (root of the current drive)
   * windows.isabs('\\\\srv\\pub') // true  (UNC)
   * ```
   */
  function isabs(path: string): boolean {
    return style.isAbsolute(path)
  }

  /**
   * Join path fragments.
   *
   * Empty fragments are skipped. An absolute fragment discards everything
   * joined before it. The default separator is inserted between fragments
   * unless the joined path already ends with a separator or is a bare drive.
   *
   * @example
   * ```typescript
   * unix.join('a', 'b', 'c')     // 'a/b/c'
   * unix.join('a', '/b')         // '/b'
   * unix.join('a/', 'b')         // 'a/b'
   * unix.join('a', '', 'b')      // 'a/b'
   * unix.join()                  // ''
   * windows.join('C:', 'x')      // 'C:x'
   * windows.join('C:\\', 'x')    // 'C:\\x'
   * ```
   */
  function join(...fragments: string[]): string {
    let joined = ''

    for (const fragment of fragments) {
      if (fragment.length === 0) continue

      if (joined.length === 0 || style.isAbsolute(fragment)) {
        joined = fragment
      } else if (isSep(joined, joined.length - 1) || isBareDrive(joined)) {
        joined += fragment
      } else {
        joined += sep + fragment
      }
    }

    return joined
  }

  /**
   * Split a path into head and tail.
   *
   * The tail is the last component (empty when the path ends with a
   * separator). The head keeps the drive or UNC prefix, drops the trailing
   * separators, but never drops the root.
   *
   * @example
   * ```typescript
   * unix.split('/a/b')              // ['/a', 'b']
   * unix.split('/a/b/')             // ['/a/b', '']
   * unix.split('/')                 // ['/', '']
   * unix.split('a')                 // ['', 'a']
   * windows.split('C:foo')          // ['C:', 'foo']
   * windows.split('\\\\srv\\pub\\x') // ['\\\\srv\\pub\\', 'x']
   * ```
   */
  function split(path: string): [head: string, tail: string] {
    const prefixLength = style.prefix(path).length
    const start = componentStart(path, prefixLength)

    let end = start
    while (end > prefixLength && isSep(path, end - 1)) {
      end--
    }

    // Only the prefix and root separators are left: keep them whole
    const head = end === prefixLength ? path.slice(0, start) : path.slice(0, end)

    return [head, path.slice(start)]
  }

  function basename(path: string): string {
    return split(path)[1]
  }

  function dirname(path: string): string {
    return split(path)[0]
  }

  /**
   * Split a path into root and extension.
   *
   * The extension starts at the last `.` of the last component, unless that
   * dot is the component's first character (dotfiles have no extension).
   *
   * @example
   * ```typescript
   * unix.splitext('file.tar.gz')   // ['file.tar', '.gz']
   * unix.splitext('.hidden')       // ['.hidden', '']
   * unix.splitext('.hidden.txt')   // ['.hidden', '.txt']
   * unix.splitext('a.d/file')      // ['a.d/file', '']
   * unix.splitext('file.')         // ['file', '.']
   * ```
   */
  function splitext(path: string): [root: string, ext: string] {
    const start = componentStart(path, style.prefix(path).length)

    for (let i = path.length - 1; i > start; i--) {
      if (path.charCodeAt(i) === CHAR_DOT) {
        return [path.slice(0, i), path.slice(i)]
      }
    }

    return [path, '']
  }

  function getext(path: string): string {
    return splitext(path)[1]
  }

  /**
   * Normalize a path.
   *
   * - Keeps the drive or UNC prefix verbatim
   * - Collapses runs of separators into the default separator
   * - Drops `.` components
   * - Resolves `..` against the preceding component; a `..` that cannot be
   *   resolved is dropped for absolute paths and kept for relative ones
   * - Removes trailing separators (the root stays)
   *
   * @example
   * ```typescript
   * unix.norm('a/./b/../c')                  // 'a/c'
   * unix.norm('/a/../../b')                  // '/b'
   * unix.norm('../../x')                     // '../../x'
   * unix.norm('a//b/')                       // 'a/b'
   * unix.norm('')                            // '.'
   * windows.norm('C:/a/./b')                 // 'C:\\a\\b'
   * windows.norm('\\\\srv\\pub\\..\\x')      // '\\\\srv\\pub\\x'
   * ```
   */
  function norm(path: string): string {
    const prefix = style.prefix(path)
    const hasRoot = prefix.length < path.length && isSep(path, prefix.length)
    const absolute = hasRoot || prefix.kind === 'unc'

    const parts: string[] = []
    let partStart = prefix.length

    for (let i = prefix.length; i <= path.length; i++) {
      if (i < path.length && !isSep(path, i)) continue

      const part = path.slice(partStart, i)
      partStart = i + 1

      if (part === '' || part === '.') continue

      if (part === '..') {
        if (parts.length > 0 && parts[parts.length - 1] !== '..') {
          parts.pop()
        } else if (!absolute) {
          parts.push('..')
        }
        continue
      }

      parts.push(part)
    }

    // 'a/../C:x' must not turn into the drive path 'C:x'
    if (prefix.kind === 'none' && !hasRoot && parts.length > 0 && style.prefix(parts[0] ?? '').kind === 'drive') {
      parts.unshift('.')
    }

    const normalized = path.slice(0, prefix.length) + (hasRoot ? sep : '') + parts.join(sep)

    return normalized === '' ? '.' : normalized
  }

  return Object.freeze({
    style: config.style,
    sep,
    isabs,
    join,
    split,
    basename,
    dirname,
    splitext,
    getext,
    norm,
  })
}

// =============================================================================
// DEFAULT INSTANCES
// =============================================================================

/**
 * Unix path operations (`/` separator).
 */
export const unix: PathModule = createPath({ style: 'unix' })

/**
 * Windows path operations (`\` separator, drive letters, UNC prefixes).
 */
export const windows: PathModule = createPath({ style: 'windows' })

/**
 * Path operations of the platform the process runs on.
 */
export const hostPath: PathModule = createPath()

export const { isabs, join, split, basename, dirname, splitext, getext, norm, sep } = hostPath

export default hostPath
