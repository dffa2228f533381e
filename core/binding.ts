/**
 * Path Bindings - host-callable path functions
 *
 * Exposes the path operations to a host that passes untyped arguments
 * (a scripting engine, a command line, an RPC endpoint):
 * - A registry of the eight path functions with their arity and result kind
 * - Argument-contract checks before any path operation runs
 * - Registration of the whole set with a host under a module name
 *
 * Contract violations are thrown as `EARITY`, `ETYPE` or `ENOSYS` and are
 * for the host to translate into its own error reporting.
 *
 * @module core/binding
 */

import { EARITY, ENOSYS, ETYPE } from './errors.js'
import { hostPath, type PathModule } from './path.js'
import { logger as defaultLogger, type Logger } from '../utils/logger.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Names of the path functions, in registration order.
 */
export const PATH_FUNCTION_NAMES = [
  'isabs',
  'join',
  'split',
  'basename',
  'dirname',
  'splitext',
  'getext',
  'norm',
] as const

/**
 * Name of a path function.
 */
export type PathFunctionName = (typeof PATH_FUNCTION_NAMES)[number]

/**
 * Value handed back to the host: a flag, a path, or a pair of paths.
 */
export type HostValue = boolean | string | readonly [string, string]

/**
 * Kind of value a function returns.
 */
export type ResultKind = 'boolean' | 'string' | 'pair'

/**
 * A path function as seen by the host.
 */
export interface PathBinding {
  /** Function name */
  readonly name: PathFunctionName
  /** Human-readable description */
  readonly description: string
  /** Fewest arguments accepted */
  readonly minArgs: number
  /** Most arguments accepted (`Infinity` for variadic functions) */
  readonly maxArgs: number
  /** Kind of value returned */
  readonly result: ResultKind
  /** Run the operation on already-validated arguments */
  invoke(args: readonly string[]): HostValue
}

/**
 * Function signature registered with a host.
 */
export type HostFunction = (...args: unknown[]) => HostValue

/**
 * A host that path functions can be registered with.
 */
export interface ScriptHost {
  register(moduleName: string, name: string, fn: HostFunction): void
}

/**
 * Registry of host-callable path functions.
 */
export interface PathBindings {
  /** Path module the functions run against */
  readonly path: PathModule
  /** Check whether a function exists */
  has(name: string): name is PathFunctionName
  /** Get a function by name */
  get(name: string): PathBinding | undefined
  /** List all functions in registration order */
  list(): PathBinding[]
  /**
   * Validate the arguments and call a function.
   *
   * @throws {ENOSYS} If no function has that name
   * @throws {EARITY} If the number of arguments is out of range
   * @throws {ETYPE} If an argument is not a string
   */
  call(name: string, args: readonly unknown[]): HostValue
}

/**
 * Options for creating bindings.
 */
export interface PathBindingsOptions {
  /** Logger receiving a debug line per call */
  logger?: Logger
}

// =============================================================================
// Argument Validation
// =============================================================================

/**
 * Get a human-readable type name for error messages.
 * @internal
 */
function getTypeName(value: unknown): string {
  if (value === null) return 'null'
  if (value === undefined) return 'undefined'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

function describeArity(binding: PathBinding): string {
  const { minArgs, maxArgs } = binding
  if (minArgs === maxArgs) {
    return `${minArgs} argument${minArgs === 1 ? '' : 's'}`
  }
  if (maxArgs === Infinity) {
    return `at least ${minArgs} arguments`
  }
  return `${minArgs} to ${maxArgs} arguments`
}

/**
 * Check the argument count and types of a call.
 * @internal
 */
function validateArgs(binding: PathBinding, args: readonly unknown[]): string[] {
  if (args.length < binding.minArgs || args.length > binding.maxArgs) {
    throw new EARITY(binding.name, `expected ${describeArity(binding)}, got ${args.length}`)
  }

  const strings: string[] = []
  args.forEach((arg, i) => {
    if (typeof arg !== 'string') {
      throw new ETYPE(binding.name, `argument #${i + 1} must be a string, got ${getTypeName(arg)}`)
    }
    strings.push(arg)
  })
  return strings
}

// =============================================================================
// Registry
// =============================================================================

/**
 * Describe the path functions of a path module.
 * @internal
 */
function describeFunctions(path: PathModule): PathBinding[] {
  const unary = (
    name: PathFunctionName,
    description: string,
    result: ResultKind,
    fn: (p: string) => HostValue
  ): PathBinding => ({
    name,
    description,
    minArgs: 1,
    maxArgs: 1,
    result,
    invoke: (args) => fn(args[0] ?? ''),
  })

  return [
    unary('isabs', 'check whether a path is absolute', 'boolean', path.isabs),
    {
      name: 'join',
      description: 'join path fragments',
      minArgs: 0,
      maxArgs: Infinity,
      result: 'string',
      invoke: (args) => path.join(...args),
    },
    unary('split', 'split a path into head and tail', 'pair', path.split),
    unary('basename', 'last component of a path', 'string', path.basename),
    unary('dirname', 'everything but the last component of a path', 'string', path.dirname),
    unary('splitext', 'split a path into root and extension', 'pair', path.splitext),
    unary('getext', 'extension of a path', 'string', path.getext),
    unary('norm', 'normalize a path', 'string', path.norm),
  ]
}

/**
 * Create the host-callable path functions for a path module.
 *
 * @example
 * ```typescript
 * const bindings = createPathBindings(windows)
 *
 * bindings.call('norm', ['C:/a/../b'])   // 'C:\\b'
 * bindings.call('split', ['C:\\a\\b'])   // ['C:\\a', 'b']
 * bindings.call('norm', [])              // throws EARITY
 * bindings.call('join', ['a', 1])        // throws ETYPE
 * ```
 */
export function createPathBindings(path: PathModule, options: PathBindingsOptions = {}): PathBindings {
  const log = options.logger ?? defaultLogger
  const functions = new Map<string, PathBinding>()

  for (const binding of describeFunctions(path)) {
    functions.set(binding.name, Object.freeze(binding))
  }

  function has(name: string): name is PathFunctionName {
    return functions.has(name)
  }

  return {
    path,

    has,

    get(name: string): PathBinding | undefined {
      return functions.get(name)
    },

    list(): PathBinding[] {
      return Array.from(functions.values())
    },

    call(name: string, args: readonly unknown[]): HostValue {
      const binding = functions.get(name)
      if (!binding) {
        throw new ENOSYS(name)
      }

      const strings = validateArgs(binding, args)
      log.debug(`${path.style}.${name}`, strings)
      return binding.invoke(strings)
    },
  }
}

/**
 * Register every path function with a host under one module name.
 *
 * @returns The names registered, in order
 *
 * @example
 * ```typescript
 * const host = {
 *   globals: new Map<string, HostFunction>(),
 *   register(moduleName, name, fn) {
 *     this.globals.set(`${moduleName}.${name}`, fn)
 *   },
 * }
 * openPathModule(host, unix)
 * host.globals.get('path.join')?.('a', 'b') // 'a/b'
 * ```
 */
export function openPathModule(
  host: ScriptHost,
  path: PathModule = hostPath,
  moduleName: string = 'path',
  options: PathBindingsOptions = {}
): PathFunctionName[] {
  const bindings = createPathBindings(path, options)
  const names: PathFunctionName[] = []

  for (const binding of bindings.list()) {
    host.register(moduleName, binding.name, (...args: unknown[]) => bindings.call(binding.name, args))
    names.push(binding.name)
  }

  return names
}
