/**
 * CLI for dualpath - path operations from the command line
 *
 * Operations:
 * - isabs <path>             - print whether a path is absolute
 * - join [fragments...]      - join path fragments
 * - split <path>             - print head and tail, one per line
 * - basename <path>          - print the last component
 * - dirname <path>           - print everything but the last component
 * - splitext <path>          - print root and extension, one per line
 * - getext <path>            - print the extension
 * - norm <path>              - print the normalized path
 *
 * Every operation takes `--style unix|windows` and `--sep <char>`.
 * Help and version flags are answered before cac parses the arguments.
 */

import { cac, type CAC } from 'cac'
import type { CLIContext, CommandResult } from './types.js'
import { VERSION } from './version.js'
import { formatError, formatResult, unknownOperationError } from './utils/index.js'
import { OPERATION_USAGE, getCommandHelp, mainHelp } from './help.js'
import { PATH_FUNCTION_NAMES, createPathBindings } from '../core/binding.js'
import { createPath } from '../core/path.js'
import { isStyleName } from '../core/style.js'
import type { PathConfigOptions } from '../core/config.js'
import { EINVAL } from '../core/errors.js'

export type { CLIContext, CommandResult } from './types.js'

/**
 * Create the CLI instance with every operation registered
 */
export function createCLI(): CAC {
  const cli = cac('dualpath')

  cli.option('--style <style>', 'Path style: unix or windows')
  cli.option('--sep <sep>', 'Separator written by join and norm')

  for (const binding of createPathBindings(createPath()).list()) {
    cli.command(`${binding.name} ${OPERATION_USAGE[binding.name]}`, binding.description)
  }

  return cli
}

/**
 * Read the --style and --sep options into path configuration
 */
function readPathOptions(options: Record<string, unknown>): PathConfigOptions {
  const { style, sep } = options

  if (style !== undefined && !isStyleName(style)) {
    throw new EINVAL('--style', `unknown style ${String(style)}`)
  }
  if (sep !== undefined && typeof sep !== 'string') {
    throw new EINVAL('--sep', 'separator must be a single character')
  }

  return {
    ...(style !== undefined && { style }),
    ...(sep !== undefined && { sep }),
  }
}

/**
 * Execute a CLI command with the given arguments and context
 */
export function runCLI(args: string[], context: CLIContext): CommandResult {
  const { stdout, stderr } = context

  // Everything after -- is an operand, never a flag
  const dashIndex = args.indexOf('--')
  const flags = dashIndex === -1 ? args : args.slice(0, dashIndex)

  // Handle --version and -v
  if (flags.includes('--version') || flags.includes('-v')) {
    stdout(VERSION)
    return { exitCode: 0 }
  }

  // Handle --help and -h at root level
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    stdout(mainHelp())
    return { exitCode: 0 }
  }

  const cli = createCLI()
  const parsed = cli.parse(['node', 'dualpath', ...args], { run: false })
  const operation = cli.matchedCommandName ?? String(parsed.args[0] ?? '')

  if (!PATH_FUNCTION_NAMES.some((name) => name === operation)) {
    const message = unknownOperationError(operation)
    stderr(message)
    return { exitCode: 1, error: message }
  }

  // Handle operation-specific help
  if (flags.includes('--help') || flags.includes('-h')) {
    const helpText = getCommandHelp(operation)
    if (helpText) {
      stdout(helpText)
      return { exitCode: 0 }
    }
  }

  try {
    const options: Record<string, unknown> = parsed.options
    const afterDashes: unknown = options['--']
    const operands: unknown[] = [...parsed.args, ...(Array.isArray(afterDashes) ? afterDashes : [])]

    const bindings = createPathBindings(createPath(readPathOptions(options)))
    const output = formatResult(bindings.call(operation, operands))

    stdout(output)
    return { exitCode: 0, output }
  } catch (err: unknown) {
    const message = formatError(operation, err)
    stderr(message)
    return { exitCode: 1, error: message }
  }
}
