/**
 * Help text for CLI operations
 */

import { PATH_FUNCTION_NAMES, createPathBindings, type PathFunctionName } from '../core/binding.js'
import { unix } from '../core/path.js'
import { VERSION } from './version.js'

/**
 * Argument usage of each operation, as registered with cac
 */
export const OPERATION_USAGE: Record<PathFunctionName, string> = {
  isabs: '<path>',
  join: '[fragments...]',
  split: '<path>',
  basename: '<path>',
  dirname: '<path>',
  splitext: '<path>',
  getext: '<path>',
  norm: '<path>',
}

const OPTIONS_TEXT = `  --style <style>  Path style: unix or windows (default: host platform)
  --sep <sep>      Separator written by join and norm`

const DESCRIPTIONS = new Map(createPathBindings(unix).list().map((binding) => [binding.name, binding.description] as const))

function describe(name: PathFunctionName): string {
  return DESCRIPTIONS.get(name) ?? ''
}

/**
 * Main help text shown with --help or no arguments
 */
export function mainHelp(): string {
  const lines = PATH_FUNCTION_NAMES.map((name) => {
    const signature = `${name} ${OPERATION_USAGE[name]}`
    return `  ${signature.padEnd(24)}${describe(name)}`
  })

  return `dualpath/${VERSION}

Usage:
  $ dualpath <operation> [options] [paths...]

Operations:
${lines.join('\n')}

For more info, run any operation with the --help flag:
  $ dualpath norm --help
  $ dualpath join --help

Options:
${OPTIONS_TEXT}
  -v, --version    Display version number
  -h, --help       Display this message
`
}

/**
 * Get help text for a specific operation
 */
export function getCommandHelp(operation: string): string | null {
  const name = PATH_FUNCTION_NAMES.find((n) => n === operation)
  if (name === undefined) return null

  return `dualpath/${VERSION}

Usage:
  $ dualpath ${name} ${OPERATION_USAGE[name]}

Options:
${OPTIONS_TEXT}
  -h, --help       Display this message

Description:
  ${describe(name)}
`
}
