#!/usr/bin/env node
/**
 * dualpath CLI entry point
 *
 * Usage:
 *   npx dualpath norm a/./b/../c
 *   npx dualpath --style windows split 'C:\a\b.txt'
 *   npx dualpath join usr local bin
 */

import { runCLI } from './index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('[dualpath-cli]')

const context = {
  stdout: (text: string) => process.stdout.write(text + '\n'),
  stderr: (text: string) => process.stderr.write(text + '\n'),
}

try {
  const result = runCLI(process.argv.slice(2), context)
  process.exitCode = result.exitCode
} catch (err: unknown) {
  logger.error('Fatal error:', err)
  process.exitCode = 1
}
