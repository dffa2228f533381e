import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, isDebugEnabled } from './logger.js'

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  it('should prefix every message', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    const logger = createLogger('[test]')
    logger.info('hello', 1)
    logger.error('boom')

    expect(info).toHaveBeenCalledWith('[test]', 'hello', 1)
    expect(error).toHaveBeenCalledWith('[test]', 'boom')
  })

  it('should stay quiet at debug level unless DUALPATH_DEBUG is set', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const logger = createLogger('[test]')

    vi.stubEnv('DUALPATH_DEBUG', '')
    expect(isDebugEnabled()).toBe(false)
    logger.debug('hidden')
    expect(debug).not.toHaveBeenCalled()

    vi.stubEnv('DUALPATH_DEBUG', '1')
    expect(isDebugEnabled()).toBe(true)
    logger.debug('unix.norm', ['a//b'])
    expect(debug).toHaveBeenCalledWith('[test]', 'unix.norm', ['a//b'])
  })
})
