import { describe, it, expect } from 'vitest'
import { getStyle, hasDriveLetter, isStyleName, unixStyle, windowsStyle } from './style.js'
import { CHAR_BACKWARD_SLASH, CHAR_FORWARD_SLASH } from './constants.js'

describe('unixStyle', () => {
  it('accepts only the forward slash as a separator', () => {
    expect(unixStyle.separators).toEqual(['/'])
    expect(unixStyle.isSeparator(CHAR_FORWARD_SLASH)).toBe(true)
    expect(unixStyle.isSeparator(CHAR_BACKWARD_SLASH)).toBe(false)
  })

  it('never finds a prefix', () => {
    expect(unixStyle.prefix('C:\\x')).toEqual({ kind: 'none', length: 0 })
    expect(unixStyle.prefix('//host/share')).toEqual({ kind: 'none', length: 0 })
  })
})

describe('windowsStyle', () => {
  it('accepts both slashes as separators', () => {
    expect(windowsStyle.separators).toEqual(['\\', '/'])
    expect(windowsStyle.isSeparator(CHAR_FORWARD_SLASH)).toBe(true)
    expect(windowsStyle.isSeparator(CHAR_BACKWARD_SLASH)).toBe(true)
  })

  describe('prefix', () => {
    it('finds a drive letter', () => {
      expect(windowsStyle.prefix('C:\\Users')).toEqual({ kind: 'drive', length: 2 })
      expect(windowsStyle.prefix('z:')).toEqual({ kind: 'drive', length: 2 })
    })

    it('ignores a colon after anything but an ASCII letter', () => {
      expect(windowsStyle.prefix('1:\\x')).toEqual({ kind: 'none', length: 0 })
    })

    it('finds a UNC prefix running through the share name', () => {
      expect(windowsStyle.prefix('\\\\srv\\pub\\a')).toEqual({ kind: 'unc', length: 9 })
      expect(windowsStyle.prefix('//srv/pub')).toEqual({ kind: 'unc', length: 9 })
    })

    it('takes the whole path when the host or share has no end', () => {
      expect(windowsStyle.prefix('\\\\srv')).toEqual({ kind: 'unc', length: 5 })
      expect(windowsStyle.prefix('\\\\srv\\pub')).toEqual({ kind: 'unc', length: 9 })
    })

    it('requires exactly two leading separators', () => {
      expect(windowsStyle.prefix('\\\\\\srv')).toEqual({ kind: 'none', length: 0 })
      expect(windowsStyle.prefix('\\\\')).toEqual({ kind: 'none', length: 0 })
      expect(windowsStyle.prefix('\\srv')).toEqual({ kind: 'none', length: 0 })
    })
  })

  describe('isAbsolute', () => {
    it('needs a separator after the drive', () => {
      expect(windowsStyle.isAbsolute('C:\\')).toBe(true)
      expect(windowsStyle.isAbsolute('C:tmp')).toBe(false)
    })

    it('accepts UNC paths without a trailing separator', () => {
      expect(windowsStyle.isAbsolute('\\\\srv')).toBe(true)
    })
  })
})

describe('hasDriveLetter', () => {
  it('checks for a letter followed by a colon', () => {
    expect(hasDriveLetter('D:')).toBe(true)
    expect(hasDriveLetter('D')).toBe(false)
    expect(hasDriveLetter(':D')).toBe(false)
  })
})

describe('getStyle and isStyleName', () => {
  it('look up styles by name', () => {
    expect(getStyle('unix')).toBe(unixStyle)
    expect(getStyle('windows')).toBe(windowsStyle)
  })

  it('recognize only known style names', () => {
    expect(isStyleName('unix')).toBe(true)
    expect(isStyleName('windows')).toBe(true)
    expect(isStyleName('dos')).toBe(false)
    expect(isStyleName(42)).toBe(false)
  })
})
