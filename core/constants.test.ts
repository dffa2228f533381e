import { describe, it, expect } from 'vitest'
import constants, {
  CHAR_BACKWARD_SLASH,
  CHAR_COLON,
  CHAR_DOT,
  CHAR_FORWARD_SLASH,
  DEFAULT_SEPARATORS,
  STYLE_NAMES,
} from './constants.js'

describe('constants', () => {
  it('should match the character codes of the path characters', () => {
    expect(CHAR_FORWARD_SLASH).toBe('/'.charCodeAt(0))
    expect(CHAR_BACKWARD_SLASH).toBe('\\'.charCodeAt(0))
    expect(CHAR_DOT).toBe('.'.charCodeAt(0))
    expect(CHAR_COLON).toBe(':'.charCodeAt(0))
  })

  it('should give every style a default separator', () => {
    expect(STYLE_NAMES).toEqual(['unix', 'windows'])
    expect(STYLE_NAMES.map((name) => DEFAULT_SEPARATORS[name])).toEqual(['/', '\\'])
  })

  it('should group the named constants on the default export', () => {
    expect(constants).toEqual({
      CHAR_FORWARD_SLASH: 47,
      CHAR_BACKWARD_SLASH: 92,
      CHAR_DOT: 46,
      CHAR_COLON: 58,
      STYLE_NAMES: ['unix', 'windows'],
      DEFAULT_SEPARATORS: { unix: '/', windows: '\\' },
    })
    expect(constants.DEFAULT_SEPARATORS).toBe(DEFAULT_SEPARATORS)
  })
})
