/**
 * Invariants every path operation must keep, checked over a spread of
 * ordinary and awkward paths in both styles.
 */

import { describe, it, expect } from 'vitest'
import { unix, windows, type PathModule } from '../../core/path.js'

const UNIX_PATHS = [
  '',
  '.',
  '..',
  '/',
  '///',
  'a',
  'a/b/c',
  '/a/b/c',
  'a/./b/../c',
  '/a/../../b',
  '../../x',
  'a//b//',
  '//a',
  'file.tar.gz',
  '.hidden',
  '/etc/.config.d/app.conf',
  'a.b/c',
  'a\\b',
]

const WINDOWS_PATHS = [
  '',
  '.',
  '\\',
  '\\\\',
  'C:',
  'C:\\',
  'C:a\\b',
  'C:\\a\\..\\..\\b',
  'c:/Users/me/notes.txt',
  '\\\\host',
  '\\\\host\\',
  '\\\\host\\share',
  '\\\\host\\share\\..\\x',
  '//host/share/dir/',
  '\\\\host\\\\share',
  'a\\..\\C:x',
  'a\\..\\C:\\x',
  '..\\..\\x',
  'a/b\\c.d',
  '.\\.hidden',
]

const cases: Array<[string, PathModule, string[]]> = [
  ['unix', unix, UNIX_PATHS],
  ['windows', windows, WINDOWS_PATHS],
]

describe.each(cases)('%s invariants', (_name, path, samples) => {
  it.each(samples)('splitext(%j) concatenates back to the path', (p) => {
    const [root, ext] = path.splitext(p)
    expect(root + ext).toBe(p)
  })

  it.each(samples)('getext(%j) is the extension of splitext', (p) => {
    expect(path.getext(p)).toBe(path.splitext(p)[1])
  })

  it.each(samples)('split(%j) joins back to an equivalent path', (p) => {
    const [head, tail] = path.split(p)
    expect(path.norm(path.join(head, tail))).toBe(path.norm(p))
  })

  it.each(samples)('basename and dirname of %j agree with split', (p) => {
    expect([path.dirname(p), path.basename(p)]).toEqual(path.split(p))
  })

  it.each(samples)('norm(%j) is idempotent', (p) => {
    const once = path.norm(p)
    expect(path.norm(once)).toBe(once)
  })

  it.each(samples)('norm(%j) keeps absoluteness', (p) => {
    expect(path.isabs(path.norm(p))).toBe(path.isabs(p))
  })
})
