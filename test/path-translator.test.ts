import { describe, expect, it } from 'vitest'
import { PathTranslator } from '../src/utils/path-translator'

function translator(mappings = [{ emulated: '/tmp', host: 'C:\\Temp' }]): PathTranslator {
  return new PathTranslator({
    enabled: true,
    systemDrive: 'C:',
    homeDir: 'C:\\Users\\tester',
    mappings,
  })
}

describe('PathTranslator', () => {
  describe('toHostForm', () => {
    const paths = translator()

    it.each([
      ['/c/Users/x', 'C:\\Users\\x'],
      ['/d/data/file.txt', 'D:\\data\\file.txt'],
      ['/d', 'D:\\'],
      ['/Users/tester/docs', 'C:\\Users\\tester\\docs'],
      ['/home', 'C:\\home'],
      ['/', 'C:\\'],
      ['/mnt/e/backup', 'E:\\backup'],
      ['~', 'C:\\Users\\tester'],
      ['~/notes.txt', 'C:\\Users\\tester\\notes.txt'],
      ['//server/share/dir', '\\\\server\\share\\dir'],
      ['/tmp', 'C:\\Temp'],
      ['/tmp/x.log', 'C:\\Temp\\x.log'],
    ])('rewrites %s', (input, expected) => {
      expect(paths.toHostForm(input)).toBe(expected)
    })

    it.each([
      'docs/a.txt',
      'C:\\Windows',
      '%USERPROFILE%\\x',
      '$HOME/x',
      '-l',
      '',
    ])('leaves %j alone', (input) => {
      expect(paths.toHostForm(input)).toBe(input)
    })

    it('does not apply a mapping to a longer name sharing its prefix', () => {
      expect(paths.toHostForm('/tmpfiles')).toBe('C:\\tmpfiles')
    })
  })

  describe('toEmulatedForm', () => {
    const paths = translator()

    it.each([
      ['C:\\Users\\tester', '/Users/tester'],
      ['c:\\users', '/users'],
      ['C:\\', '/'],
      ['D:\\data\\x.txt', '/d/data/x.txt'],
      ['D:\\', '/d'],
      ['\\\\server\\share\\x', '//server/share/x'],
      ['C:\\Temp\\x', '/tmp/x'],
    ])('rewrites %s', (input, expected) => {
      expect(paths.toEmulatedForm(input)).toBe(expected)
    })

    it('leaves drive-relative and relative paths alone', () => {
      expect(paths.toEmulatedForm('C:')).toBe('C:')
      expect(paths.toEmulatedForm('C:foo')).toBe('C:foo')
      expect(paths.toEmulatedForm('docs\\a.txt')).toBe('docs\\a.txt')
    })

    it('brings canonical paths back unchanged', () => {
      for (const path of ['/Users/tester/a.txt', '/d/data', '//srv/share/x', '/', '/tmp/cache'])
        expect(paths.toEmulatedForm(paths.toHostForm(path))).toBe(path)
    })

    it('canonicalizes the drive form of the system drive', () => {
      expect(paths.toEmulatedForm(paths.toHostForm('/c/Users'))).toBe('/Users')
    })
  })

  it('is the identity when disabled', () => {
    const paths = new PathTranslator({ enabled: false, systemDrive: 'C:', homeDir: '/home/tester' })
    expect(paths.toHostForm('/c/Users')).toBe('/c/Users')
    expect(paths.toEmulatedForm('C:\\Users')).toBe('C:\\Users')
    expect(paths.translateArguments(['/c/x'], 'operands')).toEqual(['/c/x'])
  })

  describe('translateArguments', () => {
    const paths = translator([])

    it('translates every operand but not options', () => {
      expect(paths.translateArguments(['-l', '/c/x', 'rel'], 'operands')).toEqual(['-l', 'C:\\x', 'rel'])
    })

    it('treats a lone dash as an operand', () => {
      expect(paths.translateArguments(['-'], 'operands')).toEqual(['-'])
    })

    it('translates only operands with a slash in auto mode', () => {
      expect(paths.translateArguments(['-n', '5', '/d/log.txt'], 'auto')).toEqual(['-n', '5', 'D:\\log.txt'])
    })

    it('skips the leading operands given by operandsFrom', () => {
      expect(paths.translateArguments(['-i', '/etc', '/d/f'], { operandsFrom: 1 })).toEqual(['-i', '/etc', 'D:\\f'])
    })

    it('treats everything after -- as operands', () => {
      expect(paths.translateArguments(['--', '-v', '/d/log.txt'], { operandsFrom: 1 })).toEqual(['--', '-v', 'D:\\log.txt'])
      expect(paths.translateArguments(['-i', '--', '/d/a', '-x'], 'operands')).toEqual(['-i', '--', 'D:\\a', '-x'])
    })

    it('translates listed positions only', () => {
      expect(paths.translateArguments(['/a', '/b'], [1])).toEqual(['/a', 'C:\\b'])
    })

    it('returns a copy for none', () => {
      const args = ['/c/x']
      const result = paths.translateArguments(args, 'none')
      expect(result).toEqual(['/c/x'])
      expect(result).not.toBe(args)
    })
  })
})
