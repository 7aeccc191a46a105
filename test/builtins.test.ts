import { chmodSync, existsSync, mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import process from 'node:process'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createTestShell, makeTempDir, removeTempDir } from './helpers'

describe('builtins', () => {
  let dir: string

  beforeEach(() => {
    dir = makeTempDir()
  })

  afterEach(() => {
    removeTempDir(dir)
  })

  function file(name: string, content: string): void {
    writeFileSync(join(dir, name), content)
  }

  describe('echo', () => {
    it('joins its arguments', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('echo  a   "b  c"')
      expect(out.text()).toBe('a b  c\n')
    })

    it('omits the newline with -n', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('echo -n hi')
      expect(out.text()).toBe('hi')
    })
  })

  describe('count', () => {
    it('prints lines, words and bytes with the file name', async () => {
      file('f.txt', 'a b\nc\n')
      const { shell, out } = createTestShell(dir)
      await shell.execute('wc f.txt')
      expect(out.text()).toBe('2 3 6 f.txt\n')
    })

    it('adds a total for several files', async () => {
      file('f.txt', 'a b\nc\n')
      file('g.txt', 'x\n')
      const { shell, out } = createTestShell(dir)
      await shell.execute('count -l f.txt g.txt')
      expect(out.text()).toBe('2 f.txt\n1 g.txt\n3 total\n')
    })

    it('counts its input without a label', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('echo one two | wc -w')
      expect(out.text()).toBe('2\n')
    })
  })

  describe('filter', () => {
    beforeEach(() => {
      file('fruit.txt', 'Apple\nbanana\ncherry\n')
    })

    it('matches case-insensitively with -i', async () => {
      const { shell, out } = createTestShell(dir)
      expect((await shell.execute('grep -i apple fruit.txt')).exitCode).toBe(0)
      expect(out.text()).toBe('Apple\n')
    })

    it('inverts with -v', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('grep -v an fruit.txt')
      expect(out.text()).toBe('Apple\ncherry\n')
    })

    it('numbers lines with -n', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('grep -n e fruit.txt')
      expect(out.text()).toBe('1:Apple\n3:cherry\n')
    })

    it('counts matches with -c', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('grep -c a fruit.txt')
      expect(out.text()).toBe('1\n')
    })

    it('prefixes file names when reading several files', async () => {
      file('pots.txt', 'pan\n')
      const { shell, out } = createTestShell(dir)
      await shell.execute('filter an fruit.txt pots.txt')
      expect(out.text()).toBe('fruit.txt:banana\npots.txt:pan\n')
    })

    it('exits 1 when nothing matches', async () => {
      const { shell, out } = createTestShell(dir)
      expect((await shell.execute('grep zzz fruit.txt')).exitCode).toBe(1)
      expect(out.text()).toBe('')
    })

    it('exits 2 on a bad pattern or a missing pattern', async () => {
      const { shell, err } = createTestShell(dir)
      expect((await shell.execute('grep ( fruit.txt')).exitCode).toBe(2)
      expect(err.text()).toMatch(/^filter: invalid pattern '\(': /)
      err.reset()
      expect((await shell.execute('grep')).exitCode).toBe(2)
      expect(err.text()).toBe('filter: missing pattern\n')
    })
  })

  describe('head', () => {
    beforeEach(() => {
      file('lines.txt', `${Array.from({ length: 12 }, (_, i) => `l${i + 1}`).join('\n')}\n`)
    })

    it('prints ten lines by default', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('head lines.txt')
      expect(out.text()).toBe('l1\nl2\nl3\nl4\nl5\nl6\nl7\nl8\nl9\nl10\n')
    })

    it('takes the count as -n N, -nN or -N', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('head -n 2 lines.txt')
      await shell.execute('head -n1 lines.txt')
      await shell.execute('head -3 lines.txt')
      expect(out.text()).toBe('l1\nl2\nl1\nl1\nl2\nl3\n')
    })

    it('rejects a bad count', async () => {
      const { shell, err } = createTestShell(dir)
      expect((await shell.execute('head -n x lines.txt')).exitCode).toBe(1)
      expect(err.text()).toBe('head: invalid number of lines: \'x\'\n')
    })

    it('prints a header per file', async () => {
      file('a.txt', 'A\n')
      file('b.txt', 'B\n')
      const { shell, out } = createTestShell(dir)
      await shell.execute('head -n 1 a.txt b.txt')
      expect(out.text()).toBe('==> a.txt <==\nA\n\n==> b.txt <==\nB\n')
    })
  })

  describe('show', () => {
    it('numbers lines with -n', async () => {
      file('f.txt', 'a\nb\n')
      const { shell, out } = createTestShell(dir)
      await shell.execute('cat -n f.txt')
      expect(out.text()).toBe('     1\ta\n     2\tb\n')
    })

    it('refuses a directory', async () => {
      mkdirSync(join(dir, 'sub'))
      const { shell, err } = createTestShell(dir)
      expect((await shell.execute('cat sub')).exitCode).toBe(1)
      expect(err.text()).toBe('show: sub: Is a directory\n')
    })
  })

  describe('list', () => {
    it('lists visible entries sorted by name', async () => {
      file('b.txt', '')
      file('a.txt', '')
      file('.hidden', '')
      mkdirSync(join(dir, 'sub'))
      const { shell, out } = createTestShell(dir)
      await shell.execute('ls')
      expect(out.text()).toBe('a.txt\nb.txt\nsub\n')
    })

    it('includes hidden entries with -a', async () => {
      file('a.txt', '')
      file('.hidden', '')
      const { shell, out } = createTestShell(dir)
      await shell.execute('ls -a')
      expect(out.text().split('\n').filter(Boolean).sort()).toEqual(['.hidden', 'a.txt'])
    })

    it('prints type, size and modification time with -l', async () => {
      file('a.txt', 'hello')
      const { shell, out } = createTestShell(dir)
      await shell.execute('ls -l a.txt')
      expect(out.text()).toMatch(/^- {10}5 \d{4}-\d{2}-\d{2} \d{2}:\d{2} a\.txt\n$/)
    })

    it('exits 2 for a missing path', async () => {
      const { shell, err } = createTestShell(dir)
      expect((await shell.execute('ls nope')).exitCode).toBe(2)
      expect(err.text()).toBe('list: cannot access \'nope\': No such file or directory\n')
    })
  })

  describe('touch and remove', () => {
    it('creates and removes a file', async () => {
      const { shell } = createTestShell(dir)
      await shell.execute('touch new.txt')
      expect(existsSync(join(dir, 'new.txt'))).toBe(true)
      await shell.execute('rm new.txt')
      expect(existsSync(join(dir, 'new.txt'))).toBe(false)
    })

    it('needs -r for directories', async () => {
      mkdirSync(join(dir, 'sub'))
      const { shell, err } = createTestShell(dir)
      expect((await shell.execute('rm sub')).exitCode).toBe(1)
      expect(err.text()).toBe('remove: cannot remove \'sub\': Is a directory\n')
      expect((await shell.execute('rm -r sub')).exitCode).toBe(0)
      expect(existsSync(join(dir, 'sub'))).toBe(false)
    })

    it('reports missing files unless forced', async () => {
      const { shell, err } = createTestShell(dir)
      expect((await shell.execute('rm ghost')).exitCode).toBe(1)
      expect(err.text()).toBe('remove: cannot remove \'ghost\': No such file or directory\n')
      expect((await shell.execute('rm -f ghost')).exitCode).toBe(0)
      err.reset()
      expect((await shell.execute('rm')).exitCode).toBe(1)
      expect(err.text()).toBe('remove: missing operand\n')
    })
  })

  describe('alias and unalias', () => {
    it('defines and shows an alias', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('alias greet=\'echo hello\'')
      await shell.execute('alias greet')
      await shell.execute('greet world')
      expect(out.text()).toBe('alias greet=\'echo hello\'\nhello world\n')
    })

    it('reports unknown names', async () => {
      const { shell, err } = createTestShell(dir)
      expect((await shell.execute('alias nope')).exitCode).toBe(1)
      expect((await shell.execute('unalias nope')).exitCode).toBe(1)
      expect(err.text()).toBe('alias: nope: not found\nunalias: nope: not found\n')
    })

    it('removes aliases', async () => {
      const { shell, err } = createTestShell(dir)
      await shell.execute('alias greet=\'echo hello\'')
      expect((await shell.execute('unalias greet')).exitCode).toBe(0)
      expect(shell.aliases.has('greet')).toBe(false)
      expect((await shell.execute('unalias')).exitCode).toBe(2)
      expect(err.text()).toBe('unalias: usage: unalias [-a] name ...\n')
    })
  })

  describe('which', () => {
    it('describes aliases and builtins', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('which ll ls echo')
      expect(out.text()).toBe('ll: aliased to ls -l -a (runs list -l -a)\nls: aliased to list\necho: shell built-in command\n')
    })

    it.skipIf(process.platform === 'win32')('finds host programs on PATH', async () => {
      file('mytool', '#!/bin/sh\n')
      chmodSync(join(dir, 'mytool'), 0o755)
      const { shell, out, err } = createTestShell(dir, { host: { variables: { PATH: dir } } })
      expect((await shell.execute('which mytool')).exitCode).toBe(0)
      expect(out.text()).toBe(`${join(dir, 'mytool')}\n`)
      expect((await shell.execute('which nothere')).exitCode).toBe(1)
      expect(err.text()).toBe('which: no nothere in PATH\n')
    })
  })

  describe('help', () => {
    it('describes a command reached through an alias', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('man grep')
      expect(out.text()).toBe([
        'filter: Print lines matching a pattern',
        'Usage: filter [-i] [-v] [-n] [-c] pattern [file ...]',
        'Examples:',
        '  filter error app.log',
        '  list /home | filter txt',
        '  grep -in todo notes.md',
        '',
      ].join('\n'))
    })

    it('lists every builtin', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('help')
      const lines = out.text().split('\n')
      expect(lines[0]).toBe('Built-in commands:')
      expect(lines[1]).toBe('  alias    Define or display aliases')
      expect(lines).toHaveLength(1 + 18 + 3)
    })

    it('fails for unknown topics', async () => {
      const { shell, err } = createTestShell(dir)
      expect((await shell.execute('help nope')).exitCode).toBe(1)
      expect(err.text()).toBe('help: no help topics match \'nope\'\n')
    })
  })

  describe('history', () => {
    it('prints numbered entries', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('echo a')
      await shell.execute('echo b')
      out.reset()
      await shell.execute('history')
      expect(out.text()).toBe('    1  echo a\n    2  echo b\n')
    })

    it('limits the output to the newest entries', async () => {
      const { shell, out } = createTestShell(dir)
      await shell.execute('echo a')
      await shell.execute('echo b')
      out.reset()
      await shell.execute('history 1')
      expect(out.text()).toBe('    2  echo b\n')
    })

    it('clears with -c', async () => {
      const { shell } = createTestShell(dir)
      await shell.execute('echo a')
      await shell.execute('history -c')
      expect(shell.history.entries().map(e => e.line)).toEqual(['history -c'])
    })
  })

  describe('exit', () => {
    it.each([
      ['exit 256', 0],
      ['exit -1', 255],
      ['exit 7', 7],
    ])('%s requests exit status %i', async (line, code) => {
      const { shell } = createTestShell(dir)
      await shell.execute(line)
      expect(shell.exitRequested).toBe(true)
      expect(shell.exitStatus).toBe(code)
    })

    it('keeps the previous status without an argument', async () => {
      const { shell } = createTestShell(dir)
      await shell.execute('grep x missing.txt')
      await shell.execute('exit')
      expect(shell.exitStatus).toBe(2)
    })

    it('exits 2 on a non-numeric argument', async () => {
      const { shell, err } = createTestShell(dir)
      await shell.execute('exit abc')
      expect(shell.exitStatus).toBe(2)
      expect(err.text()).toBe('exit: abc: numeric argument required\n')
    })

    it('refuses several arguments and keeps running', async () => {
      const { shell, err } = createTestShell(dir)
      expect((await shell.execute('exit 1 2')).exitCode).toBe(1)
      expect(shell.exitRequested).toBe(false)
      expect(err.text()).toBe('exit: too many arguments\n')
    })
  })

  describe('pwd', () => {
    it('prints the emulated and host forms of the directory', async () => {
      const { shell, out } = createTestShell(dir, {
        config: { paths: { translate: true, mappings: [{ emulated: '/work', host: dir }] } },
      })
      await shell.execute('pwd')
      await shell.execute('pwd -W')
      expect(out.text()).toBe(`/work\n${dir}\n`)
    })
  })

  it('yes repeats its arguments', async () => {
    const { shell, out } = createTestShell(dir)
    await shell.execute('yes hello | head -n 2')
    expect(out.text()).toBe('hello\nhello\n')
  })

  it('clear writes the clear-screen sequence', async () => {
    const { shell, out } = createTestShell(dir)
    await shell.execute('clear')
    expect(out.text()).toBe('\u001B[2J\u001B[3J\u001B[H')
  })
})
