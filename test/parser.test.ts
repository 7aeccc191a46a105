import { describe, expect, it } from 'vitest'
import { CommandParser, ParseError } from '../src/parser'

function parseError(line: string): ParseError {
  try {
    new CommandParser().parse(line)
  }
  catch (error) {
    if (error instanceof ParseError)
      return error
    throw error
  }
  throw new Error(`expected '${line}' to fail`)
}

describe('CommandParser', () => {
  const parser = new CommandParser()

  describe('tokenize', () => {
    it('splits operators without surrounding blanks', () => {
      expect(parser.tokenize('a|b>>c')).toEqual([
        { type: 'word', value: 'a', position: 0, quoted: false },
        { type: 'pipe', value: '|', position: 1, quoted: false },
        { type: 'word', value: 'b', position: 2, quoted: false },
        { type: 'redirect-append', value: '>>', position: 3, quoted: false },
        { type: 'word', value: 'c', position: 5, quoted: false },
      ])
    })

    it('joins adjacent quoted and unquoted parts into one word', () => {
      const tokens = parser.tokenize('echo a"b c"d')
      expect(tokens.map(t => t.value)).toEqual(['echo', 'ab cd'])
      expect(tokens[1].quoted).toBe(true)
      expect(tokens[1].position).toBe(5)
    })

    it('keeps operators inside quotes as text', () => {
      expect(parser.tokenize('echo "x | y" \'a > b\'').map(t => t.type)).toEqual(['word', 'word', 'word'])
    })

    it('keeps backslashes of host paths literally', () => {
      expect(parser.tokenize('show C:\\Users\\me').map(t => t.value)).toEqual(['show', 'C:\\Users\\me'])
    })

    it('escapes blanks and operators outside quotes', () => {
      expect(parser.tokenize('echo a\\ b \\| \\>').map(t => t.value)).toEqual(['echo', 'a b', '|', '>'])
    })

    it('unescapes quotes and backslashes inside double quotes', () => {
      expect(parser.tokenize('echo "say \\"hi\\" \\\\ now"').map(t => t.value)).toEqual(['echo', 'say "hi" \\ now'])
    })

    it('produces an empty word for empty quotes', () => {
      expect(parser.tokenize('echo \'\' ""').map(t => t.value)).toEqual(['echo', '', ''])
    })
  })

  describe('parse', () => {
    it('builds a two-stage pipeline with a truncating redirect on the last stage', () => {
      const pipeline = parser.parse('list /home | filter txt > results.txt')
      expect(pipeline.stages).toEqual([
        { name: 'list', args: ['/home'], stdout: { type: 'pipe' }, position: 0 },
        { name: 'filter', args: ['txt'], stdout: { type: 'truncate', target: 'results.txt' }, position: 13 },
      ])
    })

    it('recognizes append redirection', () => {
      const [stage] = parser.parse('echo hi >> log.txt').stages
      expect(stage.stdout).toEqual({ type: 'append', target: 'log.txt' })
    })

    it('gives a stage without redirection terminal output', () => {
      expect(parser.parse('pwd').stages[0].stdout).toEqual({ type: 'terminal' })
    })

    it('accepts words after the redirection target', () => {
      const [stage] = parser.parse('echo a > out b').stages
      expect(stage.args).toEqual(['a', 'b'])
      expect(stage.stdout).toEqual({ type: 'truncate', target: 'out' })
    })

    it('returns no stages for blank lines and comments', () => {
      expect(parser.parse('').stages).toEqual([])
      expect(parser.parse('   ').stages).toEqual([])
      expect(parser.parse('  # just a note').stages).toEqual([])
    })

    it('keeps the raw line', () => {
      expect(parser.parse('echo  hi').raw).toBe('echo  hi')
    })
  })

  describe('errors', () => {
    it.each([
      ['echo "abc', 'unterminated double quote', 5],
      ['echo \'abc', 'unterminated single quote', 5],
      ['| list', 'missing command before \'|\'', 0],
      ['a | | b', 'missing command before \'|\'', 4],
      ['list |', 'missing command after \'|\'', 5],
      ['list >', 'missing file name after \'>\'', 5],
      ['list >> | x', 'missing file name after \'>>\'', 5],
      ['list > a > b', 'only one output redirection is allowed', 9],
      ['list > out | filter x', '\'>\' is only allowed on the last command of a pipeline', 5],
      ['> out', 'missing command', 0],
      ['"" foo', 'empty command name', 0],
    ])('rejects %j', (line, message, position) => {
      const error = parseError(line)
      expect(error.message).toBe(message)
      expect(error.position).toBe(position)
      expect(error.exitCode).toBe(258)
    })

    it('formats the error with a caret under the offending column', () => {
      expect(parseError('list |').format('list |')).toBe(
        'winux: parse error: missing command after \'|\'\n  list |\n       ^',
      )
    })
  })
})
