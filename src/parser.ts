import type { FileRedirection, Pipeline, RedirectionSpec, Stage, Token } from './types'
import { EXIT_PRE_EXECUTION, WinuxError } from './errors'

export class ParseError extends WinuxError {
  readonly position: number

  constructor(message: string, position: number) {
    super(message, 'EPARSE', EXIT_PRE_EXECUTION)
    this.name = 'ParseError'
    this.position = position
  }

  /**
   * Renders the message with the offending line and a caret under the column
   */
  format(line: string): string {
    const column = Math.min(Math.max(this.position, 0), line.length)
    return `winux: parse error: ${this.message}\n  ${line}\n  ${' '.repeat(column)}^`
  }
}

// Characters a backslash may escape outside of quotes. Any other backslash is
// literal so that host paths like C:\Users\me survive tokenizing.
const ESCAPABLE = new Set([' ', '\t', '\'', '"', '|', '>', '#'])

function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r'
}

interface Segment {
  words: Token[]
  redirect?: { token: Token, target?: Token }
}

export class CommandParser {
  /**
   * Splits a line into words and operators. Quotes are stripped from words and
   * operators are never recognized inside a quoted span.
   */
  tokenize(input: string): Token[] {
    const tokens: Token[] = []
    let buf = ''
    let start = -1
    let quoted = false

    const flush = () => {
      if (start !== -1)
        tokens.push({ type: 'word', value: buf, position: start, quoted })
      buf = ''
      start = -1
      quoted = false
    }
    const begin = (i: number) => {
      if (start === -1)
        start = i
    }

    let i = 0
    while (i < input.length) {
      const ch = input[i]

      if (isBlank(ch)) {
        flush()
        i++
        continue
      }

      if (ch === '|') {
        flush()
        tokens.push({ type: 'pipe', value: '|', position: i, quoted: false })
        i++
        continue
      }

      if (ch === '>') {
        flush()
        if (input[i + 1] === '>') {
          tokens.push({ type: 'redirect-append', value: '>>', position: i, quoted: false })
          i += 2
        }
        else {
          tokens.push({ type: 'redirect-truncate', value: '>', position: i, quoted: false })
          i++
        }
        continue
      }

      if (ch === '\'') {
        const close = input.indexOf('\'', i + 1)
        if (close === -1)
          throw new ParseError('unterminated single quote', i)
        begin(i)
        quoted = true
        buf += input.slice(i + 1, close)
        i = close + 1
        continue
      }

      if (ch === '"') {
        begin(i)
        quoted = true
        let j = i + 1
        let closed = false
        while (j < input.length) {
          const c = input[j]
          if (c === '\\' && (input[j + 1] === '"' || input[j + 1] === '\\')) {
            buf += input[j + 1]
            j += 2
            continue
          }
          if (c === '"') {
            closed = true
            break
          }
          buf += c
          j++
        }
        if (!closed)
          throw new ParseError('unterminated double quote', i)
        i = j + 1
        continue
      }

      if (ch === '\\' && i + 1 < input.length && ESCAPABLE.has(input[i + 1])) {
        begin(i)
        buf += input[i + 1]
        i += 2
        continue
      }

      begin(i)
      buf += ch
      i++
    }
    flush()

    return tokens
  }

  parse(input: string): Pipeline {
    const trimmed = input.trim()
    if (!trimmed || trimmed.startsWith('#'))
      return { raw: input, stages: [] }

    const tokens = this.tokenize(input)
    const segments: Segment[] = []
    let current: Segment = { words: [] }
    let lastPipe: Token | undefined

    for (const token of tokens) {
      const pendingRedirect = current.redirect && !current.redirect.target ? current.redirect : undefined

      if (token.type === 'word') {
        if (pendingRedirect)
          pendingRedirect.target = token
        else
          current.words.push(token)
        continue
      }

      if (pendingRedirect)
        throw new ParseError(`missing file name after '${pendingRedirect.token.value}'`, pendingRedirect.token.position)

      if (token.type === 'pipe') {
        if (current.words.length === 0)
          throw new ParseError('missing command before \'|\'', token.position)
        if (current.redirect) {
          throw new ParseError(
            `'${current.redirect.token.value}' is only allowed on the last command of a pipeline`,
            current.redirect.token.position,
          )
        }
        segments.push(current)
        current = { words: [] }
        lastPipe = token
        continue
      }

      if (current.redirect)
        throw new ParseError('only one output redirection is allowed', token.position)
      current.redirect = { token }
    }

    if (current.redirect && !current.redirect.target)
      throw new ParseError(`missing file name after '${current.redirect.token.value}'`, current.redirect.token.position)

    if (current.words.length === 0) {
      if (lastPipe)
        throw new ParseError('missing command after \'|\'', lastPipe.position)
      throw new ParseError('missing command', current.redirect?.token.position ?? 0)
    }
    segments.push(current)

    const stages = segments.map((segment, index): Stage => {
      const [command, ...rest] = segment.words
      if (command.value === '')
        throw new ParseError('empty command name', command.position)
      const isLast = index === segments.length - 1
      return {
        name: command.value,
        args: rest.map(t => t.value),
        stdout: isLast ? this.toRedirection(segment) : { type: 'pipe' },
        position: command.position,
      }
    })

    return { raw: input, stages }
  }

  private toRedirection(segment: Segment): RedirectionSpec {
    const redirect = segment.redirect
    if (!redirect?.target)
      return { type: 'terminal' }
    const spec: FileRedirection = redirect.token.type === 'redirect-append'
      ? { type: 'append', target: redirect.target.value }
      : { type: 'truncate', target: redirect.target.value }
    return spec
  }
}
