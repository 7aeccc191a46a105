import type { Readable } from 'node:stream'
import type { BuiltinCommand, CommandIO, Shell } from './types'
import { writeLine } from '../utils/streams'
import { describeFsError, inputLines, openInput, report } from './io'

interface HeadOptions {
  lines: number
  sources: string[]
}

function parseHeadArgs(args: string[]): HeadOptions | { error: string } {
  let lines = 10
  const sources: string[] = []

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    let value: string | undefined
    if (arg === '-n') {
      value = args[++i]
      if (value === undefined)
        return { error: 'option requires an argument -- \'n\'' }
    }
    else if (arg.startsWith('-n')) {
      value = arg.slice(2)
    }
    else if (/^-\d+$/.test(arg)) {
      value = arg.slice(1)
    }
    else if (arg.startsWith('-') && arg !== '-') {
      return { error: `invalid option -- '${arg.slice(1, 2)}'` }
    }
    else {
      sources.push(arg)
      continue
    }

    if (!/^\d+$/.test(value))
      return { error: `invalid number of lines: '${value}'` }
    lines = Number(value)
  }

  return { lines, sources }
}

/** Writes the first `limit` lines; false once the reader went away */
async function copyHead(input: Readable, io: CommandIO, limit: number): Promise<boolean> {
  if (limit === 0)
    return true
  let written = 0
  for await (const line of inputLines(input, io)) {
    if (!await writeLine(io.stdout, line))
      return false
    if (++written >= limit)
      break
  }
  return true
}

/**
 * Head command - prints the first lines of each file or of its input, then
 * stops reading so that the producer upstream is released
 */
export const headCommand: BuiltinCommand = {
  name: 'head',
  description: 'Print the first lines of input',
  usage: 'head [-n count | -count] [file ...]',
  examples: ['head -n 5 app.log', 'yes | head -n 3'],
  pathArguments: 'auto',
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    const parsed = parseHeadArgs(args)
    if ('error' in parsed) {
      await report(io, 'head', parsed.error)
      return 1
    }

    const sources = parsed.sources.length > 0 ? parsed.sources : ['-']
    const headers = sources.length > 1
    let status = 0

    for (const [index, source] of sources.entries()) {
      let input: Readable | undefined
      try {
        input = await openInput(source, io, shell)
        if (headers && !await writeLine(io.stdout, `${index > 0 ? '\n' : ''}==> ${source} <==`))
          return status
        if (!await copyHead(input, io, parsed.lines))
          return status
      }
      catch (error) {
        if (io.signal.aborted)
          return status
        await report(io, 'head', `${source}: ${describeFsError(error)}`)
        status = 1
      }
      finally {
        if (input && input !== io.stdin)
          input.destroy()
      }
    }
    return status
  },
}
