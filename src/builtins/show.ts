import type { Readable } from 'node:stream'
import type { BuiltinCommand, CommandIO, Shell } from './types'
import { writeLine, writeOutput } from '../utils/streams'
import { describeFsError, inputLines, openInput, parseFlags, report } from './io'

/** Copies a stream to stdout; false once the reader went away */
async function copy(input: Readable, io: CommandIO): Promise<boolean> {
  for await (const chunk of input) {
    if (io.signal.aborted)
      return false
    const data: string | Uint8Array = typeof chunk === 'string' || chunk instanceof Uint8Array ? chunk : String(chunk)
    if (!await writeOutput(io.stdout, data))
      return false
  }
  return true
}

/**
 * Copies line by line, optionally numbering lines from `start` on. Resolves
 * with the last line number, or undefined once the reader went away.
 */
async function copyLines(input: Readable, io: CommandIO, numbered: boolean, start: number): Promise<number | undefined> {
  let n = start
  for await (const line of inputLines(input, io)) {
    n++
    if (!await writeLine(io.stdout, numbered ? `${String(n).padStart(6)}\t${line}` : line))
      return undefined
  }
  return n
}

/**
 * Show command - concatenates files (or its input) to standard output
 */
export const showCommand: BuiltinCommand = {
  name: 'show',
  description: 'Print file contents',
  usage: 'show [-n] [file ...]',
  examples: ['show README.md', 'cat -n /c/Windows/win.ini', 'list | show'],
  pathArguments: 'operands',
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    const parsed = parseFlags(args, 'n')
    if ('error' in parsed) {
      await report(io, 'show', parsed.error)
      return 1
    }

    const numbered = parsed.flags.has('n')
    const sources = parsed.operands.length > 0 ? parsed.operands : ['-']
    let status = 0
    let lineNumber = 0

    for (const source of sources) {
      let input: Readable | undefined
      try {
        input = await openInput(source, io, shell)
        // Terminal input is line-edited, so it is read line by line
        if (numbered || (input === io.stdin && io.terminal)) {
          const reached = await copyLines(input, io, numbered, lineNumber)
          if (reached === undefined)
            return status
          lineNumber = reached
        }
        else if (!await copy(input, io)) {
          return status
        }
      }
      catch (error) {
        if (io.signal.aborted)
          return status
        await report(io, 'show', `${source}: ${describeFsError(error)}`)
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

