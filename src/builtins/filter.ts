import type { BuiltinCommand, CommandIO, Shell } from './types'
import { errorMessage } from '../errors'
import { writeLine } from '../utils/streams'
import { describeFsError, inputLines, openInput, parseFlags, report } from './io'

/**
 * Filter command - prints the lines that match a regular expression, reading
 * the named files or its input. Exits 0 when something matched, 1 when
 * nothing did and 2 on errors.
 */
export const filterCommand: BuiltinCommand = {
  name: 'filter',
  description: 'Print lines matching a pattern',
  usage: 'filter [-i] [-v] [-n] [-c] pattern [file ...]',
  examples: ['filter error app.log', 'list /home | filter txt', 'grep -in todo notes.md'],
  pathArguments: { operandsFrom: 1 },
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    const parsed = parseFlags(args, 'ivnc')
    if ('error' in parsed) {
      await report(io, 'filter', parsed.error)
      return 2
    }

    const [pattern, ...files] = parsed.operands
    if (pattern === undefined) {
      await report(io, 'filter', 'missing pattern')
      return 2
    }

    let regex: RegExp
    try {
      regex = new RegExp(pattern, parsed.flags.has('i') ? 'i' : '')
    }
    catch (error) {
      await report(io, 'filter', `invalid pattern '${pattern}': ${errorMessage(error)}`)
      return 2
    }

    const invert = parsed.flags.has('v')
    const numbered = parsed.flags.has('n')
    const countOnly = parsed.flags.has('c')
    const sources = files.length > 0 ? files : ['-']
    const prefixed = sources.length > 1
    let matched = false
    let failed = false

    for (const source of sources) {
      let count = 0
      let lineNumber = 0
      try {
        const input = await openInput(source, io, shell)
        for await (const line of inputLines(input, io)) {
          lineNumber++
          if (regex.test(line) === invert)
            continue
          count++
          matched = true
          if (countOnly)
            continue
          const prefix = `${prefixed ? `${source}:` : ''}${numbered ? `${lineNumber}:` : ''}`
          if (!await writeLine(io.stdout, `${prefix}${line}`)) {
            if (input !== io.stdin)
              input.destroy()
            return 0
          }
        }
      }
      catch (error) {
        if (io.signal.aborted)
          return 2
        await report(io, 'filter', `${source}: ${describeFsError(error)}`)
        failed = true
        continue
      }
      if (countOnly && !await writeLine(io.stdout, `${prefixed ? `${source}:` : ''}${count}`))
        return 0
    }

    if (failed)
      return 2
    return matched ? 0 : 1
  },
}
