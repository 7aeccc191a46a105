import type { BuiltinCommand, CommandIO, Shell } from './types'
import { writeLine } from '../utils/streams'
import { parseFlags, report } from './io'

/**
 * HISTORY command - displays or clears the command history
 */
export const historyCommand: BuiltinCommand = {
  name: 'history',
  description: 'Display or clear the command history',
  usage: 'history [-c] [count]',
  examples: ['history', 'history 20', 'history -c'],
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    const parsed = parseFlags(args, 'c')
    if ('error' in parsed) {
      await report(io, 'history', parsed.error)
      return 2
    }

    if (parsed.flags.has('c')) {
      shell.history.clear()
      return 0
    }

    let limit: number | undefined
    const [count] = parsed.operands
    if (count !== undefined) {
      if (!/^\d+$/.test(count)) {
        await report(io, 'history', `${count}: numeric argument required`)
        return 2
      }
      limit = Number(count)
    }

    for (const entry of shell.history.entries(limit)) {
      if (!await writeLine(io.stdout, `${String(entry.index).padStart(5)}  ${entry.line}`))
        break
    }
    return 0
  },
}
