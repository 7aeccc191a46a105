import type { BuiltinCommand, CommandIO, Shell } from './types'
import { parseFlags, report } from './io'

/**
 * Unalias command - removes aliases. Removing a built-in alias lasts for the
 * rest of the session; `-a` removes every user alias.
 */
export const unaliasCommand: BuiltinCommand = {
  name: 'unalias',
  description: 'Remove aliases',
  usage: 'unalias [-a] name ...',
  examples: ['unalias ll', 'unalias -a'],
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    const parsed = parseFlags(args, 'a')
    if ('error' in parsed) {
      await report(io, 'unalias', parsed.error)
      return 2
    }

    if (parsed.flags.has('a')) {
      shell.aliases.clear()
      return 0
    }
    if (parsed.operands.length === 0) {
      await report(io, 'unalias', 'usage: unalias [-a] name ...')
      return 2
    }

    let status = 0
    for (const name of parsed.operands) {
      if (!shell.aliases.remove(name)) {
        await report(io, 'unalias', `${name}: not found`)
        status = 1
      }
    }
    return status
  },
}
