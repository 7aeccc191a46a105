import type { BuiltinCommand, CommandIO, Shell } from './types'
import { rm, stat } from 'node:fs/promises'
import { describeFsError, parseFlags, report } from './io'

export const removeCommand: BuiltinCommand = {
  name: 'remove',
  description: 'Remove files or directories',
  usage: 'remove [-r] [-f] path ...',
  examples: ['remove notes.txt', 'rm -r build', 'rm -rf /d/tmp/cache'],
  pathArguments: 'operands',
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    const parsed = parseFlags(args, 'rRf')
    if ('error' in parsed) {
      await report(io, 'remove', parsed.error)
      return 1
    }

    const recursive = parsed.flags.has('r') || parsed.flags.has('R')
    const force = parsed.flags.has('f')
    if (parsed.operands.length === 0) {
      if (force)
        return 0
      await report(io, 'remove', 'missing operand')
      return 1
    }

    let status = 0
    for (const operand of parsed.operands) {
      const path = shell.resolvePath(operand)
      try {
        if (!recursive && (await stat(path)).isDirectory()) {
          await report(io, 'remove', `cannot remove '${operand}': Is a directory`)
          status = 1
          continue
        }
        await rm(path, { recursive, force })
      }
      catch (error) {
        if (force && error instanceof Error && 'code' in error && error.code === 'ENOENT')
          continue
        await report(io, 'remove', `cannot remove '${operand}': ${describeFsError(error)}`)
        status = 1
      }
    }
    return status
  },
}
