import type { BuiltinCommand, CommandIO, Shell } from './types'
import { open } from 'node:fs/promises'
import { describeFsError, parseFlags, report } from './io'

export const touchCommand: BuiltinCommand = {
  name: 'touch',
  description: 'Create files or update their modification time',
  usage: 'touch file ...',
  examples: ['touch notes.txt', 'touch /d/work/.keep'],
  pathArguments: 'operands',
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    const parsed = parseFlags(args, '')
    if ('error' in parsed) {
      await report(io, 'touch', parsed.error)
      return 1
    }
    if (parsed.operands.length === 0) {
      await report(io, 'touch', 'missing file operand')
      return 1
    }

    let status = 0
    const now = new Date()
    for (const operand of parsed.operands) {
      try {
        const handle = await open(shell.resolvePath(operand), 'a')
        try {
          await handle.utimes(now, now)
        }
        finally {
          await handle.close()
        }
      }
      catch (error) {
        await report(io, 'touch', `cannot touch '${operand}': ${describeFsError(error)}`)
        status = 1
      }
    }
    return status
  },
}
