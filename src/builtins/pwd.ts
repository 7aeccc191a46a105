import type { BuiltinCommand, CommandIO, Shell } from './types'
import { writeLine } from '../utils/streams'
import { parseFlags, report } from './io'

/**
 * PWD (Print Working Directory) command - prints the current directory in
 * Linux-style form, or in host form with -W
 */
export const pwdCommand: BuiltinCommand = {
  name: 'pwd',
  description: 'Print the current working directory',
  usage: 'pwd [-W]',
  async execute(args: string[], io: CommandIO, shell: Shell): Promise<number> {
    const parsed = parseFlags(args, 'W')
    if ('error' in parsed) {
      await report(io, 'pwd', parsed.error)
      return 1
    }

    const path = parsed.flags.has('W') ? shell.cwd : shell.paths.toEmulatedForm(shell.cwd)
    await writeLine(io.stdout, path)
    return 0
  },
}
